/**
 * @invoice-bridge/contracts
 *
 * TypeScript interfaces and types shared by the invoice bridge packages.
 * This package has zero runtime dependencies.
 *
 * @packageDocumentation
 */

// Core types
export * from './core/invoice-record.js';
export * from './core/target-document.js';

// Processing
export * from './processing/outcome.js';

// Notifications
export * from './events/notifications.js';
