/**
 * @invoice-bridge/transformer
 *
 * Transformation Engine: InvoiceRecord → commercial invoice XML.
 *
 * @packageDocumentation
 */

export { transformInvoice, type TransformOptions, type ChecksumFunction } from './transform.js';
export { serializeTargetDocument } from './serialize.js';
export { renderInvoiceXml } from './render.js';
export { formatFixed } from './format.js';
export { INVOICE_NAMESPACE, EXTENSION_NAMESPACE, PLACES } from './constants.js';
