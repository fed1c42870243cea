import type { InvoiceRecord } from '@invoice-bridge/contracts';
import { transformInvoice, type TransformOptions } from './transform.js';
import { serializeTargetDocument } from './serialize.js';

/**
 * Transform and serialize in one step.
 */
export function renderInvoiceXml(record: InvoiceRecord, options: TransformOptions = {}): string {
  return serializeTargetDocument(transformInvoice(record, options));
}
