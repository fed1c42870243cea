import type { InvoiceRecord } from '@invoice-bridge/contracts';
import { readSourceDocument } from './read-source.js';
import { normalizeInvoiceRecord } from './normalize-record.js';
import type { NormalizeOptions } from './types.js';

/**
 * Read and normalize a SalesInvoicePrint document.
 *
 * @throws FormatError when the XML is malformed or has the wrong root
 */
export function parseSalesInvoice(xml: string, options: NormalizeOptions = {}): InvoiceRecord {
  const { root } = readSourceDocument(xml);
  return normalizeInvoiceRecord(root, options);
}
