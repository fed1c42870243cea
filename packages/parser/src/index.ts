/**
 * @invoice-bridge/parser
 *
 * Record Normalizer: SalesInvoicePrint XML → InvoiceRecord.
 *
 * @packageDocumentation
 */

export { readSourceDocument, decodeCharacterReferences, SOURCE_ROOT_ELEMENT } from './read-source.js';
export { decodeSourceText, detectSourceEncoding } from './decode-source.js';
export {
  normalizeInvoiceRecord,
  currencyName,
  digitsOnly,
  DEFAULT_CURRENCY_CODE,
  DEFAULT_PAYMENT_DAYS,
  DEFAULT_ITEM_NUMBER,
  DEFAULT_UNIT_OF_MEASURE,
  DEFAULT_VAT_CODE,
  DEFAULT_CHARGE_CODE,
  DEFAULT_CHARGE_DESCRIPTION,
} from './normalize-record.js';
export { parseSalesInvoice } from './parse-sales-invoice.js';
export type { NormalizeOptions, SourceDocument, XmlNode } from './types.js';
