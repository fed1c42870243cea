/**
 * Fixed values of the commercial invoice document
 */

/** Default namespace of the document */
export const INVOICE_NAMESPACE = 'urn:schemas-basda-org:2000:salesInvoice:xdr:3.01';

/** Namespace of the operator extension sections */
export const EXTENSION_NAMESPACE = 'urn:schemas-bossfed-co-uk:OP-Invoice-v1';

export const SCHEMA_VERSION = '3.05';
export const DOCUMENT_LANGUAGE = 'en-GB';
export const DECIMAL_SEPARATOR = '.';
export const DECIMAL_PRECISION = '20.4';

export const INVOICE_TYPE_CODE = 'INV';
export const INVOICE_TYPE_DESCRIPTION = 'Commercial Invoice';

/** Tax rate code written on every line and tax subtotal */
export const STANDARD_TAX_RATE_CODE = 'S';

export const SALES_ORDER_REFERENCE_TYPE = 'KWOS';

export const ORDER_DATE_TYPE = 'ORD';
export const ORDER_DATE_DESCRIPTION = 'Order Date';
export const DELIVERY_DATE_TYPE = 'DEL';
export const DELIVERY_DATE_DESCRIPTION = 'Delivery date';

export const SETTLEMENT_FLAG_REFERENCE_TYPE = 'SETFLG';
export const SETTLEMENT_FLAG_DESCRIPTION = 'Settlement Discount Flag';
export const SETTLEMENT_FLAG_VALUE = 'Y';

export const PACK_SIZE = '1';
export const AMOUNT_DISCOUNT = '0.00';

/**
 * Decimal places per formatted field
 */
export const PLACES = {
  quantity: 0,
  unitPrice: 3,
  taxRate: 2,
  lineTotal: 3,
  percentDiscount: 2,
  totalValueAtRate: 3,
  taxableValueAtRate: 1,
  taxAtRate: 2,
  netPaymentAtRate: 3,
  grossPaymentAtRate: 3,
  lineValueTotal: 3,
  taxableTotal: 2,
  taxTotal: 2,
  netPaymentTotal: 2,
  grossPaymentTotal: 2,
} as const;
