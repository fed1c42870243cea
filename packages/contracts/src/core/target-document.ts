/**
 * TargetDocument mirrors the BASDA commercial invoice tree section by section.
 *
 * All leaf values are final strings: numbers are already formatted to the
 * precision each element requires. Serializing the document only has to walk
 * the fields in declaration order.
 */

export interface TargetCurrency {
  code: string;
  name: string;
}

export interface TargetInvoiceHead {
  schemaVersion: string;
  language: string;
  decimalSeparator: string;
  precision: string;
  invoiceTypeCode: string;
  invoiceTypeDescription: string;
  currency: TargetCurrency;
  checksum: string;
}

export interface TargetInvoiceReferences {
  buyersOrderNumber: string;
  suppliersInvoiceNumber: string;
  deliveryNoteNumber: string;
}

/**
 * Reference in the secondary namespace (e.g. KWOS sales order reference)
 */
export interface TargetAdditionalReference {
  referenceType: string;
  reference: string;
}

/**
 * Dated entry in the secondary namespace (order date, delivery date)
 */
export interface TargetAdditionalDate {
  dateTimeType: string;
  dateTimeDesc: string;
  value: string;
}

export interface TargetAddress {
  addressLines: string[];
  /** Omitted from the output when undefined */
  postCode?: string;
}

export interface TargetSupplier {
  taxNumber: string;
  gln: string;
  party: string;
  address: TargetAddress;
}

export interface TargetBuyer {
  suppliersCodeForBuyer: string;
  party: string;
  address: TargetAddress;
}

export interface TargetInvoiceTo {
  party: string;
}

export interface TargetLineReference {
  referenceType: string;
  referenceDesc: string;
  reference: string;
}

export interface TargetInvoiceLine {
  lineNumber: string;
  orderLineNumber: string;
  buyersOrderLineReference: string;
  additionalReference: TargetLineReference;
  suppliersProductCode: string;
  description: string;
  packSize: string;
  quantity: string;
  unitPrice: string;
  taxRateCode: string;
  taxRate: string;
  lineTotal: string;
}

export interface TargetSettlement {
  daysFromInvoice: string;
  percentDiscount: string;
  amountDiscount: string;
}

export interface TargetTaxSubTotal {
  taxRateCode: string;
  taxRate: string;
  numberOfLinesAtRate: string;
  totalValueAtRate: string;
  taxableValueAtRate: string;
  taxAtRate: string;
  netPaymentAtRate: string;
  grossPaymentAtRate: string;
  currency: TargetCurrency;
}

export interface TargetInvoiceTotal {
  numberOfLines: string;
  numberOfTaxRates: string;
  lineValueTotal: string;
  taxableTotal: string;
  taxTotal: string;
  netPaymentTotal: string;
  grossPaymentTotal: string;
}

/**
 * The complete target document, in output order.
 */
export interface TargetDocument {
  head: TargetInvoiceHead;
  references: TargetInvoiceReferences;
  additionalReferences: TargetAdditionalReference[];
  additionalDates: TargetAdditionalDate[];
  invoiceDate: string;
  supplier: TargetSupplier;
  buyer: TargetBuyer;
  invoiceTo: TargetInvoiceTo;
  lines: TargetInvoiceLine[];
  settlement: TargetSettlement;
  taxSubTotals: TargetTaxSubTotal[];
  total: TargetInvoiceTotal;
}
