/**
 * InvoiceRecord is the fully-defaulted intermediate form of one
 * SalesInvoicePrint document.
 *
 * Every field is required. The normalizer substitutes a default for anything
 * missing in the source, so consumers never branch on absence.
 * Monetary and numeric values are decimal strings to keep formatting exact.
 */

/**
 * Decimal amount represented as string to avoid floating-point issues.
 *
 * @example "1234.56", "-100.00", "0.01"
 */
export type DecimalAmount = string;

/**
 * ISO 4217 currency code
 * @example "GBP", "EUR", "USD"
 */
export type CurrencyCode = string;

/**
 * ISO 8601 calendar date
 * @example "2024-01-23"
 */
export type ISODate = string;

/**
 * Postal address as printed on the source document
 */
export interface AddressInfo {
  /** Up to six non-blank address lines, in source order */
  lines: string[];

  postCode: string;

  countryCode: string;

  /** Country name */
  country: string;

  /** Contact name (only populated for the deliver-to address) */
  contactName: string;
}

/**
 * One invoice line: an ordered item or a charge folded in as a line.
 */
export interface LineItem {
  /**
   * Item number from the source. Charges get "C1", "C2", ... in order.
   */
  itemNumber: string;

  productCode: string;

  description: string;

  quantity: DecimalAmount;

  /** Unit of measure (defaults to "EACH") */
  unitOfMeasure: string;

  unitPrice: DecimalAmount;

  /** Net line value */
  lineTotal: DecimalAmount;

  /** Source VAT code (defaults to "ASTD") */
  vatCode: string;

  /** VAT rate in percent, e.g. "20" */
  vatRate: DecimalAmount;

  vatValue: DecimalAmount;

  /** True when the line was synthesized from a despatch charge */
  isCharge: boolean;
}

/**
 * One tax-rate bracket from the VAT summary list
 */
export interface VatGroup {
  code: string;

  description: string;

  /** VAT rate in percent */
  rate: DecimalAmount;

  /** Taxable (principal) value at this rate */
  taxableValue: DecimalAmount;

  /** Tax charged at this rate */
  taxValue: DecimalAmount;
}

/**
 * Supplier identity taken from the company details section
 */
export interface CompanyIdentity {
  name: string;

  /** VAT registration number */
  vatRegistrationNumber: string;

  /** Company registration number */
  registrationNumber: string;

  address: AddressInfo;
}

/**
 * Customer identity with ship-to and invoice-to addresses
 */
export interface CustomerIdentity {
  /** Supplier's account code for the customer */
  account: string;

  name: string;

  /** Invoice-to party name (falls back to the customer name) */
  invoiceToName: string;

  deliverTo: AddressInfo;

  invoiceTo: AddressInfo;
}

/**
 * Invoice identifiers and dates
 */
export interface InvoiceIdentifiers {
  /** Digits of the source invoice number */
  invoiceNumber: string;

  /** Customer order reference ("our reference" on the print) */
  customerOrderNumber: string;

  /** Internal reference ("your reference" on the print) */
  yourReference: string;

  despatchNumber: string;

  salesOrderNumber: string;

  invoiceDate: ISODate;

  orderDate: ISODate;

  despatchDate: ISODate;
}

export interface CurrencyInfo {
  code: CurrencyCode;

  /** Display name, e.g. "Sterling" */
  name: string;
}

export interface PaymentTerms {
  /** Days from invoice date to payment due date */
  paymentDays: number;

  /** Early payment discount in percent */
  earlyPaymentDiscountPercent: DecimalAmount;
}

/**
 * Document totals. `gross` is always `net + vat`.
 */
export interface InvoiceTotals {
  net: DecimalAmount;
  vat: DecimalAmount;
  gross: DecimalAmount;
}

/**
 * Normalized invoice record, built once per input file.
 */
export interface InvoiceRecord {
  company: CompanyIdentity;

  invoice: InvoiceIdentifiers;

  customer: CustomerIdentity;

  currency: CurrencyInfo;

  paymentTerms: PaymentTerms;

  totals: InvoiceTotals;

  /** Order items followed by qualifying charges */
  lineItems: LineItem[];

  /** VAT summary in source order */
  vatGroups: VatGroup[];

  /** Date used wherever a source date was missing or unparsable */
  processingDate: ISODate;
}
