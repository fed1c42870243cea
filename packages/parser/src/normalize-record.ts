/**
 * SalesInvoicePrint → InvoiceRecord normalization
 *
 * One pass over the parsed source. Nothing here throws: every element or
 * attribute that is missing degrades to its default, so the record handed to
 * the transformer is always complete.
 */

import type {
  AddressInfo,
  CurrencyInfo,
  DecimalAmount,
  ISODate,
  InvoiceRecord,
  LineItem,
  VatGroup,
} from '@invoice-bridge/contracts';
import {
  add,
  daysBetween,
  formatLocalDate,
  isPositive,
  parseDayMonthYear,
  systemClock,
} from '@invoice-bridge/shared';
import type { NormalizeOptions, XmlNode } from './types.js';
import { attr, child, children, dateAttr, decimalAttr, path } from './values.js';

export const DEFAULT_CURRENCY_CODE = 'GBP';
export const DEFAULT_PAYMENT_DAYS = 30;
export const DEFAULT_ITEM_NUMBER = '1';
export const DEFAULT_UNIT_OF_MEASURE = 'EACH';
export const DEFAULT_VAT_CODE = 'ASTD';
export const DEFAULT_CHARGE_CODE = 'CHARGE';
export const DEFAULT_CHARGE_DESCRIPTION = 'Charge';

const MAX_ADDRESS_LINES = 6;

const CURRENCY_NAMES = new Map<string, string>([
  ['GBP', 'Sterling'],
  ['EUR', 'Euro'],
  ['USD', 'US Dollar'],
]);

/**
 * Display name for a currency code; unknown codes name themselves
 */
export function currencyName(code: string): string {
  return CURRENCY_NAMES.get(code) ?? code;
}

/**
 * Keep only the digits of a document number ("INV-10045" → "10045")
 */
export function digitsOnly(value: string): string {
  return value.replace(/\D/g, '');
}

function emptyAddress(): AddressInfo {
  return { lines: [], postCode: '', countryCode: '', country: '', contactName: '' };
}

function parseAddress(node: XmlNode | null): AddressInfo {
  const address = emptyAddress();
  if (!node) return address;

  for (let i = 1; i <= MAX_ADDRESS_LINES; i++) {
    const line = attr(node, `Line${i}`);
    if (line !== null && line.trim().length > 0) {
      address.lines.push(line);
    }
  }

  address.postCode = attr(node, 'Postcode') ?? '';
  address.countryCode = attr(node, 'CountryCode') ?? '';
  address.country = attr(node, 'Country') ?? '';

  return address;
}

function paymentDays(dates: XmlNode | null): number {
  const invoiceDate = parseDayMonthYear(attr(child(dates, 'InvoiceDate'), 'Date'));
  const dueDate = parseDayMonthYear(attr(child(dates, 'PaymentDueDate'), 'Date'));

  if (invoiceDate === null || dueDate === null) {
    return DEFAULT_PAYMENT_DAYS;
  }
  return daysBetween(invoiceDate, dueDate);
}

function parseCurrency(pricing: XmlNode | null): CurrencyInfo {
  const documentCurrency = child(pricing, 'DocumentCurrency');
  const code = documentCurrency
    ? (attr(documentCurrency, 'DocumentCurrencyCode') ?? DEFAULT_CURRENCY_CODE)
    : DEFAULT_CURRENCY_CODE;

  return { code, name: currencyName(code) };
}

function parseItem(item: XmlNode): LineItem {
  const product = child(item, 'Product');
  const quantity = path(item, 'Quantities/OrderQuantity');
  const vat = child(item, 'VAT');

  return {
    itemNumber: attr(item, 'ItemNumber') ?? DEFAULT_ITEM_NUMBER,
    productCode: attr(product, 'Code') ?? '',
    description: attr(product, 'Description1') ?? '',
    quantity: decimalAttr(quantity, 'Quantity'),
    unitOfMeasure: attr(quantity, 'UOM') ?? DEFAULT_UNIT_OF_MEASURE,
    unitPrice: decimalAttr(path(item, 'Prices/UnitPrice'), 'DocumentPrice'),
    lineTotal: decimalAttr(path(item, 'LineValues/NetLineValue'), 'DocumentValue'),
    vatCode: attr(vat, 'Code') ?? DEFAULT_VAT_CODE,
    vatRate: decimalAttr(vat, 'Rate'),
    vatValue: decimalAttr(child(vat, 'VATValue'), 'DocumentValue'),
    isCharge: false,
  };
}

/**
 * Charge as a line item, or null when its value is zero or negative
 */
function parseCharge(charge: XmlNode, sequence: number): LineItem | null {
  const value = decimalAttr(child(charge, 'ChargeValue'), 'DocumentValue');
  if (!isPositive(value)) {
    return null;
  }

  const chargeCode = child(charge, 'ChargeCode');
  const vat = child(charge, 'VAT');

  return {
    itemNumber: `C${sequence}`,
    productCode: attr(chargeCode, 'Code') ?? DEFAULT_CHARGE_CODE,
    description: attr(chargeCode, 'Description') ?? DEFAULT_CHARGE_DESCRIPTION,
    quantity: '1',
    unitOfMeasure: DEFAULT_UNIT_OF_MEASURE,
    unitPrice: value,
    lineTotal: value,
    vatCode: attr(vat, 'Code') ?? DEFAULT_VAT_CODE,
    vatRate: decimalAttr(vat, 'Rate'),
    vatValue: decimalAttr(child(vat, 'VATValue'), 'DocumentValue'),
    isCharge: true,
  };
}

function parseVatGroup(vat: XmlNode): VatGroup {
  return {
    code: attr(vat, 'Code') ?? '',
    description: attr(vat, 'Description') ?? '',
    rate: decimalAttr(vat, 'Rate'),
    taxableValue: decimalAttr(child(vat, 'VATPrinciple'), 'DocumentValue'),
    taxValue: decimalAttr(child(vat, 'VATValue'), 'DocumentValue'),
  };
}

interface DespatchSummary {
  despatchNumber: string;
  despatchDate: ISODate;
  salesOrderNumber: string;
  orderDate: ISODate;
  lineItems: LineItem[];
}

/**
 * Walk every despatch: items of each sales order in order, then that
 * despatch's qualifying charges. Identifiers come from the first despatch and
 * from the last sales order seen.
 */
function parseDespatches(despatches: XmlNode[], processingDate: ISODate): DespatchSummary {
  const summary: DespatchSummary = {
    despatchNumber: '',
    despatchDate: '',
    salesOrderNumber: '',
    orderDate: '',
    lineItems: [],
  };

  const first = despatches[0];
  const details = first ? child(first, 'DespatchDetails') : null;
  if (details) {
    summary.despatchNumber = attr(details, 'DespatchNumber') ?? '';
    summary.despatchDate = dateAttr(path(details, 'Dates/DespatchDate'), 'Date', processingDate);
  }

  let chargeSequence = 0;
  for (const despatch of despatches) {
    for (const salesOrder of children(child(despatch, 'SalesOrders'), 'SalesOrder')) {
      const orderDetails = child(salesOrder, 'SalesOrderDetails');
      if (orderDetails) {
        summary.salesOrderNumber = attr(orderDetails, 'SalesOrderNumber') ?? '';
        summary.orderDate = dateAttr(path(orderDetails, 'Dates/Document'), 'Date', processingDate);
      }

      for (const item of children(child(salesOrder, 'Items'), 'Item')) {
        summary.lineItems.push(parseItem(item));
      }
    }

    for (const charge of children(child(despatch, 'Charges'), 'Charge')) {
      const line = parseCharge(charge, chargeSequence + 1);
      if (line) {
        chargeSequence++;
        summary.lineItems.push(line);
      }
    }
  }

  return summary;
}

/**
 * Build the fully-defaulted record from a SalesInvoicePrint root element.
 */
export function normalizeInvoiceRecord(root: XmlNode, options: NormalizeOptions = {}): InvoiceRecord {
  const processingDate = options.processingDate ?? formatLocalDate((options.clock ?? systemClock).now());

  const company = child(root, 'CompanyDetails');
  const invoice = child(root, 'Invoice');
  const dates = child(invoice, 'Dates');
  const pricing = child(invoice, 'PricingDetails');
  const customerDetails = child(invoice, 'CustomerDetails');
  const customer = child(customerDetails, 'Customer');
  const deliverTo = child(customerDetails, 'DeliverTo');
  const invoiceTo = child(customerDetails, 'InvoiceTo');

  const customerName = attr(customer, 'Name') ?? '';

  const deliverToAddress = parseAddress(child(deliverTo, 'Address'));
  deliverToAddress.contactName = attr(deliverTo, 'Name') ?? '';

  const net: DecimalAmount = decimalAttr(child(pricing, 'Value'), 'DocumentValue');
  const vat: DecimalAmount = decimalAttr(path(pricing, 'VAT/Value'), 'DocumentValue');

  const despatch = parseDespatches(children(child(root, 'Despatches'), 'Despatch'), processingDate);

  return {
    company: {
      name: attr(company, 'Name') ?? '',
      vatRegistrationNumber: attr(company, 'VATRegistrationNo') ?? '',
      registrationNumber: attr(company, 'CoRegistrationNo') ?? '',
      address: parseAddress(child(company, 'Address')),
    },
    invoice: {
      invoiceNumber: digitsOnly(attr(invoice, 'Number') ?? ''),
      customerOrderNumber: attr(invoice, 'OurReference') ?? '',
      yourReference: attr(invoice, 'YourReference') ?? '',
      despatchNumber: despatch.despatchNumber,
      salesOrderNumber: despatch.salesOrderNumber,
      invoiceDate: dateAttr(child(dates, 'InvoiceDate'), 'Date', processingDate),
      orderDate: despatch.orderDate,
      despatchDate: despatch.despatchDate,
    },
    customer: {
      account: attr(customer, 'Account') ?? '',
      name: customerName,
      invoiceToName: invoiceTo ? (attr(child(invoiceTo, 'Customer'), 'Name') ?? customerName) : '',
      deliverTo: deliverToAddress,
      invoiceTo: parseAddress(child(invoiceTo, 'Address')),
    },
    currency: parseCurrency(pricing),
    paymentTerms: {
      paymentDays: paymentDays(dates),
      earlyPaymentDiscountPercent: decimalAttr(child(pricing, 'PaymentTerms'), 'EarlyPercent'),
    },
    totals: { net, vat, gross: add(net, vat) },
    lineItems: despatch.lineItems,
    vatGroups: children(child(root, 'VATDetails'), 'VAT').map(parseVatGroup),
    processingDate,
  };
}
