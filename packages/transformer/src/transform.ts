/**
 * InvoiceRecord → TargetDocument mapping
 *
 * Pure and deterministic: the same record (and checksum function) always
 * yields the same document. All numeric leaves are formatted here, so the
 * serializer only writes strings.
 */

import type {
  AddressInfo,
  InvoiceRecord,
  LineItem,
  TargetAddress,
  TargetCurrency,
  TargetDocument,
  TargetInvoiceLine,
  TargetTaxSubTotal,
  VatGroup,
} from '@invoice-bridge/contracts';
import { add, invoiceChecksum } from '@invoice-bridge/shared';
import {
  AMOUNT_DISCOUNT,
  DECIMAL_PRECISION,
  DECIMAL_SEPARATOR,
  DELIVERY_DATE_DESCRIPTION,
  DELIVERY_DATE_TYPE,
  DOCUMENT_LANGUAGE,
  INVOICE_TYPE_CODE,
  INVOICE_TYPE_DESCRIPTION,
  ORDER_DATE_DESCRIPTION,
  ORDER_DATE_TYPE,
  PACK_SIZE,
  PLACES,
  SALES_ORDER_REFERENCE_TYPE,
  SCHEMA_VERSION,
  SETTLEMENT_FLAG_DESCRIPTION,
  SETTLEMENT_FLAG_REFERENCE_TYPE,
  SETTLEMENT_FLAG_VALUE,
  STANDARD_TAX_RATE_CODE,
} from './constants.js';
import { formatFixed } from './format.js';

/**
 * Computes the document checksum from the invoice number and the gross
 * total text (scale included)
 */
export type ChecksumFunction = (invoiceNumber: string, grossTotalText: string) => string;

export interface TransformOptions {
  /** Defaults to the FNV-1a invoice checksum */
  checksum?: ChecksumFunction;
}

function toTargetAddress(address: AddressInfo): TargetAddress {
  const target: TargetAddress = {
    addressLines: address.lines.filter((line) => line.trim().length > 0),
  };
  if (address.postCode.trim().length > 0) {
    target.postCode = address.postCode;
  }
  return target;
}

function toInvoiceLine(item: LineItem, index: number): TargetInvoiceLine {
  return {
    lineNumber: String(index + 1),
    orderLineNumber: item.itemNumber,
    buyersOrderLineReference: `${item.itemNumber} ${item.productCode}`,
    additionalReference: {
      referenceType: SETTLEMENT_FLAG_REFERENCE_TYPE,
      referenceDesc: SETTLEMENT_FLAG_DESCRIPTION,
      reference: SETTLEMENT_FLAG_VALUE,
    },
    suppliersProductCode: item.productCode,
    description: item.description,
    packSize: PACK_SIZE,
    quantity: formatFixed(item.quantity, PLACES.quantity),
    unitPrice: formatFixed(item.unitPrice, PLACES.unitPrice),
    taxRateCode: STANDARD_TAX_RATE_CODE,
    taxRate: formatFixed(item.vatRate, PLACES.taxRate),
    lineTotal: formatFixed(item.lineTotal, PLACES.lineTotal),
  };
}

/**
 * `lineCount` is the total number of invoice lines, not the lines at this rate.
 */
function toTaxSubTotal(group: VatGroup, lineCount: number, currency: TargetCurrency): TargetTaxSubTotal {
  return {
    taxRateCode: STANDARD_TAX_RATE_CODE,
    taxRate: formatFixed(group.rate, PLACES.taxRate),
    numberOfLinesAtRate: String(lineCount),
    totalValueAtRate: formatFixed(group.taxableValue, PLACES.totalValueAtRate),
    taxableValueAtRate: formatFixed(group.taxableValue, PLACES.taxableValueAtRate),
    taxAtRate: formatFixed(group.taxValue, PLACES.taxAtRate),
    netPaymentAtRate: formatFixed(group.taxableValue, PLACES.netPaymentAtRate),
    grossPaymentAtRate: formatFixed(add(group.taxableValue, group.taxValue), PLACES.grossPaymentAtRate),
    currency: { ...currency },
  };
}

/**
 * Map a normalized record to the commercial invoice document.
 */
export function transformInvoice(record: InvoiceRecord, options: TransformOptions = {}): TargetDocument {
  const checksum = options.checksum ?? invoiceChecksum;
  const { invoice, company, customer, totals } = record;
  const currency: TargetCurrency = { code: record.currency.code, name: record.currency.name };
  const lineCount = record.lineItems.length;

  return {
    head: {
      schemaVersion: SCHEMA_VERSION,
      language: DOCUMENT_LANGUAGE,
      decimalSeparator: DECIMAL_SEPARATOR,
      precision: DECIMAL_PRECISION,
      invoiceTypeCode: INVOICE_TYPE_CODE,
      invoiceTypeDescription: INVOICE_TYPE_DESCRIPTION,
      currency: { ...currency },
      checksum: checksum(invoice.invoiceNumber, totals.gross),
    },
    references: {
      buyersOrderNumber: invoice.customerOrderNumber,
      suppliersInvoiceNumber: invoice.invoiceNumber,
      deliveryNoteNumber: invoice.despatchNumber,
    },
    additionalReferences: [
      { referenceType: SALES_ORDER_REFERENCE_TYPE, reference: invoice.salesOrderNumber },
    ],
    additionalDates: [
      { dateTimeType: ORDER_DATE_TYPE, dateTimeDesc: ORDER_DATE_DESCRIPTION, value: invoice.orderDate },
      { dateTimeType: DELIVERY_DATE_TYPE, dateTimeDesc: DELIVERY_DATE_DESCRIPTION, value: invoice.despatchDate },
    ],
    invoiceDate: invoice.invoiceDate,
    supplier: {
      taxNumber: company.vatRegistrationNumber,
      gln: company.registrationNumber,
      party: company.name,
      address: toTargetAddress(company.address),
    },
    buyer: {
      suppliersCodeForBuyer: customer.account,
      party: customer.name,
      address: toTargetAddress(customer.invoiceTo),
    },
    invoiceTo: { party: customer.invoiceToName },
    lines: record.lineItems.map(toInvoiceLine),
    settlement: {
      daysFromInvoice: String(record.paymentTerms.paymentDays),
      percentDiscount: formatFixed(record.paymentTerms.earlyPaymentDiscountPercent, PLACES.percentDiscount),
      amountDiscount: AMOUNT_DISCOUNT,
    },
    taxSubTotals: record.vatGroups.map((group) => toTaxSubTotal(group, lineCount, currency)),
    total: {
      numberOfLines: String(lineCount),
      numberOfTaxRates: String(record.vatGroups.length),
      lineValueTotal: formatFixed(totals.net, PLACES.lineValueTotal),
      taxableTotal: formatFixed(totals.net, PLACES.taxableTotal),
      taxTotal: formatFixed(totals.vat, PLACES.taxTotal),
      netPaymentTotal: formatFixed(totals.gross, PLACES.netPaymentTotal),
      grossPaymentTotal: formatFixed(totals.gross, PLACES.grossPaymentTotal),
    },
  };
}
