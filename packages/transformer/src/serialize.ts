/**
 * TargetDocument → XML text
 *
 * Builds an ordered node tree for fast-xml-parser's XMLBuilder so element
 * order is exactly the order written here. Extension sections redeclare the
 * default namespace locally.
 */

import { XMLBuilder } from 'fast-xml-parser';
import type {
  TargetAddress,
  TargetCurrency,
  TargetDocument,
  TargetInvoiceLine,
  TargetTaxSubTotal,
} from '@invoice-bridge/contracts';
import { EXTENSION_NAMESPACE, INVOICE_NAMESPACE } from './constants.js';

type XmlAttributes = Record<string, string>;

interface TextNode {
  '#text': string;
}

interface ElementNode {
  [tag: string]: OrderedNode[] | XmlAttributes;
}

type OrderedNode = TextNode | ElementNode;

const ATTRIBUTE_PREFIX = '@_';

const builder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  format: true,
  indentBy: '  ',
  suppressEmptyNode: false,
});

/**
 * Element with text content or child elements. Empty text writes `<Tag></Tag>`.
 */
function el(tag: string, content: string | OrderedNode[], attributes?: XmlAttributes): ElementNode {
  const children: OrderedNode[] =
    typeof content === 'string' ? (content.length > 0 ? [{ '#text': content }] : []) : content;

  const node: ElementNode = { [tag]: children };
  if (attributes) {
    const prefixed: XmlAttributes = {};
    for (const [name, value] of Object.entries(attributes)) {
      prefixed[`${ATTRIBUTE_PREFIX}${name}`] = value;
    }
    node[':@'] = prefixed;
  }
  return node;
}

function currencyNode(currency: TargetCurrency): ElementNode {
  return el('Currency', currency.name, { Code: currency.code });
}

function addressNode(address: TargetAddress): ElementNode {
  const children = address.addressLines.map((line) => el('AddressLine', line));
  if (address.postCode !== undefined) {
    children.push(el('PostCode', address.postCode));
  }
  return el('Address', children);
}

function invoiceLineNode(line: TargetInvoiceLine): ElementNode {
  const { additionalReference } = line;
  return el('InvoiceLine', [
    el('LineNumber', line.lineNumber),
    el('InvoiceLineReferences', [
      el('OrderLineNumber', line.orderLineNumber),
      el('BuyersOrderLineReference', line.buyersOrderLineReference),
    ]),
    el(
      'AdditionalInvoiceLineReferences',
      [
        el('InvoiceLineReference', [el('Reference', additionalReference.reference)], {
          ReferenceType: additionalReference.referenceType,
          ReferenceDesc: additionalReference.referenceDesc,
        }),
      ],
      { xmlns: EXTENSION_NAMESPACE },
    ),
    el('Product', [
      el('SuppliersProductCode', line.suppliersProductCode),
      el('Description', line.description),
    ]),
    el('Quantity', [el('Packsize', line.packSize), el('Amount', line.quantity)]),
    el('Price', [el('UnitPrice', line.unitPrice)]),
    el('LineTax', [el('TaxRate', line.taxRate, { Code: line.taxRateCode })]),
    el('LineTotal', line.lineTotal),
  ]);
}

function taxSubTotalNode(subTotal: TargetTaxSubTotal): ElementNode {
  return el('TaxSubTotal', [
    el('TaxRate', subTotal.taxRate, { Code: subTotal.taxRateCode }),
    el('NumberOfLinesAtRate', subTotal.numberOfLinesAtRate),
    el('TotalValueAtRate', subTotal.totalValueAtRate),
    el('TaxableValueAtRate', subTotal.taxableValueAtRate),
    el('TaxAtRate', subTotal.taxAtRate),
    el('NetPaymentAtRate', subTotal.netPaymentAtRate),
    el('GrossPaymentAtRate', subTotal.grossPaymentAtRate),
    el('TaxCurrency', [currencyNode(subTotal.currency)]),
  ]);
}

function invoiceNode(doc: TargetDocument): ElementNode {
  const { head, references, supplier, buyer, settlement, total } = doc;

  return el(
    'Invoice',
    [
      el('InvoiceHead', [
        el('Schema', [el('Version', head.schemaVersion)]),
        el('Parameters', [
          el('Language', head.language),
          el('DecimalSeparator', head.decimalSeparator),
          el('Precision', head.precision),
        ]),
        el('InvoiceType', head.invoiceTypeDescription, { Code: head.invoiceTypeCode }),
        el('InvoiceCurrency', [currencyNode(head.currency)]),
        el('Checksum', head.checksum),
      ]),
      el('InvoiceReferences', [
        el('BuyersOrderNumber', references.buyersOrderNumber),
        el('SuppliersInvoiceNumber', references.suppliersInvoiceNumber),
        el('DeliveryNoteNumber', references.deliveryNoteNumber),
      ]),
      el(
        'AdditionalInvoiceReferences',
        doc.additionalReferences.map((ref) =>
          el('InvoiceReference', [el('Reference', ref.reference)], { ReferenceType: ref.referenceType }),
        ),
        { xmlns: EXTENSION_NAMESPACE },
      ),
      el(
        'AdditionalInvoiceDates',
        doc.additionalDates.map((date) =>
          el('InvoiceDateTime', date.value, {
            DateTimeType: date.dateTimeType,
            DateTimeDesc: date.dateTimeDesc,
          }),
        ),
        { xmlns: EXTENSION_NAMESPACE },
      ),
      el('InvoiceDate', doc.invoiceDate),
      el('Supplier', [
        el('SupplierReferences', [el('TaxNumber', supplier.taxNumber), el('GLN', supplier.gln)]),
        el('Party', supplier.party),
        addressNode(supplier.address),
      ]),
      el('Buyer', [
        el('BuyerReferences', [el('SuppliersCodeForBuyer', buyer.suppliersCodeForBuyer)]),
        el('Party', buyer.party),
        addressNode(buyer.address),
      ]),
      el('InvoiceTo', [el('Party', doc.invoiceTo.party)]),
      ...doc.lines.map(invoiceLineNode),
      el('Settlement', [
        el('SettlementTerms', [el('DaysFromInvoice', settlement.daysFromInvoice)]),
        el('SettlementDiscount', [
          el('PercentDiscount', [el('Percentage', settlement.percentDiscount)]),
          el('AmountDiscount', [el('Amount', settlement.amountDiscount)]),
        ]),
      ]),
      ...doc.taxSubTotals.map(taxSubTotalNode),
      el('InvoiceTotal', [
        el('NumberOfLines', total.numberOfLines),
        el('NumberOfTaxRates', total.numberOfTaxRates),
        el('LineValueTotal', total.lineValueTotal),
        el('TaxableTotal', total.taxableTotal),
        el('TaxTotal', total.taxTotal),
        el('NetPaymentTotal', total.netPaymentTotal),
        el('GrossPaymentTotal', total.grossPaymentTotal),
      ]),
    ],
    { xmlns: INVOICE_NAMESPACE },
  );
}

/**
 * Serialize the document as UTF-8 XML text with an XML declaration and
 * two-space indentation.
 */
export function serializeTargetDocument(doc: TargetDocument): string {
  const declaration: ElementNode = {
    '?xml': [{ '#text': '' }],
    ':@': { [`${ATTRIBUTE_PREFIX}version`]: '1.0', [`${ATTRIBUTE_PREFIX}encoding`]: 'utf-8' },
  };

  const xml: string = builder.build([declaration, invoiceNode(doc)]);
  return `${xml.trimStart()}\n`;
}
