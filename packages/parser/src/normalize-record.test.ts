import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { fixedClock } from '@invoice-bridge/shared';
import { readSourceDocument } from './read-source.js';
import { normalizeInvoiceRecord, currencyName, digitsOnly } from './normalize-record.js';

const fixture = (name: string): string =>
  readFileSync(fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url)), 'utf8');

const PROCESSING_DATE = '2024-03-01';

function normalize(xml: string) {
  return normalizeInvoiceRecord(readSourceDocument(xml).root, { processingDate: PROCESSING_DATE });
}

describe('normalizeInvoiceRecord', () => {
  describe('full document', () => {
    const record = normalize(fixture('full-invoice.xml'));

    it('should map company details', () => {
      expect(record.company).toEqual({
        name: 'Example Supplies Ltd',
        vatRegistrationNumber: 'GB000000000',
        registrationNumber: '00000001',
        address: {
          lines: ['1 Test Street', 'Testville'],
          postCode: 'TS1 1AA',
          countryCode: 'GB',
          country: 'United Kingdom',
          contactName: '',
        },
      });
    });

    it('should map invoice identifiers and dates', () => {
      expect(record.invoice).toEqual({
        invoiceNumber: '10045',
        customerOrderNumber: 'PO-7781',
        yourReference: 'REF-1',
        despatchNumber: 'D-500',
        salesOrderNumber: 'SO-101',
        invoiceDate: '2024-01-15',
        orderDate: '2024-01-12',
        despatchDate: '2024-01-16',
      });
    });

    it('should map customer, deliver-to and invoice-to', () => {
      expect(record.customer.account).toBe('CUST01');
      expect(record.customer.name).toBe('Sample Buyer Ltd');
      expect(record.customer.invoiceToName).toBe('Sample Buyer Accounts');
      expect(record.customer.deliverTo).toEqual({
        lines: ['Unit 4', 'Dock Road'],
        postCode: 'DK2 2BB',
        countryCode: '',
        country: '',
        contactName: 'Goods In',
      });
      expect(record.customer.invoiceTo.lines).toEqual(['PO Box 9', 'Ledger Lane']);
      expect(record.customer.invoiceTo.postCode).toBe('LL3 3CC');
    });

    it('should map currency, payment terms and totals', () => {
      expect(record.currency).toEqual({ code: 'EUR', name: 'Euro' });
      expect(record.paymentTerms).toEqual({ paymentDays: 45, earlyPaymentDiscountPercent: '2.5' });
      expect(record.totals).toEqual({ net: '1150.00', vat: '130.00', gross: '1280.00' });
    });

    it('should list items of every despatch followed by that despatch charges', () => {
      expect(record.lineItems.map((l) => [l.itemNumber, l.productCode, l.isCharge])).toEqual([
        ['1', 'WID-1', false],
        ['2', 'GAD-2', false],
        ['C1', 'CARR', true],
        ['1', 'BOLT-9', false],
        ['C2', 'CHARGE', true],
      ]);
    });

    it('should map item fields and defaults', () => {
      expect(record.lineItems[0]).toEqual({
        itemNumber: '1',
        productCode: 'WID-1',
        description: 'Widget',
        quantity: '10',
        unitOfMeasure: 'BOX',
        unitPrice: '50.00',
        lineTotal: '500.00',
        vatCode: 'ASTD',
        vatRate: '20',
        vatValue: '100.00',
        isCharge: false,
      });
      expect(record.lineItems[1]?.unitOfMeasure).toBe('EACH');
    });

    it('should fold charges in as single-quantity lines', () => {
      expect(record.lineItems[4]).toEqual({
        itemNumber: 'C2',
        productCode: 'CHARGE',
        description: 'Charge',
        quantity: '1',
        unitOfMeasure: 'EACH',
        unitPrice: '25.00',
        lineTotal: '25.00',
        vatCode: 'ASTD',
        vatRate: '20',
        vatValue: '5.00',
        isCharge: true,
      });
    });

    it('should keep VAT groups in source order', () => {
      expect(record.vatGroups).toEqual([
        { code: 'ASTD', description: 'Standard', rate: '20', taxableValue: '650.00', taxValue: '130.00' },
        { code: 'AZERO', description: 'Zero', rate: '0', taxableValue: '500.00', taxValue: '0.00' },
      ]);
    });

    it('should record the processing date', () => {
      expect(record.processingDate).toBe(PROCESSING_DATE);
    });
  });

  describe('sparse document', () => {
    const record = normalize(fixture('minimal-invoice.xml'));

    it('should default everything that is missing', () => {
      expect(record.invoice.invoiceNumber).toBe('77');
      expect(record.invoice.invoiceDate).toBe(PROCESSING_DATE);
      expect(record.invoice.orderDate).toBe('');
      expect(record.invoice.despatchDate).toBe('');
      expect(record.company.name).toBe('');
      expect(record.customer.invoiceToName).toBe('');
      expect(record.currency).toEqual({ code: 'GBP', name: 'Sterling' });
      expect(record.paymentTerms).toEqual({ paymentDays: 30, earlyPaymentDiscountPercent: '0' });
      expect(record.totals).toEqual({ net: '0', vat: '0', gross: '0' });
    });

    it('should produce no lines and no VAT groups without a despatch section', () => {
      expect(record.lineItems).toEqual([]);
      expect(record.vatGroups).toEqual([]);
    });
  });

  it('should fall back to the processing date for unparsable dates', () => {
    const record = normalize(`
      <SalesInvoicePrint>
        <Invoice Number="1">
          <Dates>
            <InvoiceDate Date="2024-01-15"/>
            <PaymentDueDate Date="14/02/2024"/>
          </Dates>
        </Invoice>
        <Despatches>
          <Despatch>
            <DespatchDetails DespatchNumber="9">
              <Dates><DespatchDate Date="31/02/2024"/></Dates>
            </DespatchDetails>
          </Despatch>
        </Despatches>
      </SalesInvoicePrint>`);

    expect(record.invoice.invoiceDate).toBe(PROCESSING_DATE);
    expect(record.invoice.despatchDate).toBe(PROCESSING_DATE);
    expect(record.paymentTerms.paymentDays).toBe(30);
  });

  it('should take the processing date from the clock when none is given', () => {
    const { root } = readSourceDocument(fixture('minimal-invoice.xml'));
    const record = normalizeInvoiceRecord(root, { clock: fixedClock(new Date(2025, 5, 30, 23, 59, 0)) });
    expect(record.processingDate).toBe('2025-06-30');
    expect(record.invoice.invoiceDate).toBe('2025-06-30');
  });

  it('should use the customer name when the invoice-to party has no name', () => {
    const record = normalize(`
      <SalesInvoicePrint>
        <Invoice>
          <CustomerDetails>
            <Customer Account="C9" Name="Fallback Buyer"/>
            <InvoiceTo><Address Line1="Somewhere"/></InvoiceTo>
          </CustomerDetails>
        </Invoice>
      </SalesInvoicePrint>`);

    expect(record.customer.invoiceToName).toBe('Fallback Buyer');
    expect(record.customer.invoiceTo.lines).toEqual(['Somewhere']);
  });

  it('should treat unparsable amounts as zero and drop non-positive charges', () => {
    const record = normalize(`
      <SalesInvoicePrint>
        <Invoice><PricingDetails><Value DocumentValue="n/a"/></PricingDetails></Invoice>
        <Despatches>
          <Despatch>
            <Charges>
              <Charge><ChargeValue DocumentValue="-4.00"/></Charge>
              <Charge><ChargeValue DocumentValue="abc"/></Charge>
              <Charge><ChargeValue DocumentValue="3.5"/></Charge>
            </Charges>
          </Despatch>
        </Despatches>
      </SalesInvoicePrint>`);

    expect(record.totals.net).toBe('0');
    expect(record.lineItems).toHaveLength(1);
    expect(record.lineItems[0]?.itemNumber).toBe('C1');
    expect(record.lineItems[0]?.unitPrice).toBe('3.5');
  });

  it('should keep gross equal to net plus VAT', () => {
    const record = normalize(`
      <SalesInvoicePrint>
        <Invoice>
          <PricingDetails>
            <Value DocumentValue="99.995"/>
            <VAT><Value DocumentValue="20"/></VAT>
          </PricingDetails>
        </Invoice>
      </SalesInvoicePrint>`);

    expect(record.totals.gross).toBe('119.995');
  });
});

describe('currencyName', () => {
  it('should map known codes and pass through others', () => {
    expect(currencyName('GBP')).toBe('Sterling');
    expect(currencyName('USD')).toBe('US Dollar');
    expect(currencyName('CHF')).toBe('CHF');
    expect(currencyName('toString')).toBe('toString');
  });
});

describe('digitsOnly', () => {
  it('should strip everything but digits', () => {
    expect(digitsOnly('INV-10045')).toBe('10045');
    expect(digitsOnly('no digits')).toBe('');
  });
});
