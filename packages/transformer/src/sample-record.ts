import type { InvoiceRecord, LineItem } from '@invoice-bridge/contracts';

/**
 * Small, fully-populated record used by the transformer tests
 */
export function sampleRecord(): InvoiceRecord {
  return {
    company: {
      name: 'Example Supplies Ltd',
      vatRegistrationNumber: 'GB000000000',
      registrationNumber: '00000001',
      address: {
        lines: ['1 Test Street'],
        postCode: 'TS1 1AA',
        countryCode: 'GB',
        country: 'United Kingdom',
        contactName: '',
      },
    },
    invoice: {
      invoiceNumber: '10045',
      customerOrderNumber: 'PO-7781',
      yourReference: 'REF-1',
      despatchNumber: 'D-500',
      salesOrderNumber: 'SO-100',
      invoiceDate: '2024-01-15',
      orderDate: '2024-01-10',
      despatchDate: '2024-01-16',
    },
    customer: {
      account: 'CUST01',
      name: 'Sample Buyer Ltd',
      invoiceToName: 'Sample Buyer Accounts',
      deliverTo: { lines: ['Unit 4'], postCode: 'DK2 2BB', countryCode: '', country: '', contactName: 'Goods In' },
      invoiceTo: { lines: ['PO Box 9'], postCode: '', countryCode: '', country: '', contactName: '' },
    },
    currency: { code: 'GBP', name: 'Sterling' },
    paymentTerms: { paymentDays: 30, earlyPaymentDiscountPercent: '2.5' },
    totals: { net: '100.00', vat: '20.00', gross: '120.00' },
    lineItems: [sampleLine()],
    vatGroups: [{ code: 'ASTD', description: 'Standard', rate: '20', taxableValue: '100.00', taxValue: '20.00' }],
    processingDate: '2024-03-01',
  };
}

export function sampleLine(overrides: Partial<LineItem> = {}): LineItem {
  return {
    itemNumber: '1',
    productCode: 'WID-1',
    description: 'Widget',
    quantity: '4',
    unitOfMeasure: 'EACH',
    unitPrice: '25',
    lineTotal: '100.00',
    vatCode: 'ASTD',
    vatRate: '20',
    vatValue: '20.00',
    isCharge: false,
    ...overrides,
  };
}
