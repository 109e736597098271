import { describe, it, expect, beforeEach } from 'vitest';
import { isOk, type CommercialData } from '@medstock/types';
import { createOrderNeedsService, type OrderNeedsService } from '../order-needs/order-needs-service.js';
import { collectCodes, synthesizeOrderRows } from '../order-needs/row-synthesizer.js';
import { horizonEndDate, normalizeHorizonMonths } from '../order-needs/horizon.js';
import {
  InMemoryOrderSourceRepository,
  makeOrderRow,
  TestItemClassifier,
} from './inventory-fixtures.js';

const DESCRIPTIONS: Record<string, string> = {
  ABCDTABL1: 'Paracetamol 500 mg tablets',
  ABCDSYRP1: 'Amoxicillin oral suspension',
  KMEDKIT1: 'Kit, medical emergency',
  KMEDMOD1: 'Module, dressing',
};

const TABLETS: CommercialData = {
  packSize: 3,
  pricePerPack: 1.25,
  weightPerPack: 0.2,
  volumePerPackDm3: 0.5,
  accountCode: 'ACC-100',
};

const NO_QUANTITIES = {
  standardQuantities: new Map<string, number>(),
  currentStock: new Map<string, number>(),
  expiringQuantities: new Map<string, number>(),
  loanBalances: new Map<string, number>(),
};

// =============================================================================
// ROW SYNTHESIZER
// =============================================================================

describe('row synthesizer', () => {
  it('collects the sorted union of codes across sources', () => {
    const codes = collectCodes({
      ...NO_QUANTITIES,
      standardQuantities: new Map([
        ['B2', 1],
        ['A1', 1],
      ]),
      loanBalances: new Map([
        ['C3', 2],
        ['A1', 4],
      ]),
    });

    expect(codes).toEqual(['A1', 'B2', 'C3']);
  });

  it('fills rows from every source and defaults missing commercial data', async () => {
    const classifier = new TestItemClassifier(DESCRIPTIONS);
    const rows = await synthesizeOrderRows(
      {
        standardQuantities: new Map([['ABCDTABL1', 10]]),
        currentStock: new Map([
          ['ABCDTABL1', 4],
          ['ABCDSYRP1', 2],
        ]),
        expiringQuantities: new Map([['ABCDTABL1', 1]]),
        loanBalances: new Map([['ABCDSYRP1', -1]]),
        commercialData: new Map([['ABCDTABL1', TABLETS]]),
      },
      classifier
    );

    expect(rows.map((row) => row.code)).toEqual(['ABCDSYRP1', 'ABCDTABL1']);

    const [syrup, tablets] = rows;
    expect(syrup).toMatchObject({
      description: 'Amoxicillin oral suspension',
      type: 'Item',
      standardQty: 0,
      currentStock: 2,
      loanBalance: -1,
      packSize: 0,
      accountCode: '',
      qtyNeeded: 0,
    });
    expect(tablets).toMatchObject({
      standardQty: 10,
      currentStock: 4,
      qtyExpiring: 1,
      qtyNeeded: 7,
      qtyToOrderRounded: 9,
      amount: 3.75,
      accountCode: 'ACC-100',
      remarks: '',
      qtyToOrderOverride: null,
    });
    expect(classifier.prefetched).toEqual([['ABCDSYRP1', 'ABCDTABL1']]);
  });

  it('applies the type filter after classification', async () => {
    const sources = {
      ...NO_QUANTITIES,
      standardQuantities: new Map([
        ['KMEDKIT1', 1],
        ['KMEDMOD1', 1],
        ['ABCDTABL1', 1],
      ]),
      commercialData: new Map<string, CommercialData>(),
    };
    const classifier = new TestItemClassifier(DESCRIPTIONS);

    const kits = await synthesizeOrderRows(sources, classifier, { type: 'kit' });
    const all = await synthesizeOrderRows(sources, classifier, { type: 'All' });

    expect(kits.map((row) => row.code)).toEqual(['KMEDKIT1']);
    expect(all.map((row) => [row.code, row.type])).toEqual([
      ['ABCDTABL1', 'Item'],
      ['KMEDKIT1', 'Kit'],
      ['KMEDMOD1', 'Module'],
    ]);
  });

  it('item search keeps matching items only', async () => {
    const sources = {
      ...NO_QUANTITIES,
      currentStock: new Map([
        ['KMEDKIT1', 1],
        ['ABCDTABL1', 1],
        ['ABCDSYRP1', 1],
      ]),
      commercialData: new Map<string, CommercialData>(),
    };

    const byDescription = await synthesizeOrderRows(sources, new TestItemClassifier(DESCRIPTIONS), {
      itemSearch: 'PARACET',
    });
    const kitTerm = await synthesizeOrderRows(sources, new TestItemClassifier(DESCRIPTIONS), {
      itemSearch: 'kit',
    });

    expect(byDescription.map((row) => row.code)).toEqual(['ABCDTABL1']);
    expect(kitTerm).toEqual([]);
  });
});

// =============================================================================
// ORDER NEEDS SERVICE
// =============================================================================

describe('OrderNeedsService', () => {
  let repository: InMemoryOrderSourceRepository;
  let classifier: TestItemClassifier;
  let service: OrderNeedsService;

  beforeEach(() => {
    repository = new InMemoryOrderSourceRepository();
    classifier = new TestItemClassifier(DESCRIPTIONS);
    service = createOrderNeedsService(
      { repository, classifier },
      { now: () => new Date(2024, 0, 31, 15, 30) }
    );
  });

  describe('fetchOrderRows', () => {
    it('computes the pack-rounded order for a simple shortfall', async () => {
      repository.standardQuantities.set('ABCDTABL1', 10);
      repository.currentStock.set('ABCDTABL1', 4);
      repository.commercialData.set('ABCDTABL1', TABLETS);

      const rows = await service.fetchOrderRows();

      expect(rows).toHaveLength(1);
      expect(rows[0]?.qtyNeeded).toBe(6);
      expect(rows[0]?.qtyToOrderRounded).toBe(6);
    });

    it('treats "All" and blank filters as unscoped', async () => {
      await service.fetchOrderRows({ kit: 'All', module: '  ' });

      expect(repository.callsTo('fetchStandardQuantities')[0]?.scope).toEqual({
        kit: null,
        module: null,
      });
    });

    it('passes trimmed kit and module filters to every source', async () => {
      await service.fetchOrderRows({ kit: ' KIT01 ', module: 'MOD02', leadMonths: 1 });

      for (const method of [
        'fetchStandardQuantities',
        'fetchCurrentStock',
        'fetchExpiringQuantities',
        'fetchLoanBalances',
      ] as const) {
        expect(repository.callsTo(method)[0]?.scope).toEqual({ kit: 'KIT01', module: 'MOD02' });
      }
    });

    it('skips the expiry read when the horizon is zero months', async () => {
      repository.expiringQuantities.set('ABCDTABL1', 5);

      const rows = await service.fetchOrderRows({ leadMonths: 0, coverMonths: '', bufferMonths: 'x' });

      expect(repository.callsTo('fetchExpiringQuantities')).toHaveLength(0);
      expect(rows).toEqual([]);
    });

    it('reads expiry up to today plus the total horizon', async () => {
      repository.expiringQuantities.set('ABCDTABL1', 5);

      const rows = await service.fetchOrderRows({ leadMonths: 1, coverMonths: '1', bufferMonths: 1 });

      expect(repository.callsTo('fetchExpiringQuantities')[0]?.horizonEnd).toBe('2024-04-30');
      expect(rows[0]?.qtyExpiring).toBe(5);
      expect(rows[0]?.qtyNeeded).toBe(5);
    });

    it('counts a failing source as empty and still builds rows', async () => {
      repository.standardQuantities.set('ABCDTABL1', 10);
      repository.currentStock.set('ABCDTABL1', 4);
      repository.failing.add('fetchCurrentStock');

      const rows = await service.fetchOrderRows();

      expect(rows).toHaveLength(1);
      expect(rows[0]?.currentStock).toBe(0);
      expect(rows[0]?.qtyNeeded).toBe(10);
    });

    it('falls back to catalog defaults when commercial data fails', async () => {
      repository.standardQuantities.set('ABCDTABL1', 10);
      repository.commercialData.set('ABCDTABL1', TABLETS);
      repository.failing.add('fetchCommercialData');

      const rows = await service.fetchOrderRows();

      expect(rows[0]?.packSize).toBe(0);
      expect(rows[0]?.qtyToOrderRounded).toBe(10);
    });

    it('asks for commercial data of every code in order', async () => {
      repository.standardQuantities.set('ABCDTABL1', 1);
      repository.loanBalances.set('ABCDSYRP1', 1);

      await service.fetchOrderRows();

      expect(repository.callsTo('fetchCommercialData')[0]?.codes).toEqual(['ABCDSYRP1', 'ABCDTABL1']);
    });

    it('does not query the catalog when there are no codes', async () => {
      const rows = await service.fetchOrderRows();

      expect(rows).toEqual([]);
      expect(repository.callsTo('fetchCommercialData')).toHaveLength(0);
    });
  });

  describe('row operations', () => {
    it('applies an edit through the editor', () => {
      const row = makeOrderRow({ standardQty: 10, currentStock: 4 });

      const result = service.applyEdit(row, 'backOrders', '6');

      expect(isOk(result) && result.value.qtyNeeded).toBe(0);
    });

    it('recomputes and summarizes', () => {
      const row = service.recompute({ ...makeOrderRow(), standardQty: 2, packSize: 1, pricePerPack: 3 });

      expect(row.amount).toBe(6);
      expect(service.summarize([row]).totalAmount).toBe(6);
    });
  });

  describe('settings', () => {
    it('clamps the stored horizon', async () => {
      repository.projectHorizon = { leadMonths: 30, coverMonths: 2, bufferMonths: -1 };

      await expect(service.loadDefaultHorizon()).resolves.toEqual({
        leadMonths: 24,
        coverMonths: 2,
        bufferMonths: 0,
      });
    });

    it('uses zero months when the settings cannot be read', async () => {
      repository.failing.add('fetchProjectHorizon');

      await expect(service.loadDefaultHorizon()).resolves.toEqual({
        leadMonths: 0,
        coverMonths: 0,
        bufferMonths: 0,
      });
    });

    it('returns filter options, or empty lists on failure', async () => {
      repository.filterOptions = { kits: ['KIT01'], modules: ['MOD02'] };
      await expect(service.getFilterOptions()).resolves.toEqual({ kits: ['KIT01'], modules: ['MOD02'] });

      repository.failing.add('fetchFilterOptions');
      await expect(service.getFilterOptions()).resolves.toEqual({ kits: [], modules: [] });
    });
  });
});

// =============================================================================
// HORIZON
// =============================================================================

describe('horizon', () => {
  it.each([
    ['6', 6],
    [' 12 ', 12],
    ['30', 24],
    ['-2', 0],
    ['abc', 0],
    ['', 0],
    ['1.5', 0],
    [7.9, 7],
    [-4, 0],
    [99, 24],
    [Number.NaN, 0],
    [null, 0],
    [undefined, 0],
  ])('normalizes %j to %d', (input, expected) => {
    expect(normalizeHorizonMonths(input)).toBe(expected);
  });

  it('clamps the horizon end to the last day of the month', () => {
    const today = new Date(2024, 0, 31);

    expect(horizonEndDate(today, { leadMonths: 1, coverMonths: 0, bufferMonths: 0 })).toBe('2024-02-29');
    expect(horizonEndDate(today, { leadMonths: 0, coverMonths: 0, bufferMonths: 0 })).toBe('2024-01-31');
    expect(horizonEndDate(today, { leadMonths: 6, coverMonths: 6, bufferMonths: 1 })).toBe('2025-02-28');
  });
});
