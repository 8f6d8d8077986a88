import { describe, it, expect, vi, beforeEach } from 'vitest';

const { mockReplaceAll } = vi.hoisted(() => ({ mockReplaceAll: vi.fn() }));

vi.mock('../../../src/repositories/productRepository', () => ({
  productRepository: { replaceAll: mockReplaceAll },
}));

import { CatalogImportError, catalogImportService } from '../../../src/services/catalogImportService';

const silentLogger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };

describe('catalogImportService.importCsv', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockReplaceAll.mockImplementation(async (records: unknown[]) => ({ inserted: records.length }));
  });

  it('transforms parsed rows, replaces the catalog and remembers the report', async () => {
    const csv = [
      'category,product_name,price,packsize,rating,original_price',
      'Staples,Toor Dal,140,600-800 g,4.1,160',
      'Snacks,Mystery Box,60,12345,,',
      'Snacks,,5,10 g,,',
    ].join('\n');

    const result = await catalogImportService.importCsv(csv, 'catalog.csv', silentLogger);

    expect(mockReplaceAll).toHaveBeenCalledTimes(1);
    const stored = mockReplaceAll.mock.calls[0][0];
    expect(stored).toHaveLength(2);
    expect(stored[0]).toMatchObject({ productName: 'Toor Dal', quantity: 700, unit: 'g', pricePer100g: 20 });

    expect(result.source).toBe('catalog.csv');
    expect(result.inserted).toBe(2);
    expect(result.csvErrors).toEqual([{ row: 3, message: 'product_name: product name is required' }]);
    expect(result.report.unitCounts.unknown).toBe(1);
    expect(catalogImportService.getLastImport()).toBe(result);

    expect(silentLogger.info).toHaveBeenCalledWith(
      expect.objectContaining({ event: 'catalog.import.completed', inserted: 2, issues: 1 }),
      'catalog.import.completed'
    );
    expect(silentLogger.warn).toHaveBeenCalledWith(
      { event: 'catalog.import.needsReview', unparsed: 0, unknown: 1 },
      'catalog.import.needsReview'
    );
  });

  it('rejects a CSV without any valid row and keeps the store untouched', async () => {
    const csv = ['category,product_name,price', 'Snacks,,5'].join('\n');

    const err = await catalogImportService.importCsv(csv, 'bad.csv', silentLogger).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CatalogImportError);
    if (!(err instanceof CatalogImportError)) return;
    expect(err.statusCode).toBe(400);
    expect(err.rowErrors).toEqual([{ row: 1, message: 'product_name: product name is required' }]);
    expect(mockReplaceAll).not.toHaveBeenCalled();
  });
});
