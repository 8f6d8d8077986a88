import { productRepository } from '../repositories/productRepository';
import { logger, type AppLogger } from '../infrastructure/logger';
import { parseCatalogCsv, transformCatalog, type CatalogCsvError, type CatalogQualityReport } from './catalog';

export class CatalogImportError extends Error {
  readonly statusCode = 400;
  readonly code = 'CATALOG_IMPORT_EMPTY';
  readonly rowErrors: CatalogCsvError[];

  constructor(message: string, rowErrors: CatalogCsvError[]) {
    super(message);
    this.name = 'CatalogImportError';
    this.rowErrors = rowErrors;
  }
}

export type CatalogImportResult = {
  source: string;
  importedAt: string; // ISO
  inserted: number;
  csvErrors: CatalogCsvError[];
  report: CatalogQualityReport;
};

// Report of the most recent import in this process, served by GET /catalog/quality.
let lastImport: CatalogImportResult | null = null;

export const catalogImportService = {
  /**
   * Parse a catalog CSV, normalize pack sizes, derive pricing and replace the stored catalog.
   * Rows that fail CSV validation are reported and skipped; rows with unparseable pack sizes
   * are stored and listed in the quality report.
   */
  async importCsv(text: string, source: string, log: AppLogger = logger): Promise<CatalogImportResult> {
    const startedAt = Date.now();
    const { rows, errors } = parseCatalogCsv(text);

    if (rows.length === 0) {
      log.warn({ event: 'catalog.import.empty', source, csvErrors: errors.length }, 'catalog.import.empty');
      throw new CatalogImportError('No valid catalog rows found in CSV', errors);
    }

    const { records, report } = transformCatalog(rows);
    const { inserted } = await productRepository.replaceAll(records);

    const result: CatalogImportResult = {
      source,
      importedAt: new Date().toISOString(),
      inserted,
      csvErrors: errors,
      report,
    };
    lastImport = result;

    log.info(
      {
        event: 'catalog.import.completed',
        source,
        inserted,
        csvErrors: errors.length,
        issues: report.issues.length,
        unitCounts: report.unitCounts,
        durationMs: Date.now() - startedAt,
      },
      'catalog.import.completed'
    );
    if (report.unitCounts.unparsed > 0 || report.unitCounts.unknown > 0) {
      log.warn(
        { event: 'catalog.import.needsReview', unparsed: report.unitCounts.unparsed, unknown: report.unitCounts.unknown },
        'catalog.import.needsReview'
      );
    }

    return result;
  },

  getLastImport(): CatalogImportResult | null {
    return lastImport;
  },
};
