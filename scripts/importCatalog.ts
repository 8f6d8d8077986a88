import { readFile } from 'fs/promises';
import path from 'path';
import db from '../src/infrastructure/db';
import { logger } from '../src/infrastructure/logger';
import { productRepository } from '../src/repositories/productRepository';
import { catalogImportService } from '../src/services/catalogImportService';

// Usage: npm run import:catalog -- ./data/sample-catalog.csv
async function main() {
  const file = process.argv[2] || process.env.CATALOG_CSV;
  if (!file) throw new Error('Usage: importCatalog <path/to/catalog.csv> (or set CATALOG_CSV)');

  const text = await readFile(file, 'utf8');
  await productRepository.ensureSchema();
  const result = await catalogImportService.importCsv(text, path.basename(file), logger);

  // Stable JSON so the report can be diffed between imports or fed to a review sheet.
  console.log(JSON.stringify(result, null, 2));
}

main()
  .catch((e) => {
    console.error(e);
    process.exitCode = 1;
  })
  .finally(async () => {
    await db.close();
  });
