import { FastifyInstance } from 'fastify';
import { catalogController } from '../controllers/catalogController';
import { CatalogImportResponse, ErrorResponse } from '../dtos/catalogDtos';

// No request schemas here (multipart body), so the plain instance is enough; the zod
// serializer compiler set in buildApp still applies to the response schemas.
export default async function catalogRoutes(app: FastifyInstance) {
  app.post(
    '/import',
    {
      schema: {
        tags: ['Catalog'],
        summary: 'Import a catalog CSV (multipart field "file") and replace the stored products',
        response: {
          200: CatalogImportResponse,
          400: ErrorResponse,
        },
      },
    },
    catalogController.importCatalog
  );

  app.get(
    '/quality',
    {
      schema: {
        tags: ['Catalog'],
        summary: 'Data-quality report of the most recent import',
        response: {
          200: CatalogImportResponse,
          404: ErrorResponse,
        },
      },
    },
    catalogController.getQualityReport
  );
}
