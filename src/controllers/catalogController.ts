import { FastifyReply, FastifyRequest } from 'fastify';
import { catalogImportService } from '../services/catalogImportService';

export const catalogController = {
  async importCatalog(request: FastifyRequest, reply: FastifyReply) {
    const file = await request.file();
    if (!file || file.fieldname !== 'file') {
      file?.file.resume();
      return reply.status(400).send({
        error: { code: 'FILE_REQUIRED', message: 'Upload the catalog CSV in the "file" field' },
      });
    }

    // Throws a 413 (FST_REQ_FILE_TOO_LARGE) past the multipart fileSize limit.
    const buffer = await file.toBuffer();
    const result = await catalogImportService.importCsv(buffer.toString('utf8'), file.filename || 'upload.csv', request.log);
    return reply.send(result);
  },

  async getQualityReport(_request: FastifyRequest, reply: FastifyReply) {
    const lastImport = catalogImportService.getLastImport();
    if (!lastImport) {
      return reply.status(404).send({
        error: { code: 'NO_IMPORT', message: 'No catalog has been imported since the server started' },
      });
    }
    return reply.send(lastImport);
  },
};
