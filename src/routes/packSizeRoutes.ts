import { FastifyInstance } from 'fastify';
import { ZodTypeProvider } from 'fastify-type-provider-zod';
import { NormalizePackSizeRequest, NormalizePackSizeResponse, type NormalizePackSizeResponseType } from '../dtos/packSizeDtos';
import { normalizePackSize } from '../services/packSize';

export default async function packSizeRoutes(fastify: FastifyInstance) {
  const app = fastify.withTypeProvider<ZodTypeProvider>();

  app.post(
    '/normalize',
    {
      schema: {
        tags: ['Pack size'],
        summary: 'Normalize free-text pack-size labels into quantity + unit',
        body: NormalizePackSizeRequest,
        response: {
          200: NormalizePackSizeResponse,
        },
      },
    },
    async (request): Promise<NormalizePackSizeResponseType> => {
      const results = request.body.labels.map((label) => {
        const size = normalizePackSize(label);
        return {
          label,
          quantity: size?.quantity ?? null,
          unit: size?.unit ?? null,
          rule: size?.rule ?? null,
        };
      });
      return { results };
    }
  );
}
