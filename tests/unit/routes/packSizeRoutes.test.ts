import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { FastifyInstance } from 'fastify';
import { buildApp } from '../../../src/app';

describe('POST /pack-size/normalize', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = buildApp();
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it('normalizes each label and keeps unparseable ones as nulls', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/pack-size/normalize',
      payload: { labels: ['600-800 g', null, 'family pack', '1 l'] },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      results: [
        { label: '600-800 g', quantity: 700, unit: 'g', rule: 'gram' },
        { label: null, quantity: null, unit: null, rule: null },
        { label: 'family pack', quantity: null, unit: null, rule: null },
        { label: '1 l', quantity: 1000, unit: 'ml', rule: 'liter' },
      ],
    });
  });

  it('rejects an empty batch with a validation error', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/pack-size/normalize',
      payload: { labels: [] },
    });

    expect(res.statusCode).toBe(400);
    const { error } = res.json();
    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.message).toBe('Invalid request data');
    expect(error.details[0]).toMatchObject({ code: 'too_small', path: ['labels'] });
  });

  it('rejects labels that are not strings', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/pack-size/normalize',
      payload: { labels: [42] },
    });

    expect(res.statusCode).toBe(400);
    const { error } = res.json();
    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.details[0]).toMatchObject({ code: 'invalid_type', path: ['labels', 0] });
  });

  it('serves the health check', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });
    expect(res.json()).toEqual({ status: 'ok' });
  });
});
