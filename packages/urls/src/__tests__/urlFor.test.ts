import { describe, it, expect, vi } from 'vitest';
import request from 'supertest';
import { AppError, Blueprint, StaticEntryPointSource, appServerOf, createAppServer } from '@crossurls/app-server';
import { urlFor } from '../urlFor.js';
import { createMockLogger } from './helpers.js';

function createFakeBuilder() {
  return {
    build: vi.fn((endpoint: string, values: Record<string, unknown>, method?: string) =>
      `fake://${endpoint}/${Object.keys(values).join(',')}/${method ?? 'any'}`),
  };
}

describe('urlFor', () => {
  it('delegates to whichever builder the application was created with', async () => {
    const builder = createFakeBuilder();
    const server = await createAppServer({
      name: 'main',
      logger: createMockLogger(),
      entryPoints: new StaticEntryPointSource({}),
      urlsBuilderFactory: () => builder,
    });

    expect(urlFor(server, 'records.detail', { id: 'abc123' })).toBe('fake://records.detail/id/any');
    expect(builder.build).toHaveBeenCalledWith('records.detail', { id: 'abc123' }, undefined);
  });

  it('forwards the method hint', async () => {
    const builder = createFakeBuilder();
    const server = await createAppServer({
      name: 'main',
      logger: createMockLogger(),
      entryPoints: new StaticEntryPointSource({}),
      urlsBuilderFactory: () => builder,
    });

    expect(urlFor(server, 'records.create', {}, { method: 'POST' })).toBe('fake://records.create//POST');
  });

  it('resolves the application of the current request', async () => {
    const records = new Blueprint('records').get('/records/:id', 'detail', (req, res) => {
      res.send(urlFor(appServerOf(req), 'records.detail', { id: req.params.id }));
    });
    const server = await createAppServer({
      name: 'main',
      logger: createMockLogger(),
      entryPoints: new StaticEntryPointSource({}),
      blueprints: [records],
      urlsBuilderFactory: createFakeBuilder,
    });

    const res = await request(server.app).get('/records/7');

    expect(res.text).toBe('fake://records.detail/id/any');
  });

  it('throws when the application has no builder', async () => {
    const server = await createAppServer({
      name: 'main',
      logger: createMockLogger(),
      entryPoints: new StaticEntryPointSource({}),
    });

    expect(() => urlFor(server, 'records.detail', { id: '1' })).toThrow(AppError);
    expect(() => urlFor(server, 'records.detail', { id: '1' })).toThrow("Application 'main' has no URL builder");
  });
});
