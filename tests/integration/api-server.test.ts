/**
 * Integration Tests - ApiServer
 *
 * Drives the express app in-process through supertest against a fake
 * registry holding versions 1, 3 and 4 (translator schema) and 2 (renamed input).
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import { ApiServer } from '../../src/server/api-server.js';
import { buildEndpoint } from '../../src/core/deployment-builder.js';
import type { EndpointDescriptor } from '../../src/types/endpoint.js';
import { createTranslatorRegistry, type FakeRegistry } from '../helpers/fake-registry.js';

describe('ApiServer', () => {
  let registry: FakeRegistry;
  let endpoint: EndpointDescriptor;
  let server: ApiServer;

  beforeEach(async () => {
    registry = createTranslatorRegistry();
    endpoint = await buildEndpoint(registry, { modelName: 'translator', defaultVersion: '1', capacity: 2 });
    server = new ApiServer(endpoint, { host: '127.0.0.1', port: 0 });
  });

  afterEach(async () => {
    await server.stop();
  });

  describe('POST /serve', () => {
    it('serves the default version when no version header is sent', async () => {
      const response = await request(server.getApp()).post('/serve').send({ prompt: 'hello' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        model: 'translator',
        version: '1',
        predictions: [{ translation_text: 'v1:hello' }],
      });
    });

    it('treats an empty version header as the default', async () => {
      const response = await request(server.getApp())
        .post('/serve')
        .set('x-model-version', '')
        .send({ prompt: 'hello' });

      expect(response.status).toBe(200);
      expect(response.body.version).toBe('1');
    });

    it('serves a compatible version selected by header', async () => {
      const response = await request(server.getApp())
        .post('/serve')
        .set('X-Model-Version', '3')
        .send({ prompt: 'hello' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        model: 'translator',
        version: '3',
        predictions: [{ translation_text: 'v3:hello' }],
      });
    });

    it('answers 409 for a version with a different signature and never caches it', async () => {
      const response = await request(server.getApp())
        .post('/serve')
        .set('x-model-version', '2')
        .send({ prompt: 'hello' });

      expect(response.status).toBe(409);
      expect(response.body).toEqual({
        error: {
          code: 'VERSION_CONFLICT',
          message: "Requested version '2' cannot serve this endpoint's contract",
        },
      });

      const versions = await request(server.getApp()).get('/serve/versions');
      expect(versions.body.versions).toEqual([]);
      expect(versions.body.rejections).toBe(1);
    });

    it('answers 409 for an unknown version', async () => {
      const response = await request(server.getApp())
        .post('/serve')
        .set('x-model-version', '99')
        .send({ prompt: 'hello' });

      expect(response.status).toBe(409);
      expect(response.body.error.code).toBe('VERSION_CONFLICT');
    });

    it('answers 400 with issues for a body that breaks the contract', async () => {
      const response = await request(server.getApp())
        .post('/serve')
        .set('x-model-version', '2')
        .send({ text_to_translate: 'hello' });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe('VALIDATION_FAILED');
      expect(response.body.error.issues).toContainEqual({ path: 'prompt', message: 'Required' });
      expect(registry.loadCalls).toEqual([]);
    });

    it('answers 400 for malformed JSON', async () => {
      const response = await request(server.getApp())
        .post('/serve')
        .set('Content-Type', 'application/json')
        .send('{"prompt":');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        error: { code: 'VALIDATION_FAILED', message: 'Request body is not valid JSON' },
      });
    });

    it('answers 500 without internal detail when a load fails', async () => {
      registry.define('5', { schema: endpoint.referenceSchema, failWith: new Error('/secret/weights missing') });

      const response = await request(server.getApp())
        .post('/serve')
        .set('x-model-version', '5')
        .send({ prompt: 'hello' });

      expect(response.status).toBe(500);
      expect(response.body).toEqual({
        error: { code: 'LOAD_FAILED', message: "Version '5' could not be loaded" },
      });
    });

    it('loads a version once for concurrent requests', async () => {
      const app = server.getApp();

      const responses = await Promise.all(
        Array.from({ length: 5 }, (_, i) =>
          request(app).post('/serve').set('x-model-version', '3').send({ prompt: `p${i}` })
        )
      );

      expect(responses.map((response) => response.status)).toEqual([200, 200, 200, 200, 200]);
      expect(registry.loadCount('3')).toBe(1);
    });

    it('evicts the least recently used version past capacity', async () => {
      const app = server.getApp();

      for (const version of ['1', '3', '4']) {
        const response = await request(app).post('/serve').set('x-model-version', version).send({ prompt: 'x' });
        expect(response.status).toBe(200);
      }

      const versions = await request(app).get('/serve/versions');
      expect(versions.body.versions.map((entry: { versionId: string }) => entry.versionId)).toEqual(['3', '4']);
      expect(registry.released).toEqual(['1']);
    });
  });

  describe('GET /serve/contract', () => {
    it('describes the pinned contract', async () => {
      const response = await request(server.getApp()).get('/serve/contract');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        model: 'translator',
        defaultVersion: '1',
        versionHeader: 'x-model-version',
        inputs: [{ name: 'prompt', type: 'string', required: true }],
        outputs: [{ name: 'translation_text', type: 'string', required: true }],
      });
    });
  });

  describe('GET /serve/versions', () => {
    it('reports an empty cache before any request', async () => {
      const response = await request(server.getApp()).get('/serve/versions');

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        model: 'translator',
        defaultVersion: '1',
        capacity: 2,
        size: 0,
        versions: [],
        loads: 0,
      });
    });
  });

  it('answers /health', async () => {
    const response = await request(server.getApp()).get('/health');

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('ok');
  });

  it('answers 404 for unknown routes', async () => {
    const response = await request(server.getApp()).get('/v1/models');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({
      error: { code: 'NOT_FOUND', message: 'Route GET /v1/models not found' },
    });
  });

  describe('lifecycle', () => {
    it('binds an ephemeral port and releases cached versions on stop', async () => {
      const port = await server.start();
      expect(port).toBeGreaterThan(0);

      await request(server.getApp()).post('/serve').send({ prompt: 'hello' });
      await server.stop();

      expect(registry.released).toEqual(['1']);
      await expect(endpoint.cache.get('1')).rejects.toThrow('Version cache is closed');
    });

    it('refuses to start twice', async () => {
      await server.start();

      await expect(server.start()).rejects.toThrow('API server already started');
    });
  });

  describe('custom route and header', () => {
    it('serves on the configured route with the configured header', async () => {
      const custom = new ApiServer(endpoint, { route: '/v1/translate', versionHeader: 'X-Translator-Version' });

      const response = await request(custom.getApp())
        .post('/v1/translate')
        .set('x-translator-version', '4')
        .send({ prompt: 'hi' });

      expect(response.body).toMatchObject({ version: '4', predictions: [{ translation_text: 'v4:hi' }] });
    });
  });
});
