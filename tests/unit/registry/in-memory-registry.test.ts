/**
 * Unit Tests - InMemoryModelRegistry
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { InMemoryModelRegistry } from '../../../src/registry/in-memory-registry.js';
import { ModelNotFoundError, ValidationError } from '../../../src/api/errors.js';

const schema = {
  inputs: [{ name: 'prompt', type: 'string' }],
  outputs: [{ name: 'translation_text', type: 'string', required: false }],
};

describe('InMemoryModelRegistry', () => {
  let registry: InMemoryModelRegistry;

  beforeEach(() => {
    registry = new InMemoryModelRegistry();
  });

  describe('register', () => {
    it('stores the schema with required defaulting to true', () => {
      const stored = registry.register('translator', '1', { schema, predict: async () => [] });

      expect(stored).toEqual({
        inputs: [{ name: 'prompt', type: 'string', required: true }],
        outputs: [{ name: 'translation_text', type: 'string', required: false }],
      });
    });

    it('accepts field types the serving layer does not support', () => {
      expect(() =>
        registry.register('classifier', '1', {
          schema: { inputs: [{ name: 'pixels', type: 'tensor' }], outputs: [{ name: 'label', type: 'string' }] },
          predict: async () => [],
        })
      ).not.toThrow();
    });

    it('refuses a second registration of the same version', () => {
      registry.register('translator', '1', { schema, predict: async () => [] });

      expect(() => registry.register('translator', '1', { schema, predict: async () => [] })).toThrow(
        "Model 'translator' already has a version '1'"
      );
    });

    it('refuses empty model names and version ids', () => {
      expect(() => registry.register('', '1', { schema, predict: async () => [] })).toThrow(
        "Validation error on field 'modelName': Cannot be empty"
      );
      expect(() => registry.register('translator', '', { schema, predict: async () => [] })).toThrow(
        ValidationError
      );
    });

    it('refuses a malformed schema', () => {
      expect(() =>
        registry.register('translator', '1', {
          schema: { inputs: [{ name: '', type: 'string' }], outputs: [] },
          predict: async () => [],
        })
      ).toThrow("Validation error on field 'inputs.0.name': Cannot be empty");
    });

    it('lists versions in registration order', () => {
      registry.register('translator', '2', { schema, predict: async () => [] });
      registry.register('translator', '1', { schema, predict: async () => [] });

      expect(registry.listVersions('translator')).toEqual(['2', '1']);
      expect(registry.listVersions('unknown')).toEqual([]);
    });
  });

  describe('getSchema', () => {
    it('returns the registered schema', async () => {
      registry.register('translator', '1', { schema, predict: async () => [] });

      await expect(registry.getSchema('translator', '1')).resolves.toMatchObject({
        inputs: [{ name: 'prompt' }],
      });
    });

    it('rejects an unknown model or version', async () => {
      registry.register('translator', '1', { schema, predict: async () => [] });

      await expect(registry.getSchema('translator', '2')).rejects.toBeInstanceOf(ModelNotFoundError);
      await expect(registry.getSchema('summarizer', '1')).rejects.toThrow(
        "Model 'summarizer' has no version '1'"
      );
    });
  });

  describe('load', () => {
    it('returns the predict function with the stored schema', async () => {
      const predict = vi.fn(async () => [{ translation_text: 'hola' }]);
      registry.register('translator', '1', { schema, predict });

      const loaded = await registry.load('translator', '1');

      expect(loaded.predict).toBe(predict);
      expect(loaded.schema.inputs[0]).toEqual({ name: 'prompt', type: 'string', required: true });
      expect(loaded.release).toBeUndefined();
    });

    it('runs the loader on every load', async () => {
      const release = vi.fn();
      const loader = vi.fn(async () => ({ predict: async () => [], release }));
      registry.register('translator', '1', { schema, loader });

      const loaded = await registry.load('translator', '1');
      await registry.load('translator', '1');

      expect(loader).toHaveBeenCalledTimes(2);
      expect(loaded.release).toBe(release);
    });

    it('propagates loader failures', async () => {
      registry.register('translator', '1', {
        schema,
        loader: async () => {
          throw new Error('weights missing');
        },
      });

      await expect(registry.load('translator', '1')).rejects.toThrow('weights missing');
    });
  });
});
