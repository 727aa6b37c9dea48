// Tests for SerDes instantiation

import { describe, it, expect, beforeEach } from 'vitest';
import {
  isSchemaDeserializer,
  isSchemaSerializer,
  type SchemaSerializer,
  type SerDesInfo,
} from '@schemata/protocol';
import { createInMemoryFileStorage } from '@schemata/repositories';
import { instantiateSerDes, type InstantiatorDeps } from './instantiator.js';
import { createModuleClassLoader } from './class-loader.js';
import { createCapturingLogger } from '../logging.js';
import { FileNotFoundError, InstantiationError } from '../errors.js';

const CODEC_SOURCE = `
class JsonSerializer {
  serialize(input) {
    return new TextEncoder().encode(JSON.stringify(input));
  }
}
class JsonDeserializer {
  deserialize(payload) {
    return JSON.parse(new TextDecoder().decode(payload));
  }
}
class Exploding {
  constructor() {
    throw new Error('no config');
  }
}
class Inert {}
module.exports = { JsonSerializer, JsonDeserializer, Exploding, Inert };
`;

function descriptor(overrides: Partial<SerDesInfo> = {}): SerDesInfo {
  return {
    id: 1,
    role: 'serializer',
    name: 'json',
    fileId: 'missing',
    className: 'JsonSerializer',
    createdAt: '2024-01-01T00:00:00Z',
    ...overrides,
  };
}

describe('instantiateSerDes', () => {
  let deps: InstantiatorDeps;
  let logger: ReturnType<typeof createCapturingLogger>;
  let fileId: string;

  beforeEach(async () => {
    const files = createInMemoryFileStorage();
    logger = createCapturingLogger();
    deps = { files, classLoader: createModuleClassLoader(), logger };
    fileId = await files.upload(new TextEncoder().encode(CODEC_SOURCE));
  });

  it('constructs a working serializer', async () => {
    const serializer = await instantiateSerDes(deps, descriptor({ fileId }), 'serializer', isSchemaSerializer);

    const bytes = serializer.serialize({ value: 21 }, {
      metadata: {
        id: 1,
        name: 'device.reading',
        type: 'record',
        compatibility: 'BACKWARD',
        evolve: true,
        createdAt: '2024-01-01T00:00:00Z',
      },
      version: {
        schemaKey: { schemaMetadataId: 1, version: 1 },
        schemaText: '{}',
        fingerprint: 'fp',
        createdAt: '2024-01-01T00:00:00Z',
      },
    });

    expect(new TextDecoder().decode(bytes)).toBe('{"value":21}');
  });

  it('creates a new instance on every call', async () => {
    const info = descriptor({ fileId });

    const a = await instantiateSerDes(deps, info, 'serializer', isSchemaSerializer);
    const b = await instantiateSerDes(deps, info, 'serializer', isSchemaSerializer);

    expect(a).not.toBe(b);
  });

  it('fails with missing_binary and a FileNotFoundError cause', async () => {
    const attempt = instantiateSerDes(deps, descriptor(), 'serializer', isSchemaSerializer);

    await expect(attempt).rejects.toBeInstanceOf(InstantiationError);
    const error = await attempt.catch((e: unknown) => e);
    expect(error).toMatchObject({ reason: 'missing_binary', serDesId: 1 });
    expect(error instanceof Error && error.cause instanceof FileNotFoundError).toBe(true);
  });

  it('fails with class_not_found for an unknown class', async () => {
    await expect(
      instantiateSerDes(deps, descriptor({ fileId, className: 'Nope' }), 'serializer', isSchemaSerializer)
    ).rejects.toMatchObject({ reason: 'class_not_found' });
  });

  it('fails with class_not_found when the file is not loadable', async () => {
    const broken = await deps.files.upload(new TextEncoder().encode('not javascript at all'));

    await expect(
      instantiateSerDes(deps, descriptor({ fileId: broken }), 'serializer', isSchemaSerializer)
    ).rejects.toMatchObject({ reason: 'class_not_found' });
  });

  it('fails with construction_failed when the constructor throws', async () => {
    const attempt = instantiateSerDes(
      deps,
      descriptor({ fileId, className: 'Exploding' }),
      'serializer',
      isSchemaSerializer
    );

    await expect(attempt).rejects.toMatchObject({ reason: 'construction_failed' });
    await expect(attempt).rejects.toThrow('Cannot create serializer Exploding (1): no config');
  });

  it('fails with capability_mismatch when the instance lacks the capability', async () => {
    await expect(
      instantiateSerDes(deps, descriptor({ fileId, className: 'Inert' }), 'serializer', isSchemaSerializer)
    ).rejects.toMatchObject({ reason: 'capability_mismatch' });
    await expect(
      instantiateSerDes(
        deps,
        descriptor({ fileId, role: 'deserializer', className: 'JsonSerializer' }),
        'deserializer',
        isSchemaDeserializer
      )
    ).rejects.toMatchObject({ reason: 'capability_mismatch' });
  });

  it('fails with role_mismatch before touching storage', async () => {
    await expect(
      instantiateSerDes(deps, descriptor({ role: 'deserializer' }), 'serializer', isSchemaSerializer)
    ).rejects.toMatchObject({ reason: 'role_mismatch' });
  });

  it('applies a narrower guard', async () => {
    const isNamedSerializer = (value: unknown): value is SchemaSerializer & { name: string } =>
      isSchemaSerializer(value) && 'name' in value;

    await expect(
      instantiateSerDes(deps, descriptor({ fileId }), 'serializer', isNamedSerializer)
    ).rejects.toMatchObject({ reason: 'capability_mismatch' });
  });

  it('logs failures at error level', async () => {
    await instantiateSerDes(deps, descriptor(), 'serializer', isSchemaSerializer).catch(() => undefined);

    expect(logger.entries).toHaveLength(1);
    expect(logger.entries[0]).toMatchObject({
      level: 'error',
      message: 'SerDes instantiation failed',
      data: { serDesId: 1, reason: 'missing_binary' },
    });
  });
});
