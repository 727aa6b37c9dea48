// SerDes instantiation - descriptor to live instance

import type { SerDesInfo, SerDesRole } from '@schemata/protocol';
import type { FileStorage } from '@schemata/repositories';
import {
  FileNotFoundError,
  InstantiationError,
  type InstantiationFailureReason,
} from '../errors.js';
import type { RegistryLogger } from '../logging.js';
import type { ClassLoader, Constructible } from './class-loader.js';

export type InstantiatorDeps = {
  files: FileStorage;
  classLoader: ClassLoader;
  logger: RegistryLogger;
};

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Construct an instance from a descriptor and check it against a
 * capability guard. A new instance is created on every call.
 *
 * @param role - The role the caller expects the descriptor to have
 * @param capability - Guard the constructed object must pass
 * @throws InstantiationError on any failure; `reason` says which step failed
 */
export async function instantiateSerDes<C>(
  deps: InstantiatorDeps,
  info: SerDesInfo,
  role: SerDesRole,
  capability: (value: unknown) => value is C
): Promise<C> {
  const target = { serDesId: info.id, className: info.className, role };

  const fail = (reason: InstantiationFailureReason, detail: string, cause?: unknown) => {
    deps.logger.error('SerDes instantiation failed', {
      serDesId: info.id,
      className: info.className,
      fileId: info.fileId,
      reason,
      detail,
    });
    return new InstantiationError(target, reason, detail, cause);
  };

  if (info.role !== role) {
    throw fail('role_mismatch', `descriptor is registered as a ${info.role}`);
  }

  const binary = await deps.files.download(info.fileId);
  if (!binary) {
    throw fail('missing_binary', `file ${info.fileId} is not stored`, new FileNotFoundError(info.fileId));
  }

  let ctor: Constructible | undefined;
  try {
    ctor = deps.classLoader.load(binary, info.className);
  } catch (error) {
    throw fail('class_not_found', `file could not be loaded: ${errorMessage(error)}`, error);
  }
  if (!ctor) {
    throw fail('class_not_found', 'file does not export the class');
  }

  let instance: unknown;
  try {
    instance = new ctor();
  } catch (error) {
    throw fail('construction_failed', errorMessage(error), error);
  }

  if (!capability(instance)) {
    throw fail('capability_mismatch', `instance does not implement the ${role} capability`);
  }

  return instance;
}
