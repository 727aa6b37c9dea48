// Class loading from uploaded serializer/deserializer binaries

/**
 * A class that can be constructed without arguments
 */
export type Constructible = new () => unknown;

/**
 * Turns an uploaded binary plus a class name into a constructor.
 */
export interface ClassLoader {
  /**
   * @returns The class, or undefined if the binary does not export it
   * @throws if the binary cannot be loaded at all
   */
  load(binary: Uint8Array, className: string): Constructible | undefined;
}

export function isConstructible(value: unknown): value is Constructible {
  return typeof value === 'function' && value.prototype !== undefined;
}

/**
 * Names to try for a class: the full name, then its last dotted segment
 * ("com.example.JsonSerializer" also matches an export "JsonSerializer").
 */
function candidateNames(className: string): string[] {
  const simple = className.slice(className.lastIndexOf('.') + 1);
  return simple !== className ? [className, simple] : [className];
}

function resolveExport(exported: unknown, className: string): Constructible | undefined {
  const names = candidateNames(className);

  // module.exports = class JsonSerializer {}
  if (isConstructible(exported) && names.includes(exported.name)) {
    return exported;
  }

  if ((typeof exported !== 'object' && typeof exported !== 'function') || exported === null) {
    return undefined;
  }

  for (const name of names) {
    if (!Object.prototype.hasOwnProperty.call(exported, name)) continue;
    const value: unknown = Reflect.get(exported, name);
    if (isConstructible(value)) {
      return value;
    }
  }
  return undefined;
}

/**
 * Create a loader for binaries holding UTF-8 CommonJS-style module source.
 *
 * The source runs with `module` and `exports` bindings and the class is
 * looked up on what it exports:
 *
 * ```js
 * class JsonSerializer {
 *   serialize(input) {
 *     return new TextEncoder().encode(JSON.stringify(input));
 *   }
 * }
 * module.exports = { JsonSerializer };
 * ```
 *
 * SECURITY NOTE: module code runs in the same process as the registry.
 * Only register binaries from trusted sources.
 */
export function createModuleClassLoader(): ClassLoader {
  const decoder = new TextDecoder('utf-8', { fatal: true });

  return {
    load(binary, className) {
      const source = decoder.decode(binary);
      const module: { exports: unknown } = { exports: {} };

      const factory = new Function('module', 'exports', source);
      factory(module, module.exports);

      return resolveExport(module.exports, className);
    },
  };
}
