// Provider registry - maps schema type names to providers

import type { SchemaProvider } from './types.js';

/**
 * Registry for schema type providers.
 *
 * Each SchemaRegistry is constructed with one of these; nothing is global.
 * Use createDefaultProviderRegistry() for one preloaded with the built-in
 * 'record' and 'text' providers.
 */
export class SchemaProviderRegistry {
  private providers = new Map<string, SchemaProvider>();

  constructor(providers: SchemaProvider[] = []) {
    for (const provider of providers) {
      this.register(provider);
    }
  }

  /**
   * Register a provider under its type name.
   *
   * @throws Error if a provider is already registered for the type
   */
  register(provider: SchemaProvider): void {
    if (this.providers.has(provider.type)) {
      throw new Error(`Schema provider already registered for type: ${provider.type}`);
    }
    this.providers.set(provider.type, provider);
  }

  /**
   * Get the provider for a schema type.
   *
   * @returns The provider, or undefined if not registered
   */
  get(type: string): SchemaProvider | undefined {
    return this.providers.get(type);
  }

  has(type: string): boolean {
    return this.providers.has(type);
  }

  getRegisteredTypes(): string[] {
    return Array.from(this.providers.keys());
  }
}
