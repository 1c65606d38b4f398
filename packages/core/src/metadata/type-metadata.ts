import { ConfigError } from '../types/errors.js';
import type { TypeMetadata } from '../types/entity.js';

/**
 * Statically registered namespace metadata keyed by entity type tag.
 * Populated once at startup; a tag can be registered only once unless the
 * metadata is identical.
 */
export class TypeMetadataTable {
  private readonly entries = new Map<string, Readonly<TypeMetadata>>();

  register(typeTag: string, metadata: TypeMetadata): this {
    if (!typeTag) {
      throw new ConfigError({
        message: 'Type tag must be a non-empty string',
        context: { setting: 'types' },
      });
    }
    const existing = this.entries.get(typeTag);
    if (existing && !sameMetadata(existing, metadata)) {
      throw new ConfigError({
        message: `Type '${typeTag}' is already registered with different namespace metadata`,
        context: { setting: 'types', typeTag },
      });
    }
    this.entries.set(typeTag, Object.freeze({ ...metadata }));
    return this;
  }

  registerAll(table: Readonly<Record<string, TypeMetadata>>): this {
    for (const [typeTag, metadata] of Object.entries(table)) {
      this.register(typeTag, metadata);
    }
    return this;
  }

  get(typeTag: string): Readonly<TypeMetadata> | undefined {
    return this.entries.get(typeTag);
  }

  has(typeTag: string): boolean {
    return this.entries.has(typeTag);
  }

  get size(): number {
    return this.entries.size;
  }

  static from(table: Readonly<Record<string, TypeMetadata>>): TypeMetadataTable {
    return new TypeMetadataTable().registerAll(table);
  }
}

function sameMetadata(a: TypeMetadata, b: TypeMetadata): boolean {
  return (
    a.namespace === b.namespace &&
    a.prefix === b.prefix &&
    a.qualifiedName === b.qualifiedName
  );
}

/**
 * Prefix carried by a `prefix:LocalName` qualified name, or undefined when the
 * value does not split into exactly two parts.
 */
export function prefixFromQualifiedName(
  qualifiedName: string | undefined
): string | undefined {
  if (!qualifiedName) return undefined;
  const parts = qualifiedName.split(':');
  return parts.length === 2 ? parts[0] : undefined;
}
