import { readFileSync } from 'node:fs';

import { ConfigError, ParseError } from '../types/errors.js';
import { createInputValidator } from '../util/ajv.js';
import {
  VOCABULARY_FILE_SCHEMA,
  type NamespaceDefinition,
  type VocabularyFile,
} from './schema.js';

/**
 * Process-wide, read-only vocabulary configuration shared by every registry.
 */
export interface VocabularyTables {
  /** prefix -> namespace present in every output document */
  readonly baseline: ReadonlyMap<string, string>;
  /** namespace -> canonical prefix */
  readonly prefixes: ReadonlyMap<string, string>;
  /** namespace -> published schema location */
  readonly schemaLocations: ReadonlyMap<string, string>;
  /** namespaces owned by the vocabularies themselves */
  readonly wellKnown: ReadonlySet<string>;
  /** XML infrastructure namespaces that never carry a schema location */
  readonly xmlNamespaces: ReadonlySet<string>;
}

export const DEFAULT_VOCABULARY_FILE = new URL(
  '../../data/vocabularies.json',
  import.meta.url
);

const validateVocabularyFile = createInputValidator<VocabularyFile>(
  VOCABULARY_FILE_SCHEMA,
  'vocabulary file'
);

/**
 * Build immutable tables from parsed vocabulary files. Later files extend the
 * earlier ones: a namespace listed twice must agree on its prefix and schema
 * location, and a baseline prefix may not be rebound.
 */
export function buildVocabularyTables(
  source: unknown,
  ...overlays: unknown[]
): VocabularyTables {
  const files = [source, ...overlays].map((file) =>
    validateVocabularyFile(file)
  );

  const baseline = new Map<string, string>();
  const prefixes = new Map<string, string>();
  const schemaLocations = new Map<string, string>();
  const xmlNamespaces = new Set<string>();
  const owners = new Map<string, string>();

  const define = (vocabulary: string, def: NamespaceDefinition): void => {
    const owner = owners.get(def.namespace);
    const knownPrefix = prefixes.get(def.namespace);
    if (owner !== undefined && knownPrefix !== def.prefix) {
      throw new ConfigError({
        message: `Namespace '${def.namespace}' is bound to '${knownPrefix ?? ''}' by '${owner}' and to '${def.prefix}' by '${vocabulary}'`,
        context: { setting: 'vocabularies', namespace: def.namespace },
      });
    }
    const knownLocation = schemaLocations.get(def.namespace);
    if (
      def.schemaLocation !== undefined &&
      knownLocation !== undefined &&
      knownLocation !== def.schemaLocation
    ) {
      throw new ConfigError({
        message: `Namespace '${def.namespace}' has two schema locations: '${knownLocation}' and '${def.schemaLocation}'`,
        context: { setting: 'vocabularies', namespace: def.namespace },
      });
    }
    owners.set(def.namespace, vocabulary);
    prefixes.set(def.namespace, def.prefix);
    if (def.schemaLocation !== undefined) {
      schemaLocations.set(def.namespace, def.schemaLocation);
    }
  };

  for (const file of files) {
    for (const [prefix, namespace] of Object.entries(file.baseline ?? {})) {
      const bound = baseline.get(prefix);
      if (bound !== undefined && bound !== namespace) {
        throw new ConfigError({
          message: `Baseline prefix '${prefix}' is bound to '${bound}' and to '${namespace}'`,
          context: { setting: 'vocabularies', prefix },
        });
      }
      baseline.set(prefix, namespace);
    }

    for (const vocabulary of file.vocabularies) {
      for (const def of vocabulary.namespaces) {
        define(vocabulary.name, def);
        if (vocabulary.infrastructure) {
          xmlNamespaces.add(def.namespace);
        }
      }
    }
  }

  return Object.freeze({
    baseline,
    prefixes,
    schemaLocations,
    wellKnown: new Set(prefixes.keys()),
    xmlNamespaces,
  });
}

export function readVocabularyFile(file: URL | string): unknown {
  let raw: string;
  try {
    raw = readFileSync(file, 'utf8');
  } catch (error) {
    throw new ConfigError({
      message: `Cannot read vocabulary file ${String(file)}`,
      context: { setting: 'vocabularies' },
      cause: error instanceof Error ? error : undefined,
    });
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ParseError({
      message: `Vocabulary file ${String(file)} is not valid JSON`,
      context: { input: String(file) },
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/** Load `file` and extend it with each overlay in order. */
export function loadVocabularyTables(
  file: URL | string = DEFAULT_VOCABULARY_FILE,
  ...overlays: Array<URL | string>
): VocabularyTables {
  return buildVocabularyTables(
    readVocabularyFile(file),
    ...overlays.map(readVocabularyFile)
  );
}

/**
 * Bundled tables extended by third-party vocabulary files, e.g. a MAEC
 * namespace list.
 */
export function extendDefaultVocabularyTables(
  overlays: ReadonlyArray<URL | string>
): VocabularyTables {
  if (overlays.length === 0) return defaultVocabularyTables();
  return loadVocabularyTables(DEFAULT_VOCABULARY_FILE, ...overlays);
}

let defaultTables: VocabularyTables | undefined;

/**
 * Bundled tables, loaded on first use and shared afterwards.
 */
export function defaultVocabularyTables(): VocabularyTables {
  defaultTables ??= loadVocabularyTables();
  return defaultTables;
}
