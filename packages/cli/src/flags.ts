import {
  ConfigError,
  EXAMPLE_ID_NAMESPACE,
  extendDefaultVocabularyTables,
  isLogLevel,
  loadVocabularyTables,
  type IdNamespace,
  type LogLevel,
  type VocabularyTables,
} from '@nsmap/core';

export type OutputFormat = 'xml' | 'json';

/**
 * Options of `nsmap resolve` as commander hands them to the action.
 */
export interface VocabularyCliOptions {
  /** extension vocabulary files, in the order given */
  vocabularies: string[];
  /** false under --no-bundled-vocabularies */
  bundledVocabularies: boolean;
}

export interface ResolveCliOptions extends VocabularyCliOptions {
  document?: string;
  types?: string;
  ns: string[];
  alias: string[];
  schemaloc: string[];
  idNamespace?: string;
  idPrefix?: string;
  format?: string;
  validateAliases: boolean;
  logLevel?: string;
}

export interface VocabCliOptions extends VocabularyCliOptions {
  namespace?: string;
}

/** Commander collector for repeatable options. */
export function collectRepeatable(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Split `key=value` arguments at the first '='. Later keys replace earlier
 * ones.
 */
export function parsePairs(
  values: readonly string[] | undefined,
  flag: string,
  shape: string
): Map<string, string> {
  const pairs = new Map<string, string>();
  for (const raw of values ?? []) {
    const at = raw.indexOf('=');
    const key = at > 0 ? raw.slice(0, at).trim() : '';
    const value = at > 0 ? raw.slice(at + 1).trim() : '';
    if (!key || !value) {
      throw new ConfigError({
        message: `Invalid ${flag} value '${raw}': expected ${shape}`,
        context: { setting: flag, value: raw },
      });
    }
    pairs.set(key, value);
  }
  return pairs;
}

export function resolveOutputFormat(value: string | undefined): OutputFormat {
  const format = (value ?? 'xml').toLowerCase();
  if (format === 'xml' || format === 'json') return format;
  throw new ConfigError({
    message: `Unknown output format '${value ?? ''}' (expected xml or json)`,
    context: { setting: '--format', value },
  });
}

/**
 * Format for a failed run: JSON when it was asked for, even if the rest of
 * the flags never got parsed.
 */
export function errorFormatFor(value: string | undefined): OutputFormat {
  return value?.toLowerCase() === 'json' ? 'json' : 'xml';
}

/**
 * Bundled tables extended by every `--vocabularies` file, or only those files
 * under `--no-bundled-vocabularies`.
 */
export function resolveVocabularyTables(
  options: VocabularyCliOptions
): VocabularyTables {
  if (options.bundledVocabularies) {
    return extendDefaultVocabularyTables(options.vocabularies);
  }
  const [first, ...rest] = options.vocabularies;
  if (first === undefined) {
    throw new ConfigError({
      message: '--no-bundled-vocabularies needs at least one --vocabularies file',
      context: { setting: '--vocabularies' },
    });
  }
  return loadVocabularyTables(first, ...rest);
}

export function resolveLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined;
  const level = value.toLowerCase();
  if (isLogLevel(level)) return level;
  throw new ConfigError({
    message: `Unknown log level '${value}'`,
    context: { setting: '--log-level', value },
  });
}

/**
 * Identifier namespace from `--id-namespace`/`--id-prefix`; either flag alone
 * keeps the default for the other.
 */
export function resolveIdNamespace(options: {
  idNamespace?: string;
  idPrefix?: string;
}): IdNamespace {
  if (options.idNamespace === undefined && options.idPrefix === undefined) {
    return EXAMPLE_ID_NAMESPACE;
  }
  return {
    namespace: options.idNamespace ?? EXAMPLE_ID_NAMESPACE.namespace,
    prefix: options.idPrefix ?? EXAMPLE_ID_NAMESPACE.prefix,
  };
}
