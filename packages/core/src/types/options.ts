/**
 * Configuration options for the namespace resolver
 *
 * All options are optional with conservative defaults.
 */

import type { DiagnosticListener } from '../diag/validate.js';
import {
  EXAMPLE_ID_NAMESPACE,
  assertIdNamespace,
} from '../idgen/id-namespace.js';
import { TypeMetadataTable } from '../metadata/type-metadata.js';
import {
  createLogger,
  isLogLevel,
  logLevelFromEnv,
  type LogLevel,
  type Logger,
} from '../util/logger.js';
import {
  defaultVocabularyTables,
  type VocabularyTables,
} from '../vocab/tables.js';
import { walkEntities, type EntityWalker } from '../walk/walk.js';
import type { IdNamespace } from './entity.js';
import { ConfigError } from './errors.js';

export interface ResolverOptions {
  /** Identifier namespace declared in every document (default: example → http://example.com) */
  idNamespace?: IdNamespace;
  /** Vocabulary default tables (default: bundled tables) */
  vocabularies?: VocabularyTables;
  /** Namespace metadata per entity type tag (default: empty table) */
  types?: TypeMetadataTable;
  /** Tree traversal (default: depth-first over `children`) */
  walker?: EntityWalker;
  /** Report prefixes shared by several namespaces in namespace -> prefix overrides (default: true) */
  validateAliases?: boolean;
  /** Log threshold (default: NSMAP_LOG_LEVEL or 'warn'); ignored when `logger` is set */
  logLevel?: LogLevel;
  logger?: Logger;
  /** Called for every published diagnostic */
  onDiagnostic?: DiagnosticListener;
}

export interface ResolvedOptions {
  idNamespace: IdNamespace;
  vocabularies: VocabularyTables;
  types: TypeMetadataTable;
  walker: EntityWalker;
  validateAliases: boolean;
  logger: Logger;
  onDiagnostic?: DiagnosticListener;
}

export function resolveOptions(
  userOptions: ResolverOptions = {}
): ResolvedOptions {
  if (userOptions.logLevel !== undefined && !isLogLevel(userOptions.logLevel)) {
    throw new ConfigError({
      message: `Unknown log level '${String(userOptions.logLevel)}'`,
      context: { setting: 'logLevel', value: userOptions.logLevel },
    });
  }

  return {
    idNamespace: assertIdNamespace(
      userOptions.idNamespace ?? EXAMPLE_ID_NAMESPACE
    ),
    vocabularies: userOptions.vocabularies ?? defaultVocabularyTables(),
    types: userOptions.types ?? new TypeMetadataTable(),
    walker: userOptions.walker ?? walkEntities,
    validateAliases: userOptions.validateAliases ?? true,
    logger:
      userOptions.logger ??
      createLogger(userOptions.logLevel ?? logLevelFromEnv()),
    onDiagnostic: userOptions.onDiagnostic,
  };
}
