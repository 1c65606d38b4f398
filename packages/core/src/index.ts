// @nsmap/core entry point
//
// Public API:
// - NamespaceResolver: walk → collect → finalize → render, the preferred entry point.
// - NamespaceRegistry: the collect/merge/finalize engine for callers that drive
//   their own traversal or merge sub-document registries.
// - Rendering helpers, vocabulary tables, type metadata, errors and diagnostics.

export {
  NamespaceResolver,
  type ResolveOverrides,
  type NamespaceResolution,
} from './resolver/namespace-resolver.js';
export {
  renderXmlns,
  renderSchemaLocation,
  renderNamespaceDefinitions,
} from './resolver/render.js';

export {
  NamespaceRegistry,
  checkAndInsert,
  EXAMPLE_PREFIX,
  EXAMPLE_NAMESPACE,
  EXAMPLE_NAMESPACE_SLASH,
  type RegistryContext,
  type FinalizedNamespaces,
} from './registry/namespace-registry.js';
export {
  findDuplicateAliases,
  invertNamespaceAliases,
} from './registry/aliases.js';

export {
  TypeMetadataTable,
  prefixFromQualifiedName,
} from './metadata/type-metadata.js';
export { walkEntities, type EntityWalker } from './walk/walk.js';
export {
  IdGenerator,
  EXAMPLE_ID_NAMESPACE,
  assertIdNamespace,
} from './idgen/id-namespace.js';

export {
  buildVocabularyTables,
  loadVocabularyTables,
  readVocabularyFile,
  defaultVocabularyTables,
  extendDefaultVocabularyTables,
  DEFAULT_VOCABULARY_FILE,
  type VocabularyTables,
} from './vocab/tables.js';
export type {
  VocabularyFile,
  VocabularyDefinition,
  NamespaceDefinition,
} from './vocab/schema.js';

export * from './types/entity.js';
export {
  resolveOptions,
  type ResolverOptions,
  type ResolvedOptions,
} from './types/options.js';

// Errors
export {
  NsmapError,
  PrefixConflictError,
  UnknownNamespaceError,
  RegistryStateError,
  ConfigError,
  ParseError,
  isNsmapError,
  isPrefixConflictError,
  type ErrorContext,
  type SerializedError,
  type UserError,
} from './types/errors.js';
export { ErrorCode, type Severity, getExitCode } from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PrefixConflictView,
  type PresenterOptions,
} from './errors/presenter.js';

// Diagnostics & logging
export {
  DIAGNOSTIC_CODES,
  DIAGNOSTIC_PHASES,
  type DiagnosticCode,
  type DiagnosticPhase,
  type KnownDiagnosticCode,
  getDiagnosticSeverity,
  isKnownDiagnosticCode,
} from './diag/codes.js';
export {
  assertDiagnosticEnvelope,
  createDiagnostic,
  type DiagnosticEnvelope,
  type DiagnosticListener,
  type DuplicateAliasDetails,
  type ExampleNamespaceDroppedDetails,
  type UnresolvedSchemaLocationDetails,
  type UnknownTypeTagDetails,
} from './diag/validate.js';
export {
  createLogger,
  logLevelFromEnv,
  isLogLevel,
  silentLogger,
  LOG_LEVELS,
  type LogLevel,
  type Logger,
  type LogWriter,
} from './util/logger.js';
export { createInputValidator } from './util/ajv.js';
