import { DIAGNOSTIC_CODES, DIAGNOSTIC_PHASES } from '../diag/codes.js';
import {
  createDiagnostic,
  type DiagnosticEnvelope,
  type DiagnosticListener,
} from '../diag/validate.js';
import { ErrorCode } from '../errors/codes.js';
import {
  prefixFromQualifiedName,
  type TypeMetadataTable,
} from '../metadata/type-metadata.js';
import {
  PrefixConflictError,
  RegistryStateError,
  UnknownNamespaceError,
} from '../types/errors.js';
import {
  entriesOf,
  type Entity,
  type IdNamespace,
  type StringMapInput,
} from '../types/entity.js';
import { silentLogger, type Logger } from '../util/logger.js';
import type { VocabularyTables } from '../vocab/tables.js';
import { findDuplicateAliases } from './aliases.js';

/** Input files use this for their identifiers; the API uses the slashless form. */
export const EXAMPLE_PREFIX = 'example';
export const EXAMPLE_NAMESPACE = 'http://example.com';
export const EXAMPLE_NAMESPACE_SLASH = 'http://example.com/';

export interface RegistryContext {
  vocabularies: VocabularyTables;
  types: TypeMetadataTable;
  idNamespace: IdNamespace;
  logger?: Logger;
  onDiagnostic?: DiagnosticListener;
}

export interface FinalizedNamespaces {
  /** prefix -> namespace */
  readonly namespaces: ReadonlyMap<string, string>;
  /** namespace -> schema location */
  readonly schemaLocations: ReadonlyMap<string, string>;
}

interface DerivedAliases {
  /** prefix -> namespace declared by visited types */
  collected: Map<string, string>;
  /** namespaces whose types declare no usable prefix */
  unaliased: Set<string>;
}

/**
 * Insert `prefix -> namespace` unless the prefix is already bound to another
 * namespace, in which case the merge cannot continue.
 */
export function checkAndInsert(
  map: Map<string, string>,
  prefix: string,
  namespace: string
): void {
  const current = map.get(prefix);
  if (current === undefined) {
    map.set(prefix, namespace);
    return;
  }
  if (current !== namespace) {
    throw new PrefixConflictError({
      prefix,
      existingNamespace: current,
      newNamespace: namespace,
    });
  }
}

/**
 * Accumulates namespace usage for one output document, then merges it with
 * parsed-source and caller data into the final prefix and schema-location
 * maps.
 *
 * Lifecycle: collect()* → finalize() once → read-only.
 */
export class NamespaceRegistry {
  private readonly inputNamespaces = new Map<string, string>();
  private readonly inputSchemaLocations = new Map<string, string>();
  private readonly visitedTypes = new Set<string>();

  private readonly diagnosticList: DiagnosticEnvelope[] = [];
  private readonly advisories: DiagnosticEnvelope[] = [];
  private finalizedState?: FinalizedNamespaces;

  private readonly logger: Logger;

  constructor(private readonly context: RegistryContext) {
    this.logger = context.logger ?? silentLogger;
  }

  get isFinalized(): boolean {
    return this.finalizedState !== undefined;
  }

  get finalizedNamespaces(): ReadonlyMap<string, string> {
    return this.requireFinalized().namespaces;
  }

  get finalizedSchemaLocations(): ReadonlyMap<string, string> {
    return this.requireFinalized().schemaLocations;
  }

  get diagnostics(): readonly DiagnosticEnvelope[] {
    return this.diagnosticList;
  }

  /** Type tags seen so far, in first-seen order. */
  get visitedTypeTags(): readonly string[] {
    return Array.from(this.visitedTypes);
  }

  collect(entity: Entity): void {
    this.assertOpen('collect');
    this.visitedTypes.add(entity.type);

    for (const [prefix, namespace] of entriesOf(entity.inputNamespaces)) {
      this.inputNamespaces.set(prefix, namespace);
    }
    for (const [namespace, location] of entriesOf(
      entity.inputSchemaLocations
    )) {
      this.inputSchemaLocations.set(namespace, location);
    }
  }

  /**
   * Union another registry's collected state into this one. Entries from
   * `other` overwrite same-keyed parsed-source entries here.
   */
  merge(other: NamespaceRegistry): this {
    this.assertOpen('merge');
    other.assertOpen('merge');

    for (const tag of other.visitedTypes) this.visitedTypes.add(tag);
    for (const [prefix, ns] of other.inputNamespaces) {
      this.inputNamespaces.set(prefix, ns);
    }
    for (const [ns, loc] of other.inputSchemaLocations) {
      this.inputSchemaLocations.set(ns, loc);
    }
    return this;
  }

  /**
   * Compute and freeze the prefix and schema-location maps. Throws
   * PrefixConflictError or UnknownNamespaceError without publishing anything.
   */
  finalize(
    prefixOverrides?: StringMapInput,
    schemaLocationOverrides?: StringMapInput
  ): FinalizedNamespaces {
    this.assertOpen('finalize');

    const pending: DiagnosticEnvelope[] = [];
    const derived = this.deriveAliases(pending);
    const namespaces = this.finalizeNamespaces(derived, prefixOverrides, pending);
    const schemaLocations = this.finalizeSchemaLocations(
      namespaces,
      schemaLocationOverrides,
      pending
    );

    this.finalizedState = Object.freeze({ namespaces, schemaLocations });
    for (const diagnostic of [...this.advisories, ...pending]) {
      this.publish(diagnostic);
    }
    return this.finalizedState;
  }

  /**
   * Advisory pass over a namespace -> prefix view: reports every prefix that
   * two or more namespaces share. Never blocks finalization; the findings are
   * published with the other diagnostics once finalize() succeeds.
   */
  validateAliases(namespaceAliases: StringMapInput): DiagnosticEnvelope[] {
    this.assertOpen('validate aliases');
    const found = findDuplicateAliases(namespaceAliases);
    this.advisories.push(...found);
    return found;
  }

  private deriveAliases(pending: DiagnosticEnvelope[]): DerivedAliases {
    const collected = new Map<string, string>();
    const unaliased = new Set<string>();

    for (const typeTag of this.visitedTypes) {
      const metadata = this.context.types.get(typeTag);
      if (!metadata) {
        pending.push(
          createDiagnostic(
            DIAGNOSTIC_CODES.UNKNOWN_TYPE_TAG,
            DIAGNOSTIC_PHASES.COLLECT,
            `No namespace metadata registered for type '${typeTag}'`,
            { typeTag }
          )
        );
        continue;
      }
      const namespace = metadata.namespace;
      if (!namespace) continue;

      const prefix =
        metadata.prefix || prefixFromQualifiedName(metadata.qualifiedName);
      if (prefix) {
        checkAndInsert(collected, prefix, namespace);
      } else {
        unaliased.add(namespace);
      }
    }

    return { collected, unaliased };
  }

  private finalizeNamespaces(
    derived: DerivedAliases,
    prefixOverrides: StringMapInput | undefined,
    pending: DiagnosticEnvelope[]
  ): Map<string, string> {
    const { vocabularies, idNamespace } = this.context;

    // Baseline namespaces appear in every document
    const working = new Map(vocabularies.baseline);
    checkAndInsert(working, idNamespace.prefix, idNamespace.namespace);

    const input = new Map(this.inputNamespaces);
    this.fixExampleNamespace(working, input, pending);

    // Parsed namespaces the vocabularies do not already own
    for (const [prefix, namespace] of input) {
      if (vocabularies.wellKnown.has(namespace)) continue;
      checkAndInsert(working, prefix, namespace);
    }

    for (const namespace of derived.unaliased) {
      const prefix = vocabularies.prefixes.get(namespace);
      if (prefix === undefined) {
        throw new UnknownNamespaceError({ namespace });
      }
      checkAndInsert(working, prefix, namespace);
    }

    for (const [prefix, namespace] of derived.collected) {
      checkAndInsert(working, prefix, namespace);
    }

    // Caller overrides form the base; computed bindings are overlaid on top
    const finalized = new Map<string, string>();
    for (const [prefix, namespace] of entriesOf(prefixOverrides)) {
      checkAndInsert(finalized, prefix, namespace);
    }
    for (const [prefix, namespace] of working) {
      checkAndInsert(finalized, prefix, namespace);
    }
    return finalized;
  }

  private fixExampleNamespace(
    working: ReadonlyMap<string, string>,
    input: Map<string, string>,
    pending: DiagnosticEnvelope[]
  ): void {
    if (
      input.get(EXAMPLE_PREFIX) !== EXAMPLE_NAMESPACE_SLASH ||
      working.get(EXAMPLE_PREFIX) !== EXAMPLE_NAMESPACE
    ) {
      return;
    }
    input.delete(EXAMPLE_PREFIX);
    pending.push(
      createDiagnostic(
        DIAGNOSTIC_CODES.EXAMPLE_NAMESPACE_DROPPED,
        DIAGNOSTIC_PHASES.NAMESPACES,
        `Dropped input namespace '${EXAMPLE_NAMESPACE_SLASH}' in favour of '${EXAMPLE_NAMESPACE}' for prefix '${EXAMPLE_PREFIX}'`,
        {
          prefix: EXAMPLE_PREFIX,
          dropped: EXAMPLE_NAMESPACE_SLASH,
          kept: EXAMPLE_NAMESPACE,
        }
      )
    );
  }

  private finalizeSchemaLocations(
    namespaces: ReadonlyMap<string, string>,
    overrides: StringMapInput | undefined,
    pending: DiagnosticEnvelope[]
  ): Map<string, string> {
    const { vocabularies, idNamespace } = this.context;
    const locations = new Map(entriesOf(overrides));

    for (const [namespace, location] of this.inputSchemaLocations) {
      if (!locations.has(namespace)) locations.set(namespace, location);
    }

    for (const namespace of new Set(namespaces.values())) {
      const published = vocabularies.schemaLocations.get(namespace);
      if (published !== undefined) {
        locations.set(namespace, published);
      } else if (locations.has(namespace)) {
        continue;
      } else if (
        namespace === idNamespace.namespace ||
        vocabularies.xmlNamespaces.has(namespace)
      ) {
        continue;
      } else {
        pending.push(
          createDiagnostic(
            DIAGNOSTIC_CODES.UNRESOLVED_SCHEMA_LOCATION,
            DIAGNOSTIC_PHASES.SCHEMA_LOCATIONS,
            `Unable to map namespace '${namespace}' to schemaLocation`,
            { namespace }
          )
        );
      }
    }
    return locations;
  }

  private publish(diagnostic: DiagnosticEnvelope): void {
    this.diagnosticList.push(diagnostic);
    const line = `${diagnostic.code}: ${diagnostic.message}`;
    switch (diagnostic.severity) {
      case 'error':
        this.logger.error(line);
        break;
      case 'warn':
        this.logger.warn(line);
        break;
      default:
        this.logger.info(line);
    }
    this.context.onDiagnostic?.(diagnostic);
  }

  private requireFinalized(): FinalizedNamespaces {
    if (!this.finalizedState) {
      throw new RegistryStateError({
        message: 'Namespace registry has not been finalized',
        errorCode: ErrorCode.REGISTRY_NOT_FINALIZED,
      });
    }
    return this.finalizedState;
  }

  private assertOpen(operation: string): void {
    if (this.finalizedState) {
      throw new RegistryStateError({
        message: `Cannot ${operation}: namespace registry is already finalized`,
        errorCode: ErrorCode.REGISTRY_ALREADY_FINALIZED,
      });
    }
  }
}
