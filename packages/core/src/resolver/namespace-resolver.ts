import type { DiagnosticEnvelope } from '../diag/validate.js';
import {
  NamespaceRegistry,
  checkAndInsert,
  type FinalizedNamespaces,
} from '../registry/namespace-registry.js';
import { invertNamespaceAliases } from '../registry/aliases.js';
import {
  entriesOf,
  type Entity,
  type StringMapInput,
} from '../types/entity.js';
import {
  resolveOptions,
  type ResolvedOptions,
  type ResolverOptions,
} from '../types/options.js';
import { renderNamespaceDefinitions } from './render.js';

export interface ResolveOverrides {
  /** prefix -> namespace bindings the caller insists on */
  prefixes?: StringMapInput;
  /**
   * namespace -> prefix bindings, the shape most XML emitters keep. Checked
   * for shared prefixes, inverted, then combined with `prefixes`.
   */
  namespaceAliases?: StringMapInput;
  /** namespace -> schema location */
  schemaLocations?: StringMapInput;
}

export interface NamespaceResolution extends FinalizedNamespaces {
  readonly diagnostics: readonly DiagnosticEnvelope[];
}

/**
 * Walks an entity tree, feeds every node into a NamespaceRegistry, finalizes
 * it and renders the result for the document's root element.
 */
export class NamespaceResolver {
  readonly options: ResolvedOptions;

  constructor(options: ResolverOptions = {}) {
    this.options = resolveOptions(options);
  }

  createRegistry(): NamespaceRegistry {
    const { vocabularies, types, idNamespace, logger, onDiagnostic } =
      this.options;
    return new NamespaceRegistry({
      vocabularies,
      types,
      idNamespace,
      logger,
      onDiagnostic,
    });
  }

  /** Collect every node under `root` into `registry` (a new one by default). */
  collect(
    root: Entity,
    registry: NamespaceRegistry = this.createRegistry()
  ): NamespaceRegistry {
    for (const node of this.options.walker(root)) {
      registry.collect(node);
    }
    return registry;
  }

  resolve(root: Entity, overrides: ResolveOverrides = {}): NamespaceResolution {
    return this.finalize(this.collect(root), overrides);
  }

  /**
   * Resolve a package of sub-documents: each root is collected into its own
   * registry and the registries are merged before a single finalize.
   */
  resolveAll(
    roots: Iterable<Entity>,
    overrides: ResolveOverrides = {}
  ): NamespaceResolution {
    const merged = this.createRegistry();
    for (const root of roots) {
      merged.merge(this.collect(root));
    }
    return this.finalize(merged, overrides);
  }

  getNamespaces(
    root: Entity,
    overrides: ResolveOverrides = {}
  ): ReadonlyMap<string, string> {
    return this.resolve(root, overrides).namespaces;
  }

  getSchemaLocations(
    root: Entity,
    overrides: ResolveOverrides = {}
  ): ReadonlyMap<string, string> {
    return this.resolve(root, overrides).schemaLocations;
  }

  /** Root element attribute text for the document under `root`. */
  getNamespaceDefinitions(
    root: Entity,
    overrides: ResolveOverrides = {}
  ): string {
    const { namespaces, schemaLocations } = this.resolve(root, overrides);
    return renderNamespaceDefinitions(namespaces, schemaLocations);
  }

  private finalize(
    registry: NamespaceRegistry,
    overrides: ResolveOverrides
  ): NamespaceResolution {
    const prefixes = new Map(entriesOf(overrides.prefixes));
    if (overrides.namespaceAliases) {
      if (this.options.validateAliases) {
        registry.validateAliases(overrides.namespaceAliases);
      }
      for (const [prefix, ns] of invertNamespaceAliases(
        overrides.namespaceAliases
      )) {
        checkAndInsert(prefixes, prefix, ns);
      }
    }

    const { namespaces, schemaLocations } = registry.finalize(
      prefixes,
      overrides.schemaLocations
    );
    return { namespaces, schemaLocations, diagnostics: registry.diagnostics };
  }
}
