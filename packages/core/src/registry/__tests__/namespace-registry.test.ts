import { describe, it, expect, vi } from 'vitest';

import {
  BASELINE_SCHEMA_LOCATIONS,
  BASELINE_WITH_EXAMPLE,
  NS,
  TYPES,
  buildPackage,
  buildParsedPackage,
} from '../../__fixtures__/entities.js';
import { DIAGNOSTIC_CODES } from '../../diag/codes.js';
import { assertDiagnosticEnvelope } from '../../diag/validate.js';
import { ErrorCode } from '../../errors/codes.js';
import { EXAMPLE_ID_NAMESPACE } from '../../idgen/id-namespace.js';
import { TypeMetadataTable } from '../../metadata/type-metadata.js';
import type { Entity, IdNamespace, TypeMetadata } from '../../types/entity.js';
import {
  PrefixConflictError,
  RegistryStateError,
  UnknownNamespaceError,
} from '../../types/errors.js';
import { createLogger } from '../../util/logger.js';
import { defaultVocabularyTables } from '../../vocab/tables.js';
import { walkEntities } from '../../walk/walk.js';
import {
  NamespaceRegistry,
  checkAndInsert,
  type RegistryContext,
} from '../namespace-registry.js';

function makeRegistry(
  types: Record<string, TypeMetadata> = TYPES,
  extra: Partial<RegistryContext> = {}
): NamespaceRegistry {
  return new NamespaceRegistry({
    vocabularies: defaultVocabularyTables(),
    types: TypeMetadataTable.from(types),
    idNamespace: EXAMPLE_ID_NAMESPACE,
    ...extra,
  });
}

function collectTree(registry: NamespaceRegistry, root: Entity): void {
  for (const node of walkEntities(root)) registry.collect(node);
}

function catchError<E extends Error>(
  type: abstract new (...args: never[]) => E,
  fn: () => unknown
): E {
  try {
    fn();
  } catch (error) {
    if (error instanceof type) return error;
    throw error;
  }
  throw new Error('expected function to throw');
}

describe('checkAndInsert', () => {
  it('inserts absent prefixes and ignores identical bindings', () => {
    const map = new Map<string, string>([['a', 'urn:a']]);
    checkAndInsert(map, 'b', 'urn:b');
    checkAndInsert(map, 'a', 'urn:a');
    expect(Object.fromEntries(map)).toEqual({ a: 'urn:a', b: 'urn:b' });
  });

  it('throws PrefixConflictError naming the prefix and both namespaces', () => {
    const map = new Map<string, string>([['a', 'urn:a']]);
    const conflict = catchError(PrefixConflictError, () =>
      checkAndInsert(map, 'a', 'urn:other')
    );

    expect(conflict.prefix).toBe('a');
    expect(conflict.existingNamespace).toBe('urn:a');
    expect(conflict.newNamespace).toBe('urn:other');
    expect(conflict.errorCode).toBe(ErrorCode.PREFIX_CONFLICT);
    expect(map.get('a')).toBe('urn:a');
  });
});

describe('NamespaceRegistry', () => {
  describe('finalize with nothing collected', () => {
    it('declares the baseline prefixes and the identifier namespace', () => {
      const registry = makeRegistry();
      const { namespaces, schemaLocations } = registry.finalize();

      expect(Object.fromEntries(namespaces)).toEqual(BASELINE_WITH_EXAMPLE);
      expect(Object.fromEntries(schemaLocations)).toEqual(
        BASELINE_SCHEMA_LOCATIONS
      );
      expect(registry.diagnostics).toEqual([]);
    });

    it('uses a custom identifier namespace', () => {
      const idNamespace: IdNamespace = {
        prefix: 'acme',
        namespace: 'http://acme.test',
      };
      const registry = makeRegistry(TYPES, { idNamespace });
      const { namespaces, schemaLocations } = registry.finalize();

      expect(namespaces.get('acme')).toBe('http://acme.test');
      expect(namespaces.has('example')).toBe(false);
      expect(schemaLocations.has('http://acme.test')).toBe(false);
      expect(registry.diagnostics).toEqual([]);
    });
  });

  describe('alias derivation', () => {
    it('binds explicit prefixes, qualified-name prefixes and table prefixes', () => {
      const registry = makeRegistry();
      collectTree(registry, buildPackage());
      const { namespaces } = registry.finalize();

      expect(Object.fromEntries(namespaces)).toEqual({
        ...BASELINE_WITH_EXAMPLE,
        indicator: NS.indicator,
        FileObj: NS.fileObj,
        campaign: NS.campaign,
      });
    });

    it('falls back to the table when a qualified name does not split into two parts', () => {
      const registry = makeRegistry();
      registry.collect({ type: 'TTP' });
      const { namespaces } = registry.finalize();

      expect(namespaces.get('ttp')).toBe(NS.ttp);
      expect(namespaces.has('not')).toBe(false);
    });

    it('prefers the explicit prefix over the qualified name', () => {
      const registry = makeRegistry({
        Custom: {
          namespace: NS.indicator,
          prefix: 'ind',
          qualifiedName: 'indicator:IndicatorType',
        },
      });
      registry.collect({ type: 'Custom' });
      const { namespaces } = registry.finalize();

      expect(namespaces.get('ind')).toBe(NS.indicator);
      expect(namespaces.has('indicator')).toBe(false);
    });

    it('fails when an unaliased namespace has no canonical prefix', () => {
      const registry = makeRegistry({ Feed: { namespace: NS.acme } });
      registry.collect({ type: 'Feed' });

      const error = catchError(UnknownNamespaceError, () => registry.finalize());
      expect(error.namespace).toBe(NS.acme);
      expect(registry.isFinalized).toBe(false);
    });

    it('fails when two types claim one prefix for different namespaces', () => {
      const registry = makeRegistry({
        A: { namespace: 'urn:a', prefix: 'x' },
        B: { namespace: 'urn:b', qualifiedName: 'x:BType' },
      });
      registry.collect({ type: 'A' });
      registry.collect({ type: 'B' });

      const error = catchError(PrefixConflictError, () => registry.finalize());
      expect(error.prefix).toBe('x');
    });

    it('reports type tags without registered metadata', () => {
      const registry = makeRegistry();
      registry.collect({ type: 'Mystery' });
      registry.collect({ type: 'Mystery' });
      registry.finalize();

      expect(registry.diagnostics).toHaveLength(1);
      expect(registry.diagnostics[0]).toEqual({
        code: DIAGNOSTIC_CODES.UNKNOWN_TYPE_TAG,
        severity: 'info',
        phase: 'collect',
        message: "No namespace metadata registered for type 'Mystery'",
        details: { typeTag: 'Mystery' },
      });
    });

    it('inspects each type tag once', () => {
      const registry = makeRegistry();
      registry.collect({ type: 'Indicator' });
      registry.collect({ type: 'Campaign' });
      registry.collect({ type: 'Indicator' });

      expect(registry.visitedTypeTags).toEqual(['Indicator', 'Campaign']);
    });
  });

  describe('parsed-source namespaces', () => {
    it('keeps foreign input namespaces and skips well-known ones', () => {
      const registry = makeRegistry();
      registry.collect({
        type: 'Package',
        inputNamespaces: {
          acme: NS.acme,
          attackPattern: NS.capec,
          feedTtp: NS.ttp,
        },
      });
      const { namespaces } = registry.finalize();

      expect(namespaces.get('acme')).toBe(NS.acme);
      expect(namespaces.has('attackPattern')).toBe(false);
      expect(namespaces.has('feedTtp')).toBe(false);
    });

    it('drops the slash-terminated example namespace in favour of the identifier namespace', () => {
      const registry = makeRegistry();
      collectTree(registry, buildParsedPackage());
      const { namespaces } = registry.finalize();

      expect(namespaces.get('example')).toBe('http://example.com');
      expect(Array.from(namespaces.values())).not.toContain(
        'http://example.com/'
      );
      expect(
        registry.diagnostics.map((d) => d.code)
      ).toContain(DIAGNOSTIC_CODES.EXAMPLE_NAMESPACE_DROPPED);
    });

    it('keeps the slash-terminated example namespace when the identifier prefix differs', () => {
      const registry = makeRegistry(TYPES, {
        idNamespace: { prefix: 'acme', namespace: 'http://acme.test' },
      });
      registry.collect({
        type: 'Package',
        inputNamespaces: { example: 'http://example.com/' },
      });
      const { namespaces } = registry.finalize();

      expect(namespaces.get('example')).toBe('http://example.com/');
      expect(registry.diagnostics.map((d) => d.code)).toEqual([
        DIAGNOSTIC_CODES.UNRESOLVED_SCHEMA_LOCATION,
      ]);
    });

    it('fails when an input prefix collides with a baseline prefix', () => {
      const registry = makeRegistry();
      registry.collect({
        type: 'Package',
        inputNamespaces: { stix: 'urn:not-stix' },
      });

      const conflict = catchError(PrefixConflictError, () =>
        registry.finalize()
      );
      expect(conflict.prefix).toBe('stix');
      expect(conflict.existingNamespace).toBe(NS.stix);
      expect(conflict.newNamespace).toBe('urn:not-stix');
    });

    it('lets later instances overwrite earlier input bindings', () => {
      const registry = makeRegistry();
      registry.collect({ type: 'Package', inputNamespaces: { acme: 'urn:v1' } });
      registry.collect({ type: 'Package', inputNamespaces: { acme: 'urn:v2' } });
      const { namespaces } = registry.finalize();

      expect(namespaces.get('acme')).toBe('urn:v2');
    });
  });

  describe('caller overrides', () => {
    it('fails when the override and a collected type disagree on a prefix', () => {
      const registry = makeRegistry({ Thing: { namespace: 'urn:b', prefix: 'x' } });
      registry.collect({ type: 'Thing' });

      const conflict = catchError(PrefixConflictError, () =>
        registry.finalize({ x: 'urn:a' })
      );
      expect(conflict.prefix).toBe('x');
      expect(conflict.existingNamespace).toBe('urn:a');
      expect(conflict.newNamespace).toBe('urn:b');
    });

    it('accepts overrides that repeat a computed binding', () => {
      const registry = makeRegistry();
      const { namespaces } = registry.finalize(
        new Map([['stix', NS.stix]])
      );
      expect(namespaces.get('stix')).toBe(NS.stix);
    });

    it('adds extra override prefixes to the document', () => {
      const registry = makeRegistry();
      const { namespaces, schemaLocations } = registry.finalize(
        { custom: 'urn:custom' },
        { 'urn:custom': 'http://custom.test/custom.xsd' }
      );

      expect(namespaces.get('custom')).toBe('urn:custom');
      expect(schemaLocations.get('urn:custom')).toBe(
        'http://custom.test/custom.xsd'
      );
      expect(registry.diagnostics).toEqual([]);
    });

    it('publishes nothing when finalization fails', () => {
      const onDiagnostic = vi.fn();
      const registry = makeRegistry(TYPES, { onDiagnostic });
      registry.collect({ type: 'Mystery' });
      registry.collect({ type: 'Package', inputNamespaces: { xsi: 'urn:x' } });

      expect(() => registry.finalize()).toThrow(PrefixConflictError);
      expect(registry.diagnostics).toEqual([]);
      expect(onDiagnostic).not.toHaveBeenCalled();
      expect(() => registry.finalizedNamespaces).toThrow(RegistryStateError);
    });
  });

  describe('schema locations', () => {
    it('prefers the published location over input and override values', () => {
      const registry = makeRegistry();
      collectTree(registry, buildParsedPackage());
      const { schemaLocations } = registry.finalize(undefined, {
        [NS.stix]: 'http://mirror.test/stix_core.xsd',
      });

      expect(schemaLocations.get(NS.stix)).toBe(
        'http://stix.mitre.org/XMLSchema/core/1.1.1/stix_core.xsd'
      );
    });

    it('uses input locations for namespaces without a published schema', () => {
      const registry = makeRegistry();
      collectTree(registry, buildParsedPackage());
      const { schemaLocations } = registry.finalize();

      expect(schemaLocations.get(NS.acme)).toBe(
        'http://acme.test/schemas/feed.xsd'
      );
      expect(
        registry.diagnostics.filter(
          (d) => d.code === DIAGNOSTIC_CODES.UNRESOLVED_SCHEMA_LOCATION
        )
      ).toEqual([]);
    });

    it('lets overrides win over input locations', () => {
      const registry = makeRegistry();
      collectTree(registry, buildParsedPackage());
      const { schemaLocations } = registry.finalize(undefined, {
        [NS.acme]: 'http://override.test/feed.xsd',
      });

      expect(schemaLocations.get(NS.acme)).toBe('http://override.test/feed.xsd');
    });

    it('warns about namespaces without any location and leaves them out', () => {
      const lines: string[] = [];
      const onDiagnostic = vi.fn();
      const registry = makeRegistry(TYPES, {
        logger: createLogger('warn', (line) => lines.push(line)),
        onDiagnostic,
      });
      registry.collect({ type: 'Package', inputNamespaces: { acme: NS.acme } });
      const { namespaces, schemaLocations } = registry.finalize();

      expect(namespaces.get('acme')).toBe(NS.acme);
      expect(schemaLocations.has(NS.acme)).toBe(false);
      expect(registry.diagnostics).toHaveLength(1);
      const [diagnostic] = registry.diagnostics;
      expect(diagnostic).toEqual({
        code: DIAGNOSTIC_CODES.UNRESOLVED_SCHEMA_LOCATION,
        severity: 'warn',
        phase: 'schemaLocations',
        message: `Unable to map namespace '${NS.acme}' to schemaLocation`,
        details: { namespace: NS.acme },
      });
      expect(() => assertDiagnosticEnvelope(diagnostic)).not.toThrow();
      expect(onDiagnostic).toHaveBeenCalledTimes(1);
      expect(lines).toEqual([
        `[nsmap] warn: UNRESOLVED_SCHEMA_LOCATION: Unable to map namespace '${NS.acme}' to schemaLocation\n`,
      ]);
    });

    it('warns for extension namespaces that only have a prefix', () => {
      const registry = makeRegistry({ Pattern: { namespace: NS.capec } });
      registry.collect({ type: 'Pattern' });
      const { namespaces } = registry.finalize();

      expect(namespaces.get('capec')).toBe(NS.capec);
      expect(registry.diagnostics.map((d) => d.details)).toEqual([
        { namespace: NS.capec },
      ]);
    });

    it('keeps input locations for namespaces that are not declared', () => {
      const registry = makeRegistry();
      registry.collect({
        type: 'Package',
        inputSchemaLocations: { 'urn:unused': 'http://unused.test/u.xsd' },
      });
      const { schemaLocations } = registry.finalize();

      expect(schemaLocations.get('urn:unused')).toBe('http://unused.test/u.xsd');
    });
  });

  describe('lifecycle', () => {
    it('rejects a second finalize', () => {
      const registry = makeRegistry();
      registry.finalize();

      const error = catchError(RegistryStateError, () => registry.finalize());
      expect(error.errorCode).toBe(
        ErrorCode.REGISTRY_ALREADY_FINALIZED
      );
    });

    it('rejects collect and merge after finalize', () => {
      const registry = makeRegistry();
      registry.finalize();

      expect(() => registry.collect({ type: 'Package' })).toThrow(
        'Cannot collect: namespace registry is already finalized'
      );
      expect(() => makeRegistry().merge(registry)).toThrow(
        'Cannot merge: namespace registry is already finalized'
      );
    });

    it('rejects reads before finalize', () => {
      const registry = makeRegistry();
      const error = catchError(
        RegistryStateError,
        () => registry.finalizedSchemaLocations
      );
      expect(error.errorCode).toBe(
        ErrorCode.REGISTRY_NOT_FINALIZED
      );
    });

    it('exposes the finalized maps after finalize', () => {
      const registry = makeRegistry();
      const result = registry.finalize();

      expect(registry.isFinalized).toBe(true);
      expect(registry.finalizedNamespaces).toBe(result.namespaces);
      expect(registry.finalizedSchemaLocations).toBe(result.schemaLocations);
    });
  });

  describe('merge', () => {
    it('unions visited types and parsed-source data', () => {
      const left = makeRegistry();
      left.collect({ type: 'Indicator' });
      const right = makeRegistry();
      right.collect({
        type: 'Campaign',
        inputNamespaces: { acme: NS.acme },
        inputSchemaLocations: { [NS.acme]: 'http://acme.test/feed.xsd' },
      });

      const { namespaces, schemaLocations } = left.merge(right).finalize();

      expect(namespaces.get('indicator')).toBe(NS.indicator);
      expect(namespaces.get('campaign')).toBe(NS.campaign);
      expect(namespaces.get('acme')).toBe(NS.acme);
      expect(schemaLocations.get(NS.acme)).toBe('http://acme.test/feed.xsd');
      expect(right.isFinalized).toBe(false);
    });
  });

  describe('validateAliases', () => {
    it('reports prefixes shared by several namespaces', () => {
      const registry = makeRegistry();
      const found = registry.validateAliases({
        'urn:a': 'x',
        'urn:b': 'x',
        'urn:c': 'y',
      });

      expect(found).toEqual([
        {
          code: DIAGNOSTIC_CODES.DUPLICATE_ALIAS,
          severity: 'warn',
          phase: 'validate',
          message: "namespace alias 'x' mapped to 'urn:a' and 'urn:b'",
          details: { prefix: 'x', namespaces: ['urn:a', 'urn:b'] },
        },
      ]);
      expect(registry.diagnostics).toEqual([]);

      registry.finalize();
      expect(registry.diagnostics).toEqual(found);
    });

    it('publishes nothing when finalize fails afterwards', () => {
      const onDiagnostic = vi.fn();
      const registry = makeRegistry(TYPES, { onDiagnostic });
      registry.validateAliases({ 'urn:a': 'x', 'urn:b': 'x' });

      expect(() => registry.finalize({ stix: 'urn:other' })).toThrow(
        PrefixConflictError
      );
      expect(onDiagnostic).not.toHaveBeenCalled();
      expect(registry.diagnostics).toEqual([]);
    });
  });
});
