import type { Entity, TypeMetadata } from '../types/entity.js';

export const NS = {
  stix: 'http://stix.mitre.org/stix-1',
  indicator: 'http://stix.mitre.org/Indicator-2',
  campaign: 'http://stix.mitre.org/Campaign-1',
  ttp: 'http://stix.mitre.org/TTP-1',
  fileObj: 'http://cybox.mitre.org/objects#FileObject-2',
  capec: 'http://capec.mitre.org/capec-2',
  acme: 'urn:acme:threat-feed',
} as const;

export const TYPES: Record<string, TypeMetadata> = {
  Package: { namespace: NS.stix, prefix: 'stix' },
  Indicator: {
    namespace: NS.indicator,
    qualifiedName: 'indicator:IndicatorType',
  },
  Campaign: { namespace: NS.campaign },
  TTP: { namespace: NS.ttp, qualifiedName: 'not:a:qname' },
  FileObject: { namespace: NS.fileObj, prefix: 'FileObj' },
  Observable: {},
};

export const BASELINE_WITH_EXAMPLE: Record<string, string> = {
  xsi: 'http://www.w3.org/2001/XMLSchema-instance',
  stix: 'http://stix.mitre.org/stix-1',
  stixCommon: 'http://stix.mitre.org/common-1',
  stixVocabs: 'http://stix.mitre.org/default_vocabularies-1',
  cybox: 'http://cybox.mitre.org/cybox-2',
  cyboxCommon: 'http://cybox.mitre.org/common-2',
  cyboxVocabs: 'http://cybox.mitre.org/default_vocabularies-2',
  example: 'http://example.com',
};

export const BASELINE_SCHEMA_LOCATIONS: Record<string, string> = {
  'http://stix.mitre.org/stix-1':
    'http://stix.mitre.org/XMLSchema/core/1.1.1/stix_core.xsd',
  'http://stix.mitre.org/common-1':
    'http://stix.mitre.org/XMLSchema/common/1.1.1/stix_common.xsd',
  'http://stix.mitre.org/default_vocabularies-1':
    'http://stix.mitre.org/XMLSchema/default_vocabularies/1.1.1/stix_default_vocabularies.xsd',
  'http://cybox.mitre.org/cybox-2':
    'http://cybox.mitre.org/XMLSchema/core/2.1/cybox_core.xsd',
  'http://cybox.mitre.org/common-2':
    'http://cybox.mitre.org/XMLSchema/common/2.1/cybox_common.xsd',
  'http://cybox.mitre.org/default_vocabularies-2':
    'http://cybox.mitre.org/XMLSchema/default_vocabularies/2.1/cybox_default_vocabularies.xsd',
};

/** Package → Indicator → FileObject, plus a Campaign sibling. */
export function buildPackage(): Entity {
  return {
    type: 'Package',
    children: [
      {
        type: 'Indicator',
        children: [{ type: 'Observable', children: [{ type: 'FileObject' }] }],
      },
      { type: 'Campaign' },
    ],
  };
}

/** A package as if parsed from a document that declared its own namespaces. */
export function buildParsedPackage(): Entity {
  return {
    type: 'Package',
    inputNamespaces: {
      stix: NS.stix,
      acme: NS.acme,
      example: 'http://example.com/',
    },
    inputSchemaLocations: {
      [NS.acme]: 'http://acme.test/schemas/feed.xsd',
      [NS.stix]: 'file:///tmp/stix_core.xsd',
    },
    children: [{ type: 'Indicator' }],
  };
}

export const XSI = 'http://www.w3.org/2001/XMLSchema-instance';

/** A small vocabulary file with one schema-less namespace. */
export const DEMO_VOCABULARY_FILE = {
  baseline: { xsi: XSI, core: 'urn:demo:core' },
  vocabularies: [
    {
      name: 'xml',
      infrastructure: true,
      namespaces: [{ namespace: XSI, prefix: 'xsi' }],
    },
    {
      name: 'demo',
      namespaces: [
        {
          namespace: 'urn:demo:core',
          prefix: 'core',
          schemaLocation: 'http://demo.test/core.xsd',
        },
        {
          namespace: 'urn:demo:report',
          prefix: 'report',
          schemaLocation: 'http://demo.test/report.xsd',
        },
        { namespace: 'urn:demo:ext', prefix: 'ext' },
      ],
    },
  ],
};

export const DEMO_TYPES: Record<string, TypeMetadata> = {
  Report: { namespace: 'urn:demo:report' },
  Note: { namespace: 'urn:demo:ext', prefix: 'ext' },
};

export const MAEC = {
  package: 'http://maec.mitre.org/XMLSchema/maec-package-2',
  bundle: 'http://maec.mitre.org/XMLSchema/maec-bundle-4',
} as const;

/** Third-party namespaces layered over the bundled tables. */
export const MAEC_OVERLAY_FILE = {
  vocabularies: [
    {
      name: 'maec',
      namespaces: [
        {
          namespace: MAEC.package,
          prefix: 'maecPackage',
          schemaLocation:
            'http://maec.mitre.org/language/version4.1/maec_package_schema.xsd',
        },
        {
          namespace: MAEC.bundle,
          prefix: 'maecBundle',
          schemaLocation:
            'http://maec.mitre.org/language/version4.1/maec_bundle_schema.xsd',
        },
      ],
    },
  ],
};
