import { entriesOf, type StringMapInput } from '../types/entity.js';

const SEPARATOR = '\n\t';

function compareCodeUnits(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * `xmlns:prefix="namespace"` declarations sorted by namespace URI (then
 * prefix), joined with newline + tab.
 */
export function renderXmlns(namespaces: StringMapInput): string {
  return entriesOf(namespaces)
    .sort(
      ([prefixA, nsA], [prefixB, nsB]) =>
        compareCodeUnits(nsA, nsB) || compareCodeUnits(prefixA, prefixB)
    )
    .map(([prefix, namespace]) => `xmlns:${prefix}="${namespace}"`)
    .join(SEPARATOR);
}

/**
 * The `xsi:schemaLocation` attribute with `namespace location` pairs sorted by
 * namespace URI, or "" when there are none.
 */
export function renderSchemaLocation(schemaLocations: StringMapInput): string {
  const pairs = entriesOf(schemaLocations).sort(([nsA], [nsB]) =>
    compareCodeUnits(nsA, nsB)
  );
  if (pairs.length === 0) return '';

  const content = pairs
    .map(([namespace, location]) => `${namespace} ${location}`)
    .join(SEPARATOR);
  return `xsi:schemaLocation="${SEPARATOR}${content}"`;
}

/**
 * Everything the root element needs: namespace declarations followed by the
 * schema-location attribute. Empty parts are left out.
 */
export function renderNamespaceDefinitions(
  namespaces: StringMapInput,
  schemaLocations: StringMapInput
): string {
  return [renderXmlns(namespaces), renderSchemaLocation(schemaLocations)]
    .filter((part) => part.length > 0)
    .join(SEPARATOR);
}
