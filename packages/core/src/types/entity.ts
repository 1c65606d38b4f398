/**
 * Entity model consumed by the namespace registry.
 *
 * Only the type tag and the parsed-source maps are read; everything else on a
 * node belongs to the caller's object model.
 */

export type NamespaceMap = Readonly<Record<string, string>>;

export interface Entity {
  /** Key into the TypeMetadataTable */
  readonly type: string;
  /** prefix -> namespace declared by the XML document this entity was parsed from */
  readonly inputNamespaces?: NamespaceMap;
  /** namespace -> schema location declared by the XML document this entity was parsed from */
  readonly inputSchemaLocations?: NamespaceMap;
  readonly children?: readonly Entity[];
}

/**
 * Static, per-type namespace metadata.
 */
export interface TypeMetadata {
  /** Home namespace URI of the type */
  namespace?: string;
  /** Explicit prefix; wins over qualifiedName */
  prefix?: string;
  /** `prefix:LocalName`, e.g. the type's xsi:type value */
  qualifiedName?: string;
}

/**
 * Namespace and prefix used to mint identifiers in the output document.
 */
export interface IdNamespace {
  readonly namespace: string;
  readonly prefix: string;
}

/** Accepted wherever a string -> string mapping is passed in. */
export type StringMapInput =
  | ReadonlyMap<string, string>
  | Readonly<Record<string, string>>;

function isStringMap(
  input: StringMapInput
): input is ReadonlyMap<string, string> {
  return input instanceof Map;
}

export function entriesOf(
  input: StringMapInput | undefined
): Array<[string, string]> {
  if (!input) return [];
  if (isStringMap(input)) return Array.from(input.entries());
  return Object.entries(input);
}
