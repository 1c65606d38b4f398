import { randomUUID } from 'node:crypto';

import { ConfigError } from '../types/errors.js';
import type { IdNamespace } from '../types/entity.js';

export const EXAMPLE_ID_NAMESPACE: IdNamespace = Object.freeze({
  namespace: 'http://example.com',
  prefix: 'example',
});

export function assertIdNamespace(idNamespace: IdNamespace): IdNamespace {
  if (!idNamespace.namespace) {
    throw new ConfigError({
      message: 'Identifier namespace URI must not be empty',
      context: { setting: 'idNamespace.namespace' },
    });
  }
  if (!idNamespace.prefix || /[:\s]/.test(idNamespace.prefix)) {
    throw new ConfigError({
      message: `Invalid identifier namespace prefix '${idNamespace.prefix}'`,
      context: { setting: 'idNamespace.prefix', prefix: idNamespace.prefix },
    });
  }
  return idNamespace;
}

/**
 * Mints document identifiers of the form `prefix:type-uuid`.
 */
export class IdGenerator {
  constructor(
    readonly idNamespace: IdNamespace = EXAMPLE_ID_NAMESPACE,
    private readonly uuid: () => string = randomUUID
  ) {
    assertIdNamespace(idNamespace);
  }

  create(typeName = 'guid'): string {
    return `${this.idNamespace.prefix}:${typeName}-${this.uuid()}`;
  }
}
