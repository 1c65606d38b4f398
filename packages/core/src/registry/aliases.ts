import { DIAGNOSTIC_CODES, DIAGNOSTIC_PHASES } from '../diag/codes.js';
import {
  createDiagnostic,
  type DiagnosticEnvelope,
  type DuplicateAliasDetails,
} from '../diag/validate.js';
import { entriesOf, type StringMapInput } from '../types/entity.js';

/**
 * Group a namespace -> prefix view by prefix and report each prefix claimed by
 * more than one namespace. Namespaces are listed in input order.
 */
export function findDuplicateAliases(
  namespaceAliases: StringMapInput
): Array<DiagnosticEnvelope<DuplicateAliasDetails>> {
  const byPrefix = new Map<string, string[]>();
  for (const [namespace, prefix] of entriesOf(namespaceAliases)) {
    const namespaces = byPrefix.get(prefix);
    if (namespaces) {
      namespaces.push(namespace);
    } else {
      byPrefix.set(prefix, [namespace]);
    }
  }

  const found: Array<DiagnosticEnvelope<DuplicateAliasDetails>> = [];
  for (const [prefix, namespaces] of byPrefix) {
    if (namespaces.length < 2) continue;
    found.push(
      createDiagnostic(
        DIAGNOSTIC_CODES.DUPLICATE_ALIAS,
        DIAGNOSTIC_PHASES.VALIDATE,
        `namespace alias '${prefix}' mapped to ${namespaces.map((ns) => `'${ns}'`).join(' and ')}`,
        { prefix, namespaces }
      )
    );
  }
  return found;
}

/**
 * Turn a namespace -> prefix map into prefix -> namespace. When a prefix is
 * shared the last namespace wins; run findDuplicateAliases first to report it.
 */
export function invertNamespaceAliases(
  namespaceAliases: StringMapInput
): Map<string, string> {
  const inverted = new Map<string, string>();
  for (const [namespace, prefix] of entriesOf(namespaceAliases)) {
    inverted.set(prefix, namespace);
  }
  return inverted;
}
