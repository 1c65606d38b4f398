import type { Severity } from '../errors/codes.js';

export const DIAGNOSTIC_PHASES = {
  COLLECT: 'collect',
  NAMESPACES: 'namespaces',
  SCHEMA_LOCATIONS: 'schemaLocations',
  VALIDATE: 'validate',
} as const;

export type DiagnosticPhase =
  (typeof DIAGNOSTIC_PHASES)[keyof typeof DIAGNOSTIC_PHASES];

export const DIAGNOSTIC_CODES = {
  UNRESOLVED_SCHEMA_LOCATION: 'UNRESOLVED_SCHEMA_LOCATION',
  DUPLICATE_ALIAS: 'DUPLICATE_ALIAS',
  EXAMPLE_NAMESPACE_DROPPED: 'EXAMPLE_NAMESPACE_DROPPED',
  UNKNOWN_TYPE_TAG: 'UNKNOWN_TYPE_TAG',
} as const;

export type KnownDiagnosticCode =
  (typeof DIAGNOSTIC_CODES)[keyof typeof DIAGNOSTIC_CODES];

export type DiagnosticCode = KnownDiagnosticCode;

interface DiagnosticCodeInfo {
  severity: Severity;
  phases: ReadonlySet<DiagnosticPhase>;
}

const CODE_INFO: Record<KnownDiagnosticCode, DiagnosticCodeInfo> = {
  [DIAGNOSTIC_CODES.UNRESOLVED_SCHEMA_LOCATION]: {
    severity: 'warn',
    phases: new Set([DIAGNOSTIC_PHASES.SCHEMA_LOCATIONS]),
  },
  [DIAGNOSTIC_CODES.DUPLICATE_ALIAS]: {
    severity: 'warn',
    phases: new Set([DIAGNOSTIC_PHASES.VALIDATE]),
  },
  [DIAGNOSTIC_CODES.EXAMPLE_NAMESPACE_DROPPED]: {
    severity: 'info',
    phases: new Set([DIAGNOSTIC_PHASES.NAMESPACES]),
  },
  [DIAGNOSTIC_CODES.UNKNOWN_TYPE_TAG]: {
    severity: 'info',
    phases: new Set([DIAGNOSTIC_PHASES.COLLECT]),
  },
};

const KNOWN_CODES = new Set<string>(Object.values(DIAGNOSTIC_CODES));

export function isKnownDiagnosticCode(
  code: unknown
): code is KnownDiagnosticCode {
  return typeof code === 'string' && KNOWN_CODES.has(code);
}

export function getAllowedDiagnosticPhases(
  code: DiagnosticCode
): ReadonlySet<DiagnosticPhase> | undefined {
  return CODE_INFO[code]?.phases;
}

export function getDiagnosticSeverity(code: DiagnosticCode): Severity {
  return CODE_INFO[code].severity;
}
