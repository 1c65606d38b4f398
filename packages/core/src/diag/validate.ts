import type { Severity } from '../errors/codes.js';
import {
  DIAGNOSTIC_CODES,
  type DiagnosticCode,
  type DiagnosticPhase,
  type KnownDiagnosticCode,
  getAllowedDiagnosticPhases,
  getDiagnosticSeverity,
  isKnownDiagnosticCode,
} from './codes.js';

export interface UnresolvedSchemaLocationDetails {
  namespace: string;
}

export interface DuplicateAliasDetails {
  prefix: string;
  namespaces: string[];
}

export interface ExampleNamespaceDroppedDetails {
  prefix: string;
  dropped: string;
  kept: string;
}

export interface UnknownTypeTagDetails {
  typeTag: string;
}

export interface DiagnosticDetailsByCode {
  [DIAGNOSTIC_CODES.UNRESOLVED_SCHEMA_LOCATION]: UnresolvedSchemaLocationDetails;
  [DIAGNOSTIC_CODES.DUPLICATE_ALIAS]: DuplicateAliasDetails;
  [DIAGNOSTIC_CODES.EXAMPLE_NAMESPACE_DROPPED]: ExampleNamespaceDroppedDetails;
  [DIAGNOSTIC_CODES.UNKNOWN_TYPE_TAG]: UnknownTypeTagDetails;
}

export interface DiagnosticEnvelope<Details = unknown> {
  code: DiagnosticCode;
  severity: Severity;
  phase: DiagnosticPhase;
  message: string;
  details?: Details;
}

export type DiagnosticListener = (diagnostic: DiagnosticEnvelope) => void;

export function createDiagnostic<C extends KnownDiagnosticCode>(
  code: C,
  phase: DiagnosticPhase,
  message: string,
  details: DiagnosticDetailsByCode[C]
): DiagnosticEnvelope<DiagnosticDetailsByCode[C]> {
  return {
    code,
    severity: getDiagnosticSeverity(code),
    phase,
    message,
    details,
  };
}

type DetailsValidator = (details: unknown) => boolean;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

function buildObjectValidator(
  required: Record<string, (value: unknown) => boolean>
): DetailsValidator {
  return (value) => {
    if (!isPlainObject(value)) {
      return false;
    }
    for (const [key, check] of Object.entries(required)) {
      if (!check(value[key])) {
        return false;
      }
    }
    return true;
  };
}

const DETAIL_VALIDATORS: Record<KnownDiagnosticCode, DetailsValidator> = {
  [DIAGNOSTIC_CODES.UNRESOLVED_SCHEMA_LOCATION]: buildObjectValidator({
    namespace: isString,
  }),
  [DIAGNOSTIC_CODES.DUPLICATE_ALIAS]: buildObjectValidator({
    prefix: isString,
    namespaces: (v) => Array.isArray(v) && v.length >= 2 && v.every(isString),
  }),
  [DIAGNOSTIC_CODES.EXAMPLE_NAMESPACE_DROPPED]: buildObjectValidator({
    prefix: isString,
    dropped: isString,
    kept: isString,
  }),
  [DIAGNOSTIC_CODES.UNKNOWN_TYPE_TAG]: buildObjectValidator({
    typeTag: isString,
  }),
};

/**
 * Throws when the envelope uses an unknown code, a phase the code is not
 * registered for, a severity other than the code's, or a malformed payload.
 */
export function assertDiagnosticEnvelope(envelope: DiagnosticEnvelope): void {
  if (!isKnownDiagnosticCode(envelope.code)) {
    throw new Error(`Unknown diagnostic code: ${String(envelope.code)}`);
  }
  const phases = getAllowedDiagnosticPhases(envelope.code);
  if (!phases?.has(envelope.phase)) {
    throw new Error(
      `Diagnostic ${envelope.code} is not allowed in phase '${envelope.phase}'`
    );
  }
  if (envelope.severity !== getDiagnosticSeverity(envelope.code)) {
    throw new Error(
      `Diagnostic ${envelope.code} must use severity '${getDiagnosticSeverity(envelope.code)}'`
    );
  }
  if (!DETAIL_VALIDATORS[envelope.code](envelope.details)) {
    throw new Error(`Invalid details payload for ${envelope.code}`);
  }
}
