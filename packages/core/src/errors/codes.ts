/**
 * Error Code Infrastructure
 * Stable error codes and exit code mappings.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Namespace resolution errors (E100–E199)
  PREFIX_CONFLICT = 'E100',
  UNKNOWN_NAMESPACE = 'E101',

  // Registry lifecycle errors (E200–E299)
  REGISTRY_ALREADY_FINALIZED = 'E200',
  REGISTRY_NOT_FINALIZED = 'E201',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Parse Errors (E400–E499)
  PARSE_ERROR = 'E400',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.PREFIX_CONFLICT]: 10,
  [ErrorCode.UNKNOWN_NAMESPACE]: 11,
  [ErrorCode.REGISTRY_ALREADY_FINALIZED]: 20,
  [ErrorCode.REGISTRY_NOT_FINALIZED]: 21,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.PARSE_ERROR]: 60,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
