/**
 * Error hierarchy for nsmap
 * Structured errors with a code, severity and typed context
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  prefix?: string;
  namespace?: string;
  existingNamespace?: string;
  newNamespace?: string;
  setting?: string;
  input?: string;
  suggestion?: string;
  value?: unknown;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface UserError {
  message: string;
  code: ErrorCode;
  severity: Severity;
  prefix?: string;
  namespace?: string;
}

export interface NsmapErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all nsmap errors
 */
export abstract class NsmapError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  declare readonly cause?: Error;

  constructor(params: NsmapErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack
   * - prod: excludes stack
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Return a minimal, safe structure for external exposure */
  toUserError(): UserError {
    return {
      message: this.message,
      code: this.errorCode,
      severity: this.severity,
      prefix: this.context?.prefix,
      namespace: this.context?.namespace ?? this.context?.newNamespace,
    };
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }
}

/**
 * A prefix was claimed for two different namespaces while merging.
 */
export class PrefixConflictError extends NsmapError {
  constructor(params: {
    prefix: string;
    existingNamespace: string;
    newNamespace: string;
    cause?: Error;
  }) {
    const { prefix, existingNamespace, newNamespace } = params;
    super({
      message: `Cannot map namespace prefix '${prefix}' to '${newNamespace}': prefix already mapped to '${existingNamespace}'.`,
      errorCode: ErrorCode.PREFIX_CONFLICT,
      context: {
        prefix,
        existingNamespace,
        newNamespace,
        suggestion: `Bind '${newNamespace}' to a prefix other than '${prefix}' in the namespace overrides`,
      },
      cause: params.cause,
    });
  }

  get prefix(): string {
    return this.context?.prefix ?? '';
  }
  get existingNamespace(): string {
    return this.context?.existingNamespace ?? '';
  }
  get newNamespace(): string {
    return this.context?.newNamespace ?? '';
  }
}

/**
 * A namespace without a declared prefix is missing from the vocabulary tables.
 */
export class UnknownNamespaceError extends NsmapError {
  constructor(params: { namespace: string; typeTag?: string }) {
    super({
      message: `No prefix is known for namespace '${params.namespace}'.`,
      errorCode: ErrorCode.UNKNOWN_NAMESPACE,
      context: {
        namespace: params.namespace,
        typeTag: params.typeTag,
        suggestion:
          'Declare a prefix or qualified name on the entity type, or add the namespace to the vocabulary tables',
      },
    });
  }

  get namespace(): string {
    return this.context?.namespace ?? '';
  }
}

/**
 * A registry was used outside of its collect → finalize → read lifecycle.
 */
export class RegistryStateError extends NsmapError {
  constructor(params: {
    message: string;
    errorCode:
      | ErrorCode.REGISTRY_ALREADY_FINALIZED
      | ErrorCode.REGISTRY_NOT_FINALIZED;
  }) {
    super({ message: params.message, errorCode: params.errorCode });
  }
}

/**
 * Configuration and setup errors
 */
export class ConfigError extends NsmapError {
  constructor(params: {
    message: string;
    context?: ErrorContext & { setting?: string };
    severity?: Severity;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.CONFIGURATION_ERROR,
      context: params.context,
      severity: params.severity,
      cause: params.cause,
    });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

/**
 * Input parsing errors (document trees, type tables, vocabulary files)
 */
export class ParseError extends NsmapError {
  constructor(params: {
    message: string;
    context?: ErrorContext & { input?: string };
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.PARSE_ERROR,
      context: params.context,
      cause: params.cause,
    });
  }

  get input(): string | undefined {
    return this.context?.input;
  }
}

/**
 * Utility functions for error handling
 */
export function isNsmapError(error: unknown): error is NsmapError {
  return error instanceof NsmapError;
}

export function isPrefixConflictError(
  error: unknown
): error is PrefixConflictError {
  return error instanceof PrefixConflictError;
}
