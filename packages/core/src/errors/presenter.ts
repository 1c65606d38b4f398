/**
 * ErrorPresenter: turns NsmapError instances into CLI or JSON view objects.
 */

import type { ErrorCode } from './codes.js';
import type {
  ErrorContext,
  NsmapError,
  SerializedError,
} from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

/** Both bindings of a prefix that could not be merged. */
export interface PrefixConflictView {
  prefix: string;
  existing: string;
  incoming: string;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  conflict?: PrefixConflictView;
  workaround?: string;
  colors: boolean;
  terminalWidth: number;
}

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: NsmapError): CLIErrorView {
    return {
      title: this.#formatTitle(error),
      code: error.errorCode,
      location: this.#formatLocation(error.context),
      conflict: this.#formatConflict(error.context),
      workaround: error.context?.suggestion,
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.#getTerminalWidth(this.options.terminalWidth),
    };
  }

  /** JSON-safe view: stack traces only outside production. */
  formatForJSON(error: NsmapError): SerializedError {
    return error.toJSON(this._env);
  }

  // Helpers
  #formatTitle(error: NsmapError): string {
    return `Error ${error.errorCode}: ${error.message}`;
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    if (!ctx) return undefined;
    if (ctx.prefix !== undefined) return `Prefix: ${ctx.prefix}`;
    if (ctx.namespace !== undefined) return `Namespace: ${ctx.namespace}`;
    if (ctx.setting !== undefined) return `Setting: ${ctx.setting}`;
    if (ctx.input !== undefined) return `Input: ${ctx.input}`;
    return undefined;
  }

  #formatConflict(ctx?: ErrorContext): PrefixConflictView | undefined {
    if (
      ctx?.prefix === undefined ||
      ctx.existingNamespace === undefined ||
      ctx.newNamespace === undefined
    ) {
      return undefined;
    }
    return {
      prefix: ctx.prefix,
      existing: ctx.existingNamespace,
      incoming: ctx.newNamespace,
    };
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    // Default to enabling colors in dev when not specified
    if (typeof opt === 'undefined') return this._env === 'dev';
    return opt;
  }

  #getTerminalWidth(opt?: number): number {
    return opt || process.stdout?.columns || 80;
  }
}
