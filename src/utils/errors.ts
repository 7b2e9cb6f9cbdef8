/**
 * Build error hierarchy.
 *
 * Every failure aborts the whole module build; there is no degraded mode.
 *
 * - ConfigurationError: contradictory or malformed build options
 * - DependencyError: a referenced source file could not be read
 * - ExportMismatchError: a declared export is absent from the compiled module
 * - SignatureMismatchError: a declared signature hint disagrees with the compiled one
 * - EmptyExportSetError: the module would export nothing
 * - CompilerError: the native compiler rejected the module
 */

export type ErrorCategory = 'configuration' | 'dependency' | 'semantic' | 'empty' | 'compiler';

export interface SourceLocation {
  file: string;
  line?: number;
}

export interface ErrorContext {
  file?: string;
  line?: number;
  module?: string;
  export?: string;
  [key: string]: unknown;
}

export interface NifBuildErrorJSON {
  code: string;
  category: ErrorCategory;
  message: string;
  context: ErrorContext;
}

export function formatLocation(location: SourceLocation): string {
  return location.line !== undefined ? `${location.file}:${location.line}` : location.file;
}

export abstract class NifBuildError extends Error {
  abstract readonly code: string;
  abstract readonly category: ErrorCategory;
  readonly context: ErrorContext;
  readonly description: string;

  constructor(description: string, context: ErrorContext = {}) {
    super(
      context.file !== undefined
        ? `${formatLocation({ file: context.file, line: context.line })}: ${description}`
        : description
    );
    this.name = this.constructor.name;
    this.description = description;
    this.context = context;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): NifBuildErrorJSON {
    return {
      code: this.code,
      category: this.category,
      message: this.message,
      context: this.context,
    };
  }
}

export class ConfigurationError extends NifBuildError {
  readonly code: string;
  readonly category = 'configuration' as const;

  constructor(description: string, code: string, context: ErrorContext = {}) {
    super(description, context);
    this.code = code;
  }
}

export class DependencyError extends NifBuildError {
  readonly code = 'ERR_DEPENDENCY_UNREADABLE';
  readonly category = 'dependency' as const;
}

export class ExportMismatchError extends NifBuildError {
  readonly code = 'ERR_EXPORT_MISSING';
  readonly category = 'semantic' as const;
}

export class SignatureMismatchError extends NifBuildError {
  readonly code = 'ERR_SIGNATURE_MISMATCH';
  readonly category = 'semantic' as const;
}

export class EmptyExportSetError extends NifBuildError {
  readonly code = 'ERR_NO_EXPORTS';
  readonly category = 'empty' as const;
}

export class CompilerError extends NifBuildError {
  readonly code = 'ERR_COMPILE_FAILED';
  readonly category = 'compiler' as const;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
