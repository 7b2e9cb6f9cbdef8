import { EmptyExportSetError, ExportMismatchError, SignatureMismatchError } from '../utils/errors';
import { ExportDeclaration, ExportOptions, ExportRecord, NormalizedDeclarations, SemaExport } from './types';

export interface VerificationContext {
  module: string;
  file: string;
}

/**
 * Cross-checks declared exports against what the compiler reports.
 *
 * Explicit mode keeps exactly the declared names; auto mode keeps every
 * reported export and layers declared options on top. Per-name checks run
 * before the empty-module check.
 */
export function verifyExports(
  declarations: NormalizedDeclarations,
  reported: readonly SemaExport[],
  context: VerificationContext
): ExportRecord[] {
  const reportedByName = new Map(reported.map(entry => [entry.name, entry] as const));

  let records: ExportRecord[];
  if (declarations.mode === 'explicit') {
    records = declarations.entries.map(declaration =>
      toRecord(requireReported(declaration, reportedByName, context), declaration.options, context)
    );
  } else {
    const overrides = new Map(declarations.overrides.map(declaration => [declaration.name, declaration] as const));
    for (const declaration of overrides.values()) {
      requireReported(declaration, reportedByName, context);
    }
    records = reported.map(entry => toRecord(entry, overrides.get(entry.name)?.options ?? {}, context));
  }

  if (records.length === 0) {
    throw new EmptyExportSetError(`no nifs found in module ${context.module}`, {
      file: context.file,
      module: context.module,
    });
  }

  return records;
}

function requireReported(
  declaration: ExportDeclaration,
  reportedByName: Map<string, SemaExport>,
  context: VerificationContext
): SemaExport {
  const reported = reportedByName.get(declaration.name);
  if (!reported) {
    throw new ExportMismatchError(
      `nif \`${declaration.name}\` is declared but not exported by the compiled source of ${context.module}`,
      { file: context.file, module: context.module, export: declaration.name }
    );
  }
  return reported;
}

function toRecord(reported: SemaExport, options: ExportOptions, context: VerificationContext): ExportRecord {
  checkSignatureHints(reported, options, context);

  return {
    name: reported.name,
    concurrency: options.concurrency ?? reported.concurrency,
    signature: { params: [...reported.signature.params], returns: reported.signature.returns },
    options: { ...options },
    doc: null,
    resources: [],
  };
}

function checkSignatureHints(reported: SemaExport, options: ExportOptions, context: VerificationContext): void {
  const { params, returns } = reported.signature;

  if (options.params !== undefined && !sameTypes(options.params, params)) {
    throw new SignatureMismatchError(
      `nif \`${reported.name}\` declares parameters (${options.params.join(', ')}) but the compiled function takes (${params.join(', ')})`,
      { file: context.file, module: context.module, export: reported.name }
    );
  }

  if (options.returns !== undefined && options.returns !== returns) {
    throw new SignatureMismatchError(
      `nif \`${reported.name}\` declares return type ${options.returns} but the compiled function returns ${returns}`,
      { file: context.file, module: context.module, export: reported.name }
    );
  }
}

function sameTypes(left: readonly string[], right: readonly string[]): boolean {
  return left.length === right.length && left.every((type, index) => type === right[index]);
}
