import { z } from 'zod';
import { BuildOptions, CONCURRENCY_MODES, DeclarationEntry, ExportOptions, HOST_FLAVORS, SourceFragment } from '../builder/types';
import { ConfigurationError } from '../utils/errors';

export const WILDCARD_MARKER = '...';

const nifName = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, { message: 'nif names must be plain identifiers' });

const exportOptionsSchema = z
  .object({
    concurrency: z.enum(CONCURRENCY_MODES).optional(),
    alias: z.string().min(1).optional(),
    leakCheck: z.boolean().optional(),
    params: z.array(z.string()).optional(),
    returns: z.string().optional(),
  })
  .strict();

const declarationSchema: z.ZodType<DeclarationEntry, z.ZodTypeDef, unknown> = z.union([
  z.literal(WILDCARD_MARKER).transform((): DeclarationEntry => ({ kind: 'wildcard' })),
  nifName.transform((name): DeclarationEntry => ({ kind: 'name', name })),
  z
    .tuple([nifName, exportOptionsSchema])
    .transform(([name, options]): DeclarationEntry => ({ kind: 'with-options', name, options: compact(options) })),
  z
    .object({ name: nifName, options: exportOptionsSchema.default({}) })
    .strict()
    .transform(({ name, options }): DeclarationEntry => ({ kind: 'with-options', name, options: compact(options) })),
]);

const fragmentSchema = z.union([
  z.string(),
  z.object({
    code: z.string(),
    file: z.string().min(1).optional(),
    line: z.number().int().positive().optional(),
  }),
]);

const rawBuildOptionsSchema = z
  .object({
    module: z.string().min(1),
    flavor: z.enum(HOST_FLAVORS).default('elixir'),
    file: z.string().min(1),
    line: z.number().int().positive().optional(),
    dir: z.string().min(1).optional(),
    code: z.array(fragmentSchema).optional(),
    codePath: z.string().min(1).optional(),
    nifs: z.array(declarationSchema).default([WILDCARD_MARKER]),
    attributes: z.record(z.unknown()).default({}),
  })
  .strict();

export type RawBuildOptions = z.input<typeof rawBuildOptionsSchema>;

/**
 * Validates host-supplied build options. Every problem here is a configuration
 * error located at the declaring file and line, raised before anything is staged.
 */
export function parseBuildOptions(raw: unknown): BuildOptions {
  const location = declaredLocation(raw);
  const result = rawBuildOptionsSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ConfigurationError(`invalid build options: ${issues}`, 'ERR_CONFIG_INVALID', location);
  }

  const options = result.data;
  const declaredAt = { file: options.file, line: options.line };
  const code = options.code ?? [];

  if (code.length > 0 && options.codePath !== undefined) {
    throw new ConfigurationError(
      `(module ${options.module}) you may not supply literal source when \`codePath\` is specified`,
      'ERR_CONFIG_CONFLICT',
      { ...declaredAt, module: options.module }
    );
  }

  const fragments: SourceFragment[] = code.map(fragment =>
    typeof fragment === 'string'
      ? { code: fragment, file: options.file, line: options.line ?? 1 }
      : { code: fragment.code, file: fragment.file ?? options.file, line: fragment.line ?? options.line ?? 1 }
  );

  return {
    module: options.module,
    flavor: options.flavor,
    file: options.file,
    declaredAt,
    dir: options.dir,
    source:
      options.codePath !== undefined ? { kind: 'path', path: options.codePath } : { kind: 'literal', fragments },
    nifs: options.nifs,
    attributes: options.attributes,
  };
}

function declaredLocation(raw: unknown): { file?: string; line?: number } {
  const shape = z.object({ file: z.string().optional(), line: z.number().optional() }).safeParse(raw);
  return shape.success ? { file: shape.data.file, line: shape.data.line } : {};
}

function compact(options: ExportOptions): ExportOptions {
  const result: ExportOptions = {};
  if (options.concurrency !== undefined) result.concurrency = options.concurrency;
  if (options.alias !== undefined) result.alias = options.alias;
  if (options.leakCheck !== undefined) result.leakCheck = options.leakCheck;
  if (options.params !== undefined) result.params = options.params;
  if (options.returns !== undefined) result.returns = options.returns;
  return result;
}
