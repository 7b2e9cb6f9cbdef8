import { ParsedSource } from '../parsers/zig';
import { SourceLocation } from '../utils/errors';

/**
 * Type definitions for the module build pipeline.
 * Stage functions take and return whole descriptors; nothing is mutated in place.
 */

export const HOST_FLAVORS = ['elixir', 'erlang'] as const;
export type HostFlavor = (typeof HOST_FLAVORS)[number];

export const CONCURRENCY_MODES = ['synchronous', 'threaded', 'yielding', 'dirty_cpu', 'dirty_io'] as const;
export type ConcurrencyMode = (typeof CONCURRENCY_MODES)[number];

export interface ExportSignature {
  params: string[];
  returns: string;
}

export interface ExportOptions {
  concurrency?: ConcurrencyMode;
  /** Host-side name when it differs from the native function name. */
  alias?: string;
  leakCheck?: boolean;
  /** Signature hints, checked against what the compiler reports. */
  params?: string[];
  returns?: string;
}

export type DeclarationEntry =
  | { kind: 'name'; name: string }
  | { kind: 'with-options'; name: string; options: ExportOptions }
  | { kind: 'wildcard' };

export interface ExportDeclaration {
  name: string;
  options: ExportOptions;
}

export type NormalizedDeclarations =
  | { mode: 'explicit'; entries: ExportDeclaration[] }
  | { mode: 'auto'; overrides: ExportDeclaration[] };

export interface SourceFragment {
  code: string;
  file: string;
  /** Line in `file` where the fragment's first line sits. */
  line: number;
}

export type SourceInput =
  | { kind: 'literal'; fragments: SourceFragment[] }
  | { kind: 'path'; path: string };

export interface BuildOptions {
  module: string;
  flavor: HostFlavor;
  /** Host file that declared the module. */
  file: string;
  declaredAt: SourceLocation;
  /** Overrides the directory literal source resolves its imports against. */
  dir?: string;
  source: SourceInput;
  nifs: DeclarationEntry[];
  /** Forwarded to the renderers untouched. */
  attributes: Record<string, unknown>;
}

export interface SemaExport {
  name: string;
  signature: ExportSignature;
  concurrency: ConcurrencyMode;
}

export interface ResourceDescriptor {
  kind: 'root';
  name: string;
  export: string;
}

export interface ExportRecord {
  name: string;
  concurrency: ConcurrencyMode;
  signature: ExportSignature;
  options: ExportOptions;
  doc: string | null;
  resources: readonly ResourceDescriptor[];
}

export interface SourceManifest {
  /** Maps a 1-based line of the staged source back to where it was written. */
  locate(stagedLine: number): SourceLocation;
}

export interface ModuleDescriptor {
  readonly name: string;
  readonly file: string;
  readonly flavor: HostFlavor;
  readonly options: BuildOptions;
  readonly declarations: NormalizedDeclarations;
  readonly codeDir: string;
  readonly stagingDir?: string;
  readonly stagedSourcePath?: string;
  readonly manifest?: SourceManifest;
  readonly semaExports?: readonly SemaExport[];
  readonly parsed?: ParsedSource;
  readonly dependencies?: readonly string[];
  readonly exports?: readonly ExportRecord[];
  readonly resources: readonly ResourceDescriptor[];
}

export interface StagedModule extends ModuleDescriptor {
  readonly stagingDir: string;
  readonly stagedSourcePath: string;
}

export interface ParsedModule extends StagedModule {
  readonly parsed: ParsedSource;
  readonly dependencies: readonly string[];
}

export interface AnalyzedModule extends ParsedModule {
  readonly semaExports: readonly SemaExport[];
}

export interface VerifiedModule extends AnalyzedModule {
  readonly exports: readonly ExportRecord[];
}

/** The only shape renderers accept: verified, resource-augmented and documented. */
export interface RenderableModule extends VerifiedModule {
  readonly documented: true;
}

export interface StagingService {
  stage(moduleName: string, env: string): Promise<string>;
}

export interface ManifestService {
  create<M extends ModuleDescriptor>(module: M, rawSource: string): M;
  unload<M extends ModuleDescriptor>(module: M): M;
}

export interface SemaService {
  analyze(module: StagedModule): Promise<SemaExport[]>;
}

export interface NativeCompiler {
  /** Rewrites the file in canonical style; leaves it untouched when it does not parse. */
  format(filePath: string): Promise<void>;
  compile<M extends StagedModule>(module: M): Promise<M>;
}

export interface NativeRenderer {
  render(module: RenderableModule): string;
}

export interface HostRenderer {
  render(module: RenderableModule, rawSource: string): string;
}

export interface Renderers {
  native: NativeRenderer;
  hosts: Record<HostFlavor, HostRenderer>;
}

export interface SourceFileSystem {
  readFile(filePath: string): Promise<string>;
  writeFile(filePath: string, contents: string): Promise<void>;
}

export type ResourceResolver = (record: ExportRecord) => ResourceDescriptor[];

export interface BuildServices {
  staging: StagingService;
  manifest: ManifestService;
  sema: SemaService;
  compiler: NativeCompiler;
  renderers: Renderers;
  fileSystem?: SourceFileSystem;
  resourcesFor?: ResourceResolver;
}

export interface BuilderSettings {
  /** Execution environment tag used to key the staging directory. */
  env?: string;
  /** Dependency paths are reported relative to this directory. */
  rootDir?: string;
}

export interface BuildResult {
  state: 'rendered';
  module: RenderableModule;
  code: string;
}
