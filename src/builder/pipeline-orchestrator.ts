import path from 'path';
import { ParsedSource, parseZigSource } from '../parsers/zig';
import { config } from '../utils/config';
import { CompilerError, DependencyError, NifBuildError, errorMessage } from '../utils/errors';
import { createComponentLogger } from '../utils/logger';
import { assembleSource, remapDiagnostic } from '../services/manifest';
import { parseBuildOptions } from '../config/build-options';
import { normalizeDeclarations } from './declaration-normalizer';
import { DependencyResolver } from './dependency-resolver';
import { verifyExports } from './signature-verifier';
import { addNifResources, nifResources } from './resource-aggregator';
import { bindModuleDocumentation } from './documentation-binder';
import { externalSourcePath, nodeFileSystem } from './file-system';
import {
  AnalyzedModule,
  BuildOptions,
  BuildResult,
  BuildServices,
  BuilderSettings,
  ModuleDescriptor,
  ParsedModule,
  RenderableModule,
  ResourceResolver,
  SourceFileSystem,
  StagedModule,
  VerifiedModule,
} from './types';

const logger = createComponentLogger('nif-builder');

export const NATIVE_MODULE_FILE = 'module.zig';

export function stagedSourceName(moduleName: string): string {
  return `.${moduleName}.zig`;
}

export function createModuleDescriptor(options: BuildOptions): ModuleDescriptor {
  return {
    name: options.module,
    file: options.file,
    flavor: options.flavor,
    options,
    declarations: normalizeDeclarations(options.nifs),
    codeDir: options.dir ?? path.dirname(options.file),
    resources: [],
  };
}

/**
 * NifModuleBuilder - Pipeline Orchestrator
 *
 * Runs one module build as a strict sequence of stages, each taking and
 * returning a whole descriptor:
 * stage source -> manifest -> parse + dependencies -> sema -> verify exports
 * -> resources -> documentation -> compile -> unload manifest -> render.
 *
 * Any failure aborts the build; nothing partial reaches a renderer.
 */
export class NifModuleBuilder {
  private fileSystem: SourceFileSystem;
  private resolver: DependencyResolver;
  private resourcesFor: ResourceResolver;
  private env: string;

  constructor(
    private services: BuildServices,
    settings: BuilderSettings = {}
  ) {
    this.fileSystem = services.fileSystem ?? nodeFileSystem;
    this.resourcesFor = services.resourcesFor ?? nifResources;
    this.env = settings.env ?? config.toolchain.buildEnv;
    this.resolver = new DependencyResolver({ rootDir: settings.rootDir, fileSystem: this.fileSystem });
  }

  /** Validates raw host options first, so configuration errors surface before staging. */
  async buildFromConfig(rawOptions: unknown): Promise<BuildResult> {
    return this.build(parseBuildOptions(rawOptions));
  }

  async build(options: BuildOptions): Promise<BuildResult> {
    logger.info('Building module', { module: options.module, flavor: options.flavor });

    try {
      const initial = createModuleDescriptor(options);
      const rawSource = await this.loadSource(initial);

      const staged = await this.stageSource(initial, rawSource);
      const manifested = this.services.manifest.create(staged, rawSource);
      const parsed = await this.applyParser(manifested, rawSource);
      const analyzed = await this.runSema(parsed);
      const verified = this.verifyNifs(analyzed);
      const augmented = addNifResources(verified, this.resourcesFor);
      const documented = bindModuleDocumentation(augmented);
      const compiled = await this.compile(documented);

      const code = this.services.renderers.hosts[compiled.flavor].render(compiled, rawSource);

      logger.info('Module built', {
        module: compiled.name,
        exports: compiled.exports.length,
        resources: compiled.resources.length,
        dependencies: compiled.dependencies.length,
      });

      return { state: 'rendered', module: compiled, code };
    } catch (error) {
      logger.error('Module build aborted', {
        module: options.module,
        error: error instanceof NifBuildError ? error.toJSON() : errorMessage(error),
      });
      throw error;
    }
  }

  private async loadSource(module: ModuleDescriptor): Promise<string> {
    const { source, declaredAt } = module.options;
    if (source.kind === 'literal') {
      return assembleSource(source.fragments);
    }

    const sourcePath = externalSourcePath(module.file, source.path);
    try {
      return await this.fileSystem.readFile(sourcePath);
    } catch (error) {
      throw new DependencyError(`cannot read source file ${source.path}: ${errorMessage(error)}`, {
        file: declaredAt.file,
        line: declaredAt.line,
        module: module.name,
      });
    }
  }

  private async stageSource(module: ModuleDescriptor, rawSource: string): Promise<StagedModule> {
    const stagingDir = await this.services.staging.stage(module.name, this.env);
    const stagedSourcePath = path.join(stagingDir, stagedSourceName(module.name));
    await this.fileSystem.writeFile(stagedSourcePath, rawSource);

    logger.debug('Staged source', { module: module.name, stagedSourcePath });
    return { ...module, stagingDir, stagedSourcePath };
  }

  private async runSema(module: ParsedModule): Promise<AnalyzedModule> {
    try {
      const semaExports = await this.services.sema.analyze(module);
      logger.debug('Sema reported exports', { module: module.name, exports: semaExports.map(e => e.name) });
      return { ...module, semaExports };
    } catch (error) {
      if (error instanceof NifBuildError) throw error;
      const diagnostic = remapDiagnostic(errorMessage(error), module.stagedSourcePath, module.manifest);
      throw new CompilerError(`semantic analysis failed: ${diagnostic.message}`, {
        file: diagnostic.file ?? module.file,
        line: diagnostic.line,
        module: module.name,
      });
    }
  }

  private async applyParser(module: StagedModule, rawSource: string): Promise<ParsedModule> {
    const parsed: ParsedSource = parseZigSource(rawSource);
    const { source } = module.options;

    let dependencies: string[];
    if (source.kind === 'path') {
      const sourcePath = externalSourcePath(module.file, source.path);
      const referenced = await this.resolver.resolveParsed(parsed, sourcePath);
      // the external file itself is a rebuild trigger
      dependencies = Array.from(new Set([this.resolver.relativePath(sourcePath), ...referenced])).sort();
    } else {
      dependencies = await this.resolver.resolveParsed(
        parsed,
        path.join(module.codeDir, stagedSourceName(module.name))
      );
    }

    return { ...module, parsed, dependencies };
  }

  private verifyNifs(module: AnalyzedModule): VerifiedModule {
    const exports = verifyExports(module.declarations, module.semaExports, {
      module: module.name,
      file: module.file,
    });
    return { ...module, exports };
  }

  /** The manifest is released whether or not the compiler succeeds. */
  private async compile(module: RenderableModule): Promise<RenderableModule> {
    try {
      await this.precompile(module);
      const compiled = await this.services.compiler.compile(module);
      return this.services.manifest.unload(compiled);
    } catch (error) {
      this.services.manifest.unload(module);
      throw error;
    }
  }

  private async precompile(module: RenderableModule): Promise<void> {
    const modulePath = path.join(module.stagingDir, NATIVE_MODULE_FILE);
    await this.fileSystem.writeFile(modulePath, this.services.renderers.native.render(module));
    await this.services.compiler.format(modulePath);

    logger.debug(`wrote module code to ${modulePath}`);
  }
}
