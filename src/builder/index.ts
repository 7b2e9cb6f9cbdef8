/**
 * Module build pipeline
 * Barrel exports for the analyses and the orchestrator that sequences them
 */

// Core Types
export * from './types';

// Pure stages
export { normalizeDeclarations, declaredNames } from './declaration-normalizer';
export { verifyExports } from './signature-verifier';
export type { VerificationContext } from './signature-verifier';
export { nifResources, augmentExports, addNifResources } from './resource-aggregator';
export { findDocumentation, bindDocumentation, bindModuleDocumentation } from './documentation-binder';

// I/O stages
export { DependencyResolver, isFileReference } from './dependency-resolver';
export type { DependencyResolverOptions } from './dependency-resolver';
export { externalSourcePath, nodeFileSystem } from './file-system';

// Orchestration
export {
  NifModuleBuilder,
  createModuleDescriptor,
  stagedSourceName,
  NATIVE_MODULE_FILE,
} from './pipeline-orchestrator';
