/**
 * nifwright - verified Zig NIF bindings for BEAM host modules
 *
 * Library entry point. Hosts construct a NifModuleBuilder with their sema
 * service and renderers, then call `build` once per module.
 */

export * from './builder';
export * from './parsers';
export * from './services';
export { parseBuildOptions, WILDCARD_MARKER } from './config/build-options';
export type { RawBuildOptions } from './config/build-options';
export * from './utils';
