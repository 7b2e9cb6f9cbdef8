export { FileStagingService, stagingDirectory, STAGING_NAMESPACE } from './staging-service';
export { LineManifest, ManifestBuilder, assembleSource, buildManifest, countLines, remapDiagnostic } from './manifest';
export type { CompilerDiagnostic, ManifestSegment } from './manifest';
export { ZigCommand, createCommandRunner, spawnCommand } from './zig-command';
export type { CommandOptions, CommandResult, CommandRunner, ProcessSpawner, SpawnedProcess } from './zig-command';
export { AUTOGENERATED_HEADER, formatSource } from './formatter';
export type { SourceFormatter } from './formatter';
