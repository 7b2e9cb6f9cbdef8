import { ExportRecord, ResourceDescriptor, ResourceResolver, VerifiedModule } from './types';

/**
 * Runtime handles each concurrency mode needs. Synchronous calls run on the
 * calling scheduler and need nothing; the rest keep per-call state in a
 * resource owned by the export.
 */
export const nifResources: ResourceResolver = record => {
  switch (record.concurrency) {
    case 'synchronous':
      return [];
    case 'threaded':
      return [rootResource(`ThreadResource_${record.name}`, record.name)];
    case 'yielding':
      return [rootResource(`YieldingResource_${record.name}`, record.name)];
    case 'dirty_cpu':
    case 'dirty_io':
      return [rootResource(`DirtyResource_${record.name}`, record.name)];
  }
};

export function augmentExports(
  records: readonly ExportRecord[],
  resourcesFor: ResourceResolver = nifResources
): ExportRecord[] {
  return records.map(record => ({ ...record, resources: resourcesFor(record) }));
}

/**
 * Attaches each export's resources and appends them, in export order and
 * without deduplication, to the module's resource list.
 */
export function addNifResources<M extends VerifiedModule>(
  module: M,
  resourcesFor: ResourceResolver = nifResources
): M {
  const exports = augmentExports(module.exports, resourcesFor);
  const added = exports.flatMap(record => record.resources);

  return { ...module, exports, resources: [...module.resources, ...added] };
}

function rootResource(name: string, exportName: string): ResourceDescriptor {
  return { kind: 'root', name, export: exportName };
}
