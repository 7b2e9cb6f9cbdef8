import { TopLevelDeclaration } from '../parsers/zig';
import { ExportRecord, RenderableModule, VerifiedModule } from './types';

export function findDocumentation(name: string, declarations: readonly TopLevelDeclaration[]): string | null {
  for (const declaration of declarations) {
    if (declaration.name !== name || declaration.docComment === undefined) continue;

    const doc = declaration.docComment.trim();
    if (doc) return doc;
  }
  return null;
}

export function bindDocumentation(
  records: readonly ExportRecord[],
  declarations: readonly TopLevelDeclaration[]
): ExportRecord[] {
  return records.map(record => ({ ...record, doc: findDocumentation(record.name, declarations) }));
}

/** Only the primary source's own top-level declarations are consulted. */
export function bindModuleDocumentation(module: VerifiedModule): RenderableModule {
  return {
    ...module,
    exports: bindDocumentation(module.exports, module.parsed.declarations),
    documented: true,
  };
}
