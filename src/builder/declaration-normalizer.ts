import { DeclarationEntry, ExportDeclaration, NormalizedDeclarations } from './types';

/**
 * Folds heterogeneous export declarations into one canonical value.
 *
 * A wildcard anywhere in the list switches the whole list to auto mode, with the
 * named entries kept as overrides. When a name appears twice the later entry
 * replaces the earlier one, options included.
 */
export function normalizeDeclarations(entries: readonly DeclarationEntry[]): NormalizedDeclarations {
  let auto = false;
  const byName = new Map<string, ExportDeclaration>();

  for (const entry of entries) {
    switch (entry.kind) {
      case 'wildcard':
        auto = true;
        break;
      case 'name':
        byName.set(entry.name, { name: entry.name, options: {} });
        break;
      case 'with-options':
        byName.set(entry.name, { name: entry.name, options: { ...entry.options } });
        break;
      default:
        return assertNever(entry);
    }
  }

  const declarations = Array.from(byName.values());
  return auto ? { mode: 'auto', overrides: declarations } : { mode: 'explicit', entries: declarations };
}

export function declaredNames(declarations: NormalizedDeclarations): string[] {
  const list = declarations.mode === 'auto' ? declarations.overrides : declarations.entries;
  return list.map(declaration => declaration.name);
}

function assertNever(value: never): never {
  throw new Error(`Unhandled declaration entry: ${JSON.stringify(value)}`);
}
