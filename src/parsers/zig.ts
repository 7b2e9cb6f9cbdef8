import { createComponentLogger } from '../utils/logger';
import { cleanDocComment, extractContainerDocLine, extractDocLine } from './doc-comment';

const logger = createComponentLogger('zig-parser');

export type ReferenceKind = 'import' | 'embed';

export interface SourceReference {
  kind: ReferenceKind;
  target: string;
  line: number;
}

export type DeclarationKind = 'fn' | 'const' | 'var';

export interface TopLevelDeclaration {
  kind: DeclarationKind;
  name: string;
  isPub: boolean;
  isExport: boolean;
  line: number;
  docComment?: string;
}

export interface ParsedSource {
  dependencies: SourceReference[];
  declarations: TopLevelDeclaration[];
  moduleDoc?: string;
}

interface ScannedLine {
  code: string;
  braceDelta: number;
}

const IDENTIFIER = '([A-Za-z_][A-Za-z0-9_]*|@"(?:[^"\\\\]|\\\\.)*")';
const DECL_PREFIX = '(pub\\s+)?(export\\s+|extern(?:\\s+"[^"]*")?\\s+)?';

const FN_PATTERN = new RegExp(`^${DECL_PREFIX}(?:inline\\s+|noinline\\s+)?fn\\s+${IDENTIFIER}`);
const VAR_PATTERN = new RegExp(`^${DECL_PREFIX}(?:threadlocal\\s+)?(const|var)\\s+${IDENTIFIER}`);
const REFERENCE_PATTERN = /@(import|embedFile)\(\s*"((?:[^"\\]|\\.)*)"\s*\)/g;

/**
 * Line-oriented scanner for the parts of a Zig file the build needs: file
 * references (`@import`, `@embedFile`) and container-level declarations with
 * their doc comments. Zig has no block comments and its string literals never
 * span lines (multiline strings are `\\`-prefixed lines), so tracking brace
 * depth per line is enough to tell container level from nested code.
 */
export function parseZigSource(source: string): ParsedSource {
  const dependencies: SourceReference[] = [];
  const declarations: TopLevelDeclaration[] = [];
  const moduleDocLines: string[] = [];
  let pendingDoc: string[] = [];
  let depth = 0;

  const lines = source.split(/\r?\n/);

  lines.forEach((rawLine, index) => {
    const lineNumber = index + 1;
    const trimmed = rawLine.trim();

    if (trimmed.startsWith('\\\\')) return;

    if (depth === 0) {
      const docLine = extractDocLine(trimmed);
      if (docLine !== undefined) {
        pendingDoc.push(docLine);
        return;
      }

      const containerDoc = extractContainerDocLine(trimmed);
      if (containerDoc !== undefined) {
        moduleDocLines.push(containerDoc);
        return;
      }
    }

    const scanned = scanLine(rawLine);
    const code = scanned.code.trim();

    for (const match of code.matchAll(REFERENCE_PATTERN)) {
      dependencies.push({
        kind: match[1] === 'import' ? 'import' : 'embed',
        target: unescapeZigString(match[2]),
        line: lineNumber,
      });
    }

    if (depth === 0 && code.length > 0) {
      const declaration = matchDeclaration(code, lineNumber);
      if (declaration) {
        if (pendingDoc.length > 0) {
          declaration.docComment = cleanDocComment(pendingDoc);
        }
        declarations.push(declaration);
      }
      pendingDoc = [];
    }

    depth = Math.max(0, depth + scanned.braceDelta);
  });

  if (depth !== 0) {
    logger.debug('Unbalanced braces at end of source', { depth });
  }

  const result: ParsedSource = { dependencies, declarations };
  if (moduleDocLines.length > 0) {
    result.moduleDoc = cleanDocComment(moduleDocLines);
  }
  return result;
}

function matchDeclaration(code: string, line: number): TopLevelDeclaration | undefined {
  const fnMatch = FN_PATTERN.exec(code);
  if (fnMatch) {
    return {
      kind: 'fn',
      name: unquoteIdentifier(fnMatch[3]),
      isPub: fnMatch[1] !== undefined,
      isExport: fnMatch[2] !== undefined && fnMatch[2].startsWith('export'),
      line,
    };
  }

  const varMatch = VAR_PATTERN.exec(code);
  if (varMatch) {
    return {
      kind: varMatch[3] === 'var' ? 'var' : 'const',
      name: unquoteIdentifier(varMatch[4]),
      isPub: varMatch[1] !== undefined,
      isExport: varMatch[2] !== undefined && varMatch[2].startsWith('export'),
      line,
    };
  }

  return undefined;
}

/**
 * Splits off a trailing `//` comment and counts braces outside string and
 * character literals.
 */
function scanLine(line: string): ScannedLine {
  let braceDelta = 0;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];

    if (quote) {
      if (ch === '\\') {
        i++;
      } else if (ch === quote) {
        quote = null;
      }
      continue;
    }

    if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '/' && line[i + 1] === '/') {
      return { code: line.slice(0, i), braceDelta };
    } else if (ch === '{') {
      braceDelta++;
    } else if (ch === '}') {
      braceDelta--;
    }
  }

  return { code: line, braceDelta };
}

function unquoteIdentifier(identifier: string): string {
  return identifier.startsWith('@"') ? unescapeZigString(identifier.slice(2, -1)) : identifier;
}

function unescapeZigString(value: string): string {
  return value.replace(/\\(["\\'])/g, '$1');
}
