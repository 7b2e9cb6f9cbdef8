const DOC_PREFIX = '///';
const CONTAINER_DOC_PREFIX = '//!';

/**
 * Returns the text of a `///` doc comment line, or undefined when the line is
 * something else. `////` is an ordinary comment in Zig.
 */
export function extractDocLine(line: string): string | undefined {
  const trimmed = line.trim();
  if (!trimmed.startsWith(DOC_PREFIX) || trimmed.startsWith('////')) return undefined;
  return stripCommentMarker(trimmed, DOC_PREFIX);
}

export function extractContainerDocLine(line: string): string | undefined {
  const trimmed = line.trim();
  if (!trimmed.startsWith(CONTAINER_DOC_PREFIX)) return undefined;
  return stripCommentMarker(trimmed, CONTAINER_DOC_PREFIX);
}

export function cleanDocComment(lines: string[]): string {
  return lines.join('\n').trim();
}

export function extractDescriptionOnly(docText: string): string {
  return docText
    .split('\n')
    .map(line => line.trim())
    .filter(Boolean)
    .join(' ')
    .trim();
}

function stripCommentMarker(trimmed: string, marker: string): string {
  const rest = trimmed.slice(marker.length);
  return rest.startsWith(' ') ? rest.slice(1) : rest;
}
