export const AUTOGENERATED_HEADER = '// this code is autogenerated';

export interface SourceFormatter {
  /** Returns the input unchanged when it does not parse. */
  formatString(source: string): Promise<string>;
}

/** Generated files are left exactly as the generator wrote them. */
export async function formatSource(contents: string, formatter: SourceFormatter): Promise<string> {
  if (contents.startsWith(AUTOGENERATED_HEADER)) {
    return contents;
  }
  return formatter.formatString(contents);
}
