import type { Mapping } from "mapping-codec";

/** runs of text that are plausible breakpoints: statements, blocks, lines */
const potentialTokens = /[^\n;{}]+[;{} \r\t]*\n?|[;{} \r\t]+\n?|\n/g;

/** mappings from an original text to itself, one per potential token */
export function identityMappings(text: string, sourceIndex: number): Mapping[] {
  const mappings: Mapping[] = [];
  let line = 0;
  let column = 0;
  const addMapping = (): void => {
    mappings.push({
      generatedLine: line,
      generatedColumn: column,
      original: { sourceIndex, line, column },
    });
  };

  for (const match of text.matchAll(potentialTokens)) {
    addMapping();
    const token = match[0];
    if (token.endsWith("\n")) {
      line++;
      column = 0;
    } else {
      column += token.length;
    }
  }
  return mappings;
}
