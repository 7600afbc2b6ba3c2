/* Searches backwards and forwards from an offset till it hits a newline */
export function getFullLine(source: string, offset: number): { lineIndex: number; fullLine: string } {
  let back: number = offset;
  let forward: number = offset;

  while (back > 0 && source[back - 1] !== "\n") {
    back--;
  }
  while (forward < source.length && source[forward] !== "\n") {
    forward++;
  }

  const lineIndex = source.slice(0, back).split("\n").length;
  const fullLine = source.slice(back, forward).replace(/\r$/, "");

  return { lineIndex, fullLine };
}

/*
    Points at a 1-based column of a snippet:
    ~~~~^~~
*/
export function createErrorIndicator(snippet: string, column: number): string {
  const pos = column - 1;
  let indicator = "";
  for (let i = 0; i < Math.max(snippet.length, column); i++) {
    indicator += i === pos ? "^" : "~";
  }
  return indicator;
}

/**
 * Renders the offending source line with a caret under the given offset,
 * prefixed by the line number.
 */
export function describeSourceLocation(source: string, offset: number, column: number): string {
  const { lineIndex, fullLine } = getFullLine(source, offset);
  const gutter = `${lineIndex} | `;
  return `${gutter}${fullLine}\n${" ".repeat(gutter.length)}${createErrorIndicator(fullLine, column)}`;
}
