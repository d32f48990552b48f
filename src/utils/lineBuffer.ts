/**
 * Splits text into lines that keep their own terminators.
 * `\r\n` and `\n` both end a line; a final line without a terminator is kept as is.
 * Joining the result gives back the input unchanged.
 */
export function splitLines(content: string): string[] {
  const lines: string[] = [];
  let start = 0;

  while (start < content.length) {
    const newline = content.indexOf('\n', start);
    if (newline === -1) {
      lines.push(content.slice(start));
      break;
    }
    lines.push(content.slice(start, newline + 1));
    start = newline + 1;
  }

  return lines;
}

export function joinLines(lines: readonly string[]): string {
  return lines.join('');
}

/**
 * Strips the trailing `\n` or `\r\n` from a line.
 */
export function stripTerminator(line: string): string {
  if (line.endsWith('\r\n')) {
    return line.slice(0, -2);
  }
  if (line.endsWith('\n')) {
    return line.slice(0, -1);
  }
  return line;
}
