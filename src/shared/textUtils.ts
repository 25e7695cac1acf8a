/**
 * Shared text utilities for comment handling and generated output
 */

/**
 * Split text into lines, handling both CRLF (\r\n) and LF (\n) line endings.
 */
export function splitLines(text: string): string[] {
  return text.split('\n').map(line => (line.endsWith('\r') ? line.slice(0, -1) : line));
}

/**
 * Remove trailing whitespace from each line
 */
export function trimTrailingWhitespace(text: string): string {
  return splitLines(text)
    .map(line => line.trimEnd())
    .join('\n');
}

/**
 * Lines of a source comment as the schema compiler records it: one leading space
 * dropped per line, surrounding blank lines removed, inner blank lines kept.
 */
export function commentBodyLines(comment: string | undefined): string[] {
  if (!comment) {
    return [];
  }
  const lines = splitLines(comment).map(line => (line.startsWith(' ') ? line.slice(1) : line).trimEnd());
  while (lines.length > 0 && lines[0] === '') {
    lines.shift();
  }
  while (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Make a line safe to place inside a block comment
 */
export function escapeBlockComment(line: string): string {
  return line.replace(/\*\//g, '*\\/');
}
