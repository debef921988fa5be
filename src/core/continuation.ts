const CONTINUATION_MARKER = "\\";
// CRLF, LF, CR, VT, FF, FS, GS, RS, NEL, LINE SEPARATOR, PARAGRAPH SEPARATOR
const LINE_BOUNDARY = /\r\n|[\n\r\v\f\x1c-\x1e\x85\u2028\u2029]/;

export function splitLogLines(text: string): string[] {
  if (text.length === 0) return [];

  const lines = text.split(LINE_BOUNDARY);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/**
 * Re-join lines that the sweep runner wrapped with a trailing backslash.
 * The marker is dropped and the next line is appended with no separator;
 * a dangling carry at end of input is kept as its own line.
 */
export function joinContinuationLines(lines: readonly string[]): string[] {
  const joined: string[] = [];
  let carry: string | null = null;

  for (const raw of lines) {
    let line = raw;
    if (carry !== null) {
      line = carry + line;
      carry = null;
    }
    if (line.endsWith(CONTINUATION_MARKER)) {
      carry = line.slice(0, -CONTINUATION_MARKER.length);
      continue;
    }
    joined.push(line);
  }

  if (carry !== null) {
    joined.push(carry);
  }

  return joined;
}
