/**
 * Text views shared by the detectors
 */

const STREAM_BEGIN = /stream\b/gi;
const STREAM_END = /endstream/gi;
// Same class the default signatures use; NUL is not collapsed
const WHITESPACE_RUN = /[\t\n\f\r ]+/g;

/**
 * Decode bytes one-to-one into a string, so offsets in the text match offsets in the buffer
 */
export function decodeText(buffer: Uint8Array): string {
  return Buffer.from(buffer.buffer, buffer.byteOffset, buffer.byteLength).toString('latin1');
}

/**
 * Replace each `stream ... endstream` region with a single space.
 *
 * A region opens at the first `stream` keyword and closes at the nearest
 * `endstream` after it. Once an opening keyword has no closing one, no later
 * keyword can have one either, so the scan stops there and keeps the rest.
 */
export function stripStreams(text: string): string {
  // Per-call copies: exec() moves lastIndex
  const begin = new RegExp(STREAM_BEGIN);
  const end = new RegExp(STREAM_END);

  let out = '';
  let cursor = 0;

  for (;;) {
    begin.lastIndex = cursor;
    const open = begin.exec(text);
    if (!open) break;

    end.lastIndex = open.index + open[0].length;
    const close = end.exec(text);
    if (!close) break;

    out += text.slice(cursor, open.index) + ' ';
    cursor = close.index + close[0].length;
  }

  return out + text.slice(cursor);
}

/**
 * Collapse every whitespace run into one space
 */
export function collapseWhitespace(text: string): string {
  return text.replace(WHITESPACE_RUN, ' ');
}
