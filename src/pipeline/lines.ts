import { LINE_BREAK } from '../transform/line.js';

/**
 * Re-chunks decoded text into lines. LF, CRLF and a lone CR all end a line,
 * a CR at the end of a chunk is held back until the next chunk shows whether
 * an LF follows, and a final terminator does not open an empty last line.
 *
 * Only the incoming chunk is split; the unterminated tail is carried forward.
 */
export async function* readLines(chunks: AsyncIterable<string>): AsyncGenerator<string> {
  let pending = '';
  let heldCr = false;
  for await (const chunk of chunks) {
    if (chunk.length === 0) continue;
    let text = chunk;
    if (heldCr) {
      yield pending;
      pending = '';
      heldCr = false;
      if (text.startsWith('\n')) text = text.slice(1);
    }
    heldCr = text.endsWith('\r');
    const parts = (heldCr ? text.slice(0, -1) : text).split(LINE_BREAK);
    parts[0] = pending + parts[0];
    pending = parts.pop() ?? '';
    yield* parts;
  }
  if (heldCr || pending !== '') {
    yield pending;
  }
}
