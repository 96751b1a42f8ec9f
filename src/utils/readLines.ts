import { type SafeWrap, safeWrapAsync } from './wrap.js';

/**
 * Lazily splits a byte stream into text lines.
 *
 * - Lines end at `\n` or `\r\n`; a line split across chunks is reassembled.
 * - A trailing line without a newline is flushed when the stream ends.
 * - A read failure is yielded as `[error, null]` and ends the sequence.
 *
 * Leaving the loop early cancels the stream, which closes the underlying connection.
 */
export async function* readLines(
  body: ReadableStream<Uint8Array>,
): AsyncGenerator<SafeWrap<Error, string>, void, undefined> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';

  try {
    while (true) {
      const [errRead, chunk] = await safeWrapAsync(() => reader.read());
      if (errRead) {
        yield [errRead, null];
        return;
      }

      if (chunk.done) {
        break;
      }

      buffer += decoder.decode(chunk.value, { stream: true });
      const lines = buffer.split(/\r?\n/);
      buffer = lines.pop() ?? '';
      for (const line of lines) {
        yield [null, line];
      }
    }

    buffer += decoder.decode();
    if (buffer) {
      yield [null, buffer];
    }
  } finally {
    await safeWrapAsync(() => reader.cancel());
  }
}
