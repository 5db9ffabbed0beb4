import { type CalcConfig, DEFAULT_CONFIG, maxLineLength } from '../shared/config.js';

const isTerminator = (ch: string) => ch === '\n' || ch === '\r';

/**
 * Assembles arbitrary input chunks into complete lines.
 *
 * A line ends at `\n` or `\r`; empty lines (including the second half of a
 * `\r\n` pair) are dropped. Characters past the buffer limit are discarded
 * up to the next terminator.
 */
export class LineFramer {
  private buf = '';
  private readonly limit: number;

  constructor(config: Pick<CalcConfig, 'bufferSize'> = DEFAULT_CONFIG) {
    this.limit = maxLineLength(config);
  }

  push(chunk: string): string[] {
    const lines: string[] = [];

    for (const ch of chunk) {
      if (isTerminator(ch)) {
        if (this.buf.length > 0) {
          lines.push(this.buf);
          this.buf = '';
        }
      } else if (this.buf.length < this.limit) {
        this.buf += ch;
      }
    }

    return lines;
  }

  /**
   * @returns the pending unterminated line, if any, and resets the buffer
   */
  flush(): string | null {
    const pending = this.buf;
    this.buf = '';
    return pending.length > 0 ? pending : null;
  }
}

/**
 * Frames a stream of chunks into lines, yielding a trailing unterminated line
 * once the source ends.
 */
export async function* frameLines(
  chunks: AsyncIterable<string | Uint8Array>,
  config: Pick<CalcConfig, 'bufferSize'> = DEFAULT_CONFIG
): AsyncGenerator<string> {
  const framer = new LineFramer(config);
  const decoder = new TextDecoder();

  for await (const chunk of chunks) {
    const text = typeof chunk === 'string'
      ? chunk
      : decoder.decode(chunk, { stream: true });
    yield* framer.push(text);
  }

  yield* framer.push(decoder.decode());
  const last = framer.flush();
  if (last !== null) {
    yield last;
  }
}
