import { createWriteStream, type WriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { StringDecoder } from 'node:string_decoder';
import type { Logger } from '../types.js';
import { redactSecrets } from './redact.js';

export interface LogSinkOptions {
  /** Bytes allowed to sit in the write buffer before output is dropped. */
  maxBufferedBytes: number;
  /** Redact credentials line by line before writing. */
  redact: boolean;
  logger: Logger;
  /** Stage name, for warnings. */
  stage: string;
}

/**
 * Append-only destination for a child's output.
 *
 * Writes never wait on the disk: the child is never paused. When the write
 * buffer is over budget, output is dropped and counted instead.
 */
export class LogSink {
  private stream: WriteStream | null = null;
  /** Holds the bytes of a character split across pipe chunks. */
  private readonly decoder = new StringDecoder('utf8');
  private partialLine = '';
  private dropping = false;
  private dropped = 0;
  private streamError: Error | null = null;

  private constructor(
    readonly filePath: string,
    private readonly opts: LogSinkOptions,
  ) {}

  static async open(filePath: string, opts: LogSinkOptions): Promise<LogSink> {
    const sink = new LogSink(filePath, opts);
    await mkdir(dirname(filePath), { recursive: true });
    sink.stream = createWriteStream(filePath, { flags: 'a' });
    sink.stream.on('error', (err) => {
      sink.streamError = err;
      opts.logger.warn(`Log sink for stage ${opts.stage} failed: ${err.message}`, { stage: opts.stage });
    });
    return sink;
  }

  /** Bytes discarded under backpressure so far. */
  get droppedBytes(): number {
    return this.dropped;
  }

  /** Write one line of supervisor text (headers, trailers). */
  writeLine(line: string): void {
    this.push(`${line}\n`);
  }

  /** Characters held back until their line ends. */
  get pendingLineLength(): number {
    return this.partialLine.length;
  }

  write(chunk: Buffer | string): void {
    const text = typeof chunk === 'string' ? chunk : this.decoder.write(chunk);
    if (!this.opts.redact) {
      this.push(text);
      return;
    }

    // An unterminated line is held back no further than the buffer budget.
    if (
      this.partialLine &&
      Buffer.byteLength(this.partialLine, 'utf-8') + Buffer.byteLength(text, 'utf-8') > this.opts.maxBufferedBytes
    ) {
      this.push(redactSecrets(this.partialLine));
      this.partialLine = '';
    }

    // Redact whole lines so a key split across chunks is still caught. A carriage return ends a line too.
    let pending = this.partialLine + text;
    const lastBreak = Math.max(pending.lastIndexOf('\n'), pending.lastIndexOf('\r'));
    if (lastBreak !== -1) {
      this.push(redactSecrets(pending.slice(0, lastBreak + 1)));
      pending = pending.slice(lastBreak + 1);
    }
    if (Buffer.byteLength(pending, 'utf-8') > this.opts.maxBufferedBytes) {
      this.push(redactSecrets(pending));
      pending = '';
    }
    this.partialLine = pending;
  }

  /**
   * Flush any partial line, record dropped output, and close the file.
   */
  async close(): Promise<void> {
    const stream = this.stream;
    if (!stream) return;
    const tail = this.decoder.end();
    if (tail) this.write(tail);
    if (this.partialLine) {
      const rest = this.opts.redact ? redactSecrets(this.partialLine) : this.partialLine;
      this.partialLine = '';
      this.push(rest);
    }
    if (this.dropped > 0) {
      stream.write(`\n[stageline] dropped ${this.dropped} bytes of output under log backpressure\n`);
    }
    this.stream = null;
    if (this.streamError) {
      stream.destroy();
      return;
    }
    await new Promise<void>((resolve) => {
      stream.once('error', () => resolve());
      stream.end(() => resolve());
    });
  }

  private push(text: string): void {
    const stream = this.stream;
    if (!stream || this.streamError || text.length === 0) return;
    const bytes = Buffer.byteLength(text, 'utf-8');
    if (stream.writableLength + bytes > this.opts.maxBufferedBytes) {
      if (!this.dropping) {
        this.dropping = true;
        this.opts.logger.warn(`Log sink for stage ${this.opts.stage} is behind; dropping output`, {
          stage: this.opts.stage,
          data: { buffered: stream.writableLength },
        });
      }
      this.dropped += bytes;
      return;
    }
    this.dropping = false;
    stream.write(text);
  }
}
