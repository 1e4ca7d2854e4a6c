/**
 * Result Document Writer
 *
 * Streaming text writer over a staging file. Text is encoded with the
 * settings' encoding as it is written; nothing is buffered beyond what the
 * underlying stream holds.
 *
 * @module output/writer
 */

import { once } from 'node:events';
import type { FileHandle } from 'node:fs/promises';
import type { WriteStream } from 'node:fs';
import { toBufferEncoding, type WriterSettings } from '../schemas/writer-settings.js';
import { describeError } from './errors.js';

/**
 * Byte order mark for an encoding, empty where none exists.
 */
function byteOrderMark(encoding: BufferEncoding): Buffer {
  return encoding === 'utf8' || encoding === 'utf16le'
    ? Buffer.from('\uFEFF', encoding)
    : Buffer.alloc(0);
}

/**
 * Writer handed to producers by OutputTransaction.resolve().
 *
 * @example
 * ```typescript
 * const writer = await transaction.resolve('report.xml', { indent: true });
 * if (writer) {
 *   await writer.writeLine('<report>');
 *   await writer.writeLine('<item/>', 1);
 *   await writer.writeLine('</report>');
 *   await writer.close();
 * }
 * ```
 */
export class ResultDocumentWriter {
  readonly settings: WriterSettings;

  /** Staging file path */
  readonly path: string;

  private readonly stream: WriteStream;
  private readonly encoding: BufferEncoding;
  private started = false;
  private closing: Promise<void> | null = null;
  private streamError: Error | null = null;

  constructor(handle: FileHandle, filePath: string, settings: WriterSettings) {
    const encoding = toBufferEncoding(settings.encoding);
    if (encoding === undefined) {
      throw new Error(`Unsupported encoding: ${settings.encoding}`);
    }

    this.settings = settings;
    this.path = filePath;
    this.encoding = encoding;
    this.stream = handle.createWriteStream();
    this.stream.on('error', (error) => {
      this.streamError = error;
    });
  }

  /**
   * Whether close() has been called.
   */
  get isClosed(): boolean {
    return this.closing !== null;
  }

  /**
   * Write text as-is.
   *
   * @throws Error if the writer is closed or the stream has failed
   */
  async write(text: string): Promise<void> {
    if (this.closing !== null) {
      throw new Error(`Cannot write to closed result document: ${this.path}`);
    }
    if (this.streamError) {
      throw this.streamError;
    }

    let chunk = Buffer.from(text, this.encoding);
    if (!this.started) {
      this.started = true;
      if (this.settings.byteOrderMark) {
        chunk = Buffer.concat([byteOrderMark(this.encoding), chunk]);
      }
    }

    if (!this.stream.write(chunk)) {
      await once(this.stream, 'drain');
    }
  }

  /**
   * Write one line followed by the configured newline. With `indent` set,
   * the line is prefixed by `depth * indentSize` spaces.
   */
  async writeLine(text: string, depth = 0): Promise<void> {
    const prefix = this.settings.indent ? ' '.repeat(depth * this.settings.indentSize) : '';
    await this.write(`${prefix}${text}${this.settings.newline}`);
  }

  /**
   * Flush and close the staging file. Safe to call more than once.
   */
  close(): Promise<void> {
    if (this.closing === null) {
      this.closing = this.finish();
    }
    return this.closing;
  }

  private async finish(): Promise<void> {
    if (!this.stream.closed) {
      const closed = once(this.stream, 'close');
      this.stream.end();
      try {
        await closed;
      } catch (error) {
        this.streamError = this.streamError ?? (error instanceof Error ? error : new Error(String(error)));
      }
    }

    if (this.streamError) {
      throw new Error(`Failed to write result document ${this.path}: ${describeError(this.streamError)}`, {
        cause: this.streamError,
      });
    }
  }
}
