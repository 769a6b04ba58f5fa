import { createWriteStream, type WriteStream } from 'node:fs';

import { formatUnknownError, writeLine } from '@evtlog/core';

import { FormattingHandler, type HandlerOptions } from './handler.js';

export interface FileHandlerOptions extends HandlerOptions {
  /** Receives stream failures such as an unwritable path. Defaults to reporting on stderr. */
  readonly onError?: (error: Error) => void;
}

/**
 * Appends formatted lines to a file. Writes are queued on one stream, so order is preserved.
 *
 * Writes do not wait for the stream to drain: lines outpacing the disk stay buffered in memory
 * until written. `close()` resolves once the buffer is flushed and the file is closed.
 */
export class FileHandler extends FormattingHandler {
  private readonly stream: WriteStream;
  private closing: Promise<void> | undefined;

  constructor(
    readonly path: string,
    options: FileHandlerOptions = {},
  ) {
    super(options);
    const onError = options.onError ?? ((error: Error) => reportStreamError(path, error));
    this.stream = createWriteStream(path, { flags: 'a', encoding: 'utf8' });
    this.stream.on('error', onError);
  }

  /** Whether the underlying file has been closed. */
  get closed(): boolean {
    return this.stream.closed;
  }

  override close(): Promise<void> {
    this.closing ??= this.stream.closed
      ? Promise.resolve()
      : new Promise<void>((resolve) => {
          this.stream.once('close', () => resolve());
          this.stream.end();
        });
    return this.closing;
  }

  protected override write(line: string): void {
    writeLine(this.stream, line);
  }
}

function reportStreamError(path: string, error: Error): void {
  writeLine(process.stderr, `evtlog: cannot write to ${path}: ${formatUnknownError(error)}`);
}
