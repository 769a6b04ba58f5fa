import { writeLine, type WritableTarget } from '@evtlog/core';

import { FormattingHandler, type HandlerOptions } from './handler.js';

export type StandardStream = 'stdout' | 'stderr';

export class StreamHandler extends FormattingHandler {
  constructor(
    private readonly target: WritableTarget,
    options: HandlerOptions = {},
  ) {
    super(options);
  }

  static forStandardStream(stream: StandardStream, options: HandlerOptions = {}): StreamHandler {
    return new StreamHandler(stream === 'stderr' ? process.stderr : process.stdout, options);
  }

  protected override write(line: string): void {
    writeLine(this.target, line);
  }
}
