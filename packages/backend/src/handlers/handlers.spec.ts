import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { RecordFormatter } from '../formatters/record-formatter.js';
import { createLogRecord } from '../records/log-record.js';
import { FileHandler } from './file-handler.js';
import { MemoryHandler } from './memory-handler.js';
import { StreamHandler } from './stream-handler.js';

describe('StreamHandler', () => {
  it('writes one formatted line per record', () => {
    const write = vi.fn();
    const handler = new StreamHandler(
      { write },
      { formatter: new RecordFormatter('{name} {message}') },
    );

    handler.handle(createLogRecord('app', 20, 'job.begin ; ', 0));

    expect(write).toHaveBeenCalledWith('app job.begin ; \n');
  });

  it('skips records below its level', () => {
    const write = vi.fn();
    const handler = new StreamHandler({ write }, { level: 30 });

    handler.handle(createLogRecord('app', 20, 'quiet', 0));

    expect(write).not.toHaveBeenCalled();
  });

  it('targets the standard streams', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const handler = StreamHandler.forStandardStream('stderr');

    handler.handle(createLogRecord('app', 40, 'failed', 0));

    expect(write).toHaveBeenCalledWith('failed\n');
  });
});

describe('MemoryHandler', () => {
  it('keeps lines and records until cleared', () => {
    const handler = new MemoryHandler();
    const record = createLogRecord('app', 20, 'tick', 1);

    handler.handle(record);
    expect(handler.lines).toEqual(['tick']);
    expect(handler.records).toEqual([record]);

    handler.clear();
    expect(handler.lines).toEqual([]);
  });
});

describe('FileHandler', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(os.tmpdir(), 'evtlog-file-handler-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('appends lines in order and flushes them on close', async () => {
    const file = path.join(directory, 'events.log');
    const handler = new FileHandler(file);

    handler.handle(createLogRecord('app', 20, 'first ; n=1', 0));
    handler.handle(createLogRecord('app', 20, 'second ; n=2', 0));
    expect(handler.closed).toBe(false);
    await handler.close();

    expect(handler.closed).toBe(true);
    expect(await readFile(file, 'utf8')).toBe('first ; n=1\nsecond ; n=2\n');
  });

  it('flushes every buffered line before close resolves', async () => {
    const file = path.join(directory, 'burst.log');
    const handler = new FileHandler(file);

    for (let index = 0; index < 5000; index += 1) {
      handler.handle(createLogRecord('app', 20, `tick ; n=${index}`, 0));
    }
    await handler.close();

    const lines = (await readFile(file, 'utf8')).split('\n');
    expect(lines).toHaveLength(5001);
    expect(lines[4999]).toBe('tick ; n=4999');
    expect(lines[5000]).toBe('');
  });

  it('appends to existing content', async () => {
    const file = path.join(directory, 'events.log');
    const first = new FileHandler(file);
    first.handle(createLogRecord('app', 20, 'one', 0));
    await first.close();

    const second = new FileHandler(file);
    second.handle(createLogRecord('app', 20, 'two', 0));
    await second.close();

    expect(await readFile(file, 'utf8')).toBe('one\ntwo\n');
  });

  it('reports stream failures to the error callback', async () => {
    const onError = vi.fn();
    const handler = new FileHandler(path.join(directory, 'missing', 'events.log'), { onError });

    await handler.close();

    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0]?.[0]).toBeInstanceOf(Error);
  });
});
