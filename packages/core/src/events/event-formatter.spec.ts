import { describe, expect, it } from 'vitest';

import { Severity } from '../logging/severity.js';
import { TemplateError } from '../templates/message-templates.js';
import { createRecordingBackend, createSteppingClock } from '../testing/recording-backend.js';
import { createEventFormatter, defaultEventFormatter, end, event, start } from './event-formatter.js';

const localSeconds = (milliseconds: number): number =>
  new Date(2024, 0, 2, 3, 4, 5, milliseconds).getTime() / 1000;

describe('events/event-formatter', () => {
  describe('without timestamps', () => {
    it('logs the begin of an activity and returns its handle', () => {
      const clock = createSteppingClock(1000);
      const backend = createRecordingBackend();
      const formatter = createEventFormatter({ includeTimestamp: false, clock: clock.now });

      const handle = formatter.start(backend, 'job', { attributes: { id: 7 } });

      expect(handle).toBe(1000);
      expect(backend.emissions).toEqual([{ severity: Severity.INFO, message: 'job.begin ; id=7' }]);
    });

    it('logs the end of an activity with its duration', () => {
      const clock = createSteppingClock(1000);
      const backend = createRecordingBackend();
      const formatter = createEventFormatter({ includeTimestamp: false, clock: clock.now });

      const handle = formatter.start(backend, 'job');
      clock.advance(2.5);
      formatter.end(backend, 'job', { start: handle, attributes: { rows: 3 } });

      expect(backend.messages()).toEqual(['job.begin ; ', 'job.end (2.500000) ; rows=3']);
    });

    it('logs the end without a duration when no handle is given', () => {
      const backend = createRecordingBackend();
      const formatter = createEventFormatter({ includeTimestamp: false });

      formatter.end(backend, 'job');

      expect(backend.messages()).toEqual(['job.end ; ']);
    });

    it('logs single events at the requested severity and returns the event time', () => {
      const clock = createSteppingClock(50);
      const backend = createRecordingBackend();
      const formatter = createEventFormatter({ includeTimestamp: false, clock: clock.now });

      const loggedAt = formatter.event(backend, 'cache.miss', {
        severity: Severity.DEBUG,
        attributes: { key: '', shard: 'a,b' },
      });

      expect(loggedAt).toBe(50);
      expect(backend.emissions).toEqual([
        { severity: Severity.DEBUG, message: String.raw`cache.miss ; key='',shard=a\,b` },
      ]);
    });

    it('times activities off a plain event handle', () => {
      const clock = createSteppingClock(10);
      const backend = createRecordingBackend();
      const formatter = createEventFormatter({ includeTimestamp: false, clock: clock.now });

      const handle = formatter.event(backend, 'request.received');
      clock.advance(0.125);
      formatter.end(backend, 'request', { start: handle });

      expect(backend.messages()[1]).toBe('request.end (0.125000) ; ');
    });

    it('keeps activities sharing a name independent', () => {
      const clock = createSteppingClock(0);
      const backend = createRecordingBackend();
      const formatter = createEventFormatter({ includeTimestamp: false, clock: clock.now });

      const first = formatter.start(backend, 'fetch');
      clock.advance(1);
      const second = formatter.start(backend, 'fetch');
      clock.advance(2);
      formatter.end(backend, 'fetch', { start: second });
      clock.advance(4);
      formatter.end(backend, 'fetch', { start: first });

      expect(backend.messages()).toEqual([
        'fetch.begin ; ',
        'fetch.begin ; ',
        'fetch.end (2.000000) ; ',
        'fetch.end (7.000000) ; ',
      ]);
    });

    it('measures real elapsed time with the system clock', async () => {
      const backend = createRecordingBackend();
      const formatter = createEventFormatter({ includeTimestamp: false });

      const handle = formatter.start(backend, 'job');
      await new Promise((resolve) => setTimeout(resolve, 20));
      formatter.end(backend, 'job', { start: handle });

      const message = backend.messages()[1] ?? '';
      expect(message).toMatch(/^job\.end \(\d+\.\d{6}\) ; $/);
      const seconds = Number(/\((\d+\.\d{6})\)/.exec(message)?.[1]);
      expect(seconds).toBeGreaterThanOrEqual(0.015);
    });

    it('uses the configured default severity', () => {
      const backend = createRecordingBackend();
      const formatter = createEventFormatter({
        includeTimestamp: false,
        defaultSeverity: Severity.WARNING,
      });

      formatter.event(backend, 'disk.low');
      formatter.end(backend, 'sweep', { severity: Severity.ERROR });

      expect(backend.emissions.map((emission) => emission.severity)).toEqual([
        Severity.WARNING,
        Severity.ERROR,
      ]);
    });
  });

  describe('with timestamps', () => {
    it('prefixes every message with the local ISO-8601 time', () => {
      const clock = createSteppingClock(localSeconds(678));
      const backend = createRecordingBackend();
      const formatter = createEventFormatter({ clock: clock.now });

      const handle = formatter.start(backend, 'job', { attributes: { n: 5 } });
      clock.advance(1);
      formatter.end(backend, 'job', { start: handle, attributes: { n: 5 } });
      formatter.end(backend, 'job');
      formatter.event(backend, 'configured', { attributes: { method: 'dict' } });

      expect(backend.messages()).toEqual([
        '2024-01-02T03:04:05.678000 job.begin ; n=5',
        '2024-01-02T03:04:06.678000 job.end (1.000000) ; n=5',
        '2024-01-02T03:04:06.678000 job.end ; ',
        '2024-01-02T03:04:06.678000 configured ; method=dict',
      ]);
    });

    it('is the mode of the default formatter', () => {
      const backend = createRecordingBackend();

      const handle = start(backend, 'program', { attributes: { file: 'main.ts' } });
      event(backend, 'one event');
      end(backend, 'program', { start: handle });

      expect(defaultEventFormatter.includeTimestamp).toBe(true);
      for (const message of backend.messages()) {
        expect(message).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{6} /);
      }
      expect(backend.messages()[0]).toMatch(/ program\.begin ; file=main\.ts$/);
      expect(backend.messages()[2]).toMatch(/ program\.end \(\d+\.\d{6}\) ; $/);
    });
  });

  describe('templates', () => {
    it('applies template overrides and exposes the status code to them', () => {
      const backend = createRecordingBackend();
      const formatter = createEventFormatter({
        includeTimestamp: false,
        clock: () => 3,
        templates: {
          exit: '{name} finished status={status} in {dur}',
          exitWithoutDuration: '{name} finished status={status}',
        },
      });

      formatter.end(backend, 'job', { start: 3, statusCode: 2 });
      formatter.end(backend, 'job');

      expect(backend.messages()).toEqual([
        'job finished status=2 in 0.000000',
        'job finished status=0',
      ]);
    });

    it('rejects overrides naming placeholders the shape cannot fill', () => {
      expect(() => createEventFormatter({ templates: { entry: '{name} ({dur})' } })).toThrow(
        TemplateError,
      );
    });

    it('accepts a one-off template for an event', () => {
      const backend = createRecordingBackend();
      const formatter = createEventFormatter({ includeTimestamp: false });

      formatter.event(backend, 'deploy', {
        template: '{name}: {kvp}',
        attributes: { env: 'prod' },
      });

      expect(backend.messages()).toEqual(['deploy: env=prod']);
    });

    it('emits nothing when a one-off template is invalid', () => {
      const backend = createRecordingBackend();
      const formatter = createEventFormatter({ includeTimestamp: false });

      expect(() => formatter.event(backend, 'deploy', { template: '{name} {dur}' })).toThrow(
        'Placeholder {dur} is not available for event messages',
      );
      expect(backend.emissions).toHaveLength(0);
    });

    it('uses custom separators when encoding attributes', () => {
      const formatter = createEventFormatter({
        includeTimestamp: false,
        encoder: { pairSeparator: ' ', keyValueSeparator: ':' },
      });

      expect(
        formatter.formatMessage('event', 'login', { timestamp: 0, attributes: { user: 'ada', ok: true } }),
      ).toBe('login ; user:ada ok:true');
    });
  });
});
