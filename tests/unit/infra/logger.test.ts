/**
 * Unit tests for the logger factory
 */

import { describe, expect, it } from 'vitest';

import { createChildLogger, createLogger } from '@/infra/logger/index.js';

const collectLines = () => {
  const lines: string[] = [];
  const stream = {
    write: (line: string): void => {
      lines.push(line);
    },
  };
  const parsed = (): unknown[] => lines.map((line): unknown => JSON.parse(line));
  return { lines, stream, parsed };
};

describe('createLogger', () => {
  it('writes JSON lines with the project name', () => {
    const sink = collectLines();
    const logger = createLogger({ level: 'info' }, sink.stream);

    logger.info({ rows: 3 }, 'Read table');

    expect(sink.parsed()).toEqual([
      expect.objectContaining({
        level: 30,
        name: 'sheet-report-pipeline',
        rows: 3,
        msg: 'Read table',
      }),
    ]);
  });

  it('drops entries below the configured level', () => {
    const sink = collectLines();
    const logger = createLogger({ level: 'warn' }, sink.stream);

    logger.info('Not shown');
    logger.warn('Shown');

    expect(sink.lines).toHaveLength(1);
    expect(sink.parsed()[0]).toEqual(expect.objectContaining({ level: 40, msg: 'Shown' }));
  });

  it('keeps the silent level even with pretty output requested', () => {
    expect(createLogger({ level: 'silent', pretty: true }).level).toBe('silent');
  });
});

describe('createChildLogger', () => {
  it('adds the context to every entry', () => {
    const sink = collectLines();
    const child = createChildLogger(createLogger({ level: 'info' }, sink.stream), {
      module: 'report',
      input: 'people.xlsx',
    });

    child.warn('Skipped');

    expect(child.bindings()).toMatchObject({ module: 'report', input: 'people.xlsx' });
    expect(sink.parsed()[0]).toEqual(
      expect.objectContaining({ module: 'report', input: 'people.xlsx', msg: 'Skipped' })
    );
  });
});
