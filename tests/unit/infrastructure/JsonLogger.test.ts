import { describe, it, expect } from 'vitest';
import { createLogger } from '../../../src/infrastructure/logging/JsonLogger.js';

function capture() {
  const lines: string[] = [];
  return { lines, write: (line: string) => lines.push(line) };
}

function parse(line: string | undefined): unknown {
  return JSON.parse(line ?? 'null');
}

describe('createLogger', () => {
  it('should write one JSON object per line at or above the level', () => {
    const { lines, write } = capture();
    const logger = createLogger('cloudns-api-client', { level: 'info', write });

    logger.debug('hidden');
    logger.info('API call started', { operation: 'zone.list' });
    logger.error('boom');

    expect(lines).toHaveLength(2);
    expect(lines[0]?.endsWith('\n')).toBe(true);
    expect(parse(lines[0])).toEqual({
      level: 'info',
      service: 'cloudns-api-client',
      msg: 'API call started',
      ts: expect.any(String),
      operation: 'zone.list',
    });
    expect(parse(lines[1])).toMatchObject({ level: 'error', msg: 'boom' });
  });

  it('should be silent by default', () => {
    const { lines, write } = capture();
    const logger = createLogger('cloudns-api-client', { write });

    logger.error('never written');

    expect(lines).toHaveLength(0);
  });

  it('should carry child fields into every line', () => {
    const { lines, write } = capture();
    const logger = createLogger('svc', { level: 'debug', write }).child({ requestId: 'req-1' }).child({ step: 2 });

    logger.debug('nested');

    expect(parse(lines[0])).toMatchObject({ service: 'svc', msg: 'nested', requestId: 'req-1', step: 2 });
  });
});
