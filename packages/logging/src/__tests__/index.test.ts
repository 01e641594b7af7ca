import {describe, expect, it} from 'vitest';

import {
  createNoopLogger,
  createStructuredLogger,
  getLogContext,
  runWithLogContext,
  sanitizeForLog,
  setLogContextFields
} from '../index.js';

const createBufferedWriter = () => {
  const stdout: string[] = [];
  const stderr: string[] = [];

  return {
    stdout,
    stderr,
    writer: {
      stdout: {
        write: (line: string) => {
          stdout.push(line.trim());
          return true;
        }
      },
      stderr: {
        write: (line: string) => {
          stderr.push(line.trim());
          return true;
        }
      }
    }
  };
};

const parseLine = (line: string | undefined): Record<string, unknown> => {
  const parsed: unknown = JSON.parse(line ?? '{}');
  if (typeof parsed !== 'object' || parsed === null) {
    throw new Error('log line is not an object');
  }
  return Object.fromEntries(Object.entries(parsed));
};

describe('@qkd-link/logging', () => {
  it('redacts key material and credentials recursively', () => {
    const sanitized = sanitizeForLog({
      value: {
        key_ID: 'kid-1',
        key_size: 256,
        key: 'SGVsbG8gV29ybGQ=',
        nested: {
          client_private_key: 'pem',
          keys: [{key_ID: 'kid-2', key: 'AAAA'}],
          allowed: 'ok'
        }
      }
    });

    expect(sanitized).toEqual({
      key_ID: 'kid-1',
      key_size: 256,
      key: '[REDACTED]',
      nested: {
        client_private_key: '[REDACTED]',
        keys: '[REDACTED]',
        allowed: 'ok'
      }
    });
  });

  it('never writes raw bytes and honours toJSON renderings', () => {
    const sanitized = sanitizeForLog({
      value: {
        payload: Buffer.from('Hello World'),
        handle: {toJSON: () => '[REDACTED]'},
        created_at: new Date('2026-01-01T00:00:00.000Z'),
        invalid_at: new Date('invalid'),
        counter: BigInt(7)
      }
    });

    expect(sanitized).toEqual({
      payload: '[BYTES:11]',
      handle: '[REDACTED]',
      created_at: '2026-01-01T00:00:00.000Z',
      invalid_at: '[INVALID_DATE]',
      counter: '7'
    });
  });

  it('marks circular references, functions and excessive depth', () => {
    const circular: Record<string, unknown> = {plain: 'ok', run: () => 'x'};
    circular.self = circular;

    let tooDeep: unknown = {value: 'stop'};
    for (let depth = 0; depth < 15; depth += 1) {
      tooDeep = [tooDeep];
    }

    const sanitized = sanitizeForLog({
      value: {circular, tooDeep, stream_label: 'lab'},
      extraSensitiveKeys: ['stream_label']
    });

    expect(sanitized).toMatchObject({
      circular: {plain: 'ok', run: '[FUNCTION]', self: '[CIRCULAR]'},
      stream_label: '[REDACTED]'
    });
    expect(JSON.stringify(sanitized)).toContain('[TRUNCATED]');
  });

  it('isolates async context across concurrent operations', async () => {
    const seen: string[] = [];

    await Promise.all([
      runWithLogContext({correlation_id: 'corr_a'}, async () => {
        await new Promise(resolve => setTimeout(resolve, 5));
        seen.push(getLogContext()?.correlation_id ?? 'missing');
      }),
      runWithLogContext({correlation_id: 'corr_b'}, async () => {
        await new Promise(resolve => setTimeout(resolve, 1));
        seen.push(getLogContext()?.correlation_id ?? 'missing');
      })
    ]);

    expect(new Set(seen)).toEqual(new Set(['corr_a', 'corr_b']));
  });

  it('merges context fields incrementally', () => {
    runWithLogContext({correlation_id: 'corr_1', request_id: 'req_1'}, () => {
      setLogContextFields({role: 'responder', kme_host: 'https://kme-2.example'});
      const context = getLogContext();
      expect(context?.role).toBe('responder');
      expect(context?.kme_host).toBe('https://kme-2.example');
      expect(context?.correlation_id).toBe('corr_1');
    });
  });

  it('returns undefined when setting context fields outside a context', () => {
    expect(setLogContextFields({sae_id: 'sae-1'})).toBeUndefined();
  });

  it('emits a valid envelope with context fields', () => {
    const buffer = createBufferedWriter();
    const logger = createStructuredLogger({
      service: 'kme-client',
      env: 'test',
      level: 'debug',
      now: () => new Date('2026-02-03T04:05:06.000Z'),
      writer: buffer.writer
    });

    runWithLogContext(
      {correlation_id: 'corr_2', request_id: 'req_2', role: 'initiator', sae_id: 'sae-1', operation: 'get_key'},
      () => {
        logger.info({
          event: 'kme.key.acquired',
          component: 'kme.keys',
          status_code: 200,
          metadata: {key_id: 'kid-1', key: 'SGVsbG8='}
        });
      }
    );

    expect(buffer.stdout).toHaveLength(1);
    expect(parseLine(buffer.stdout[0])).toEqual({
      ts: '2026-02-03T04:05:06.000Z',
      level: 'info',
      service: 'kme-client',
      env: 'test',
      event: 'kme.key.acquired',
      component: 'kme.keys',
      correlation_id: 'corr_2',
      request_id: 'req_2',
      role: 'initiator',
      sae_id: 'sae-1',
      operation: 'get_key',
      status_code: 200,
      metadata: {key_id: 'kid-1', key: '[REDACTED]'}
    });
  });

  it('fills default correlation fields outside a context', () => {
    const buffer = createBufferedWriter();
    const logger = createStructuredLogger({service: 'kme-client', env: 'test', level: 'debug', writer: buffer.writer});

    logger.debug({event: 'kme.status.requested', component: 'kme.status'});

    const payload = parseLine(buffer.stdout[0]);
    expect(payload.correlation_id).toBe('n/a');
    expect(payload.request_id).toBe('n/a');
  });

  it('filters by level and routes errors to stderr', () => {
    const buffer = createBufferedWriter();
    const logger = createStructuredLogger({service: 'kme-client', env: 'test', level: 'warn', writer: buffer.writer});

    logger.debug({event: 'debug.event', component: 'test'});
    logger.info({event: 'info.event', component: 'test'});
    logger.warn({event: 'warn.event', component: 'test'});
    logger.error({event: 'error.event', component: 'test'});
    logger.fatal({event: 'fatal.event', component: 'test'});

    expect(buffer.stdout).toHaveLength(1);
    expect(buffer.stderr).toHaveLength(2);
    expect(parseLine(buffer.stdout[0]).event).toBe('warn.event');
    expect(parseLine(buffer.stderr[0]).event).toBe('error.event');
    expect(parseLine(buffer.stderr[1]).event).toBe('fatal.event');
  });

  it('does not emit when the level is silent', () => {
    const buffer = createBufferedWriter();
    const logger = createStructuredLogger({service: 'kme-client', env: 'test', level: 'silent', writer: buffer.writer});

    logger.fatal({event: 'fatal.event', component: 'test'});

    expect(buffer.stdout).toHaveLength(0);
    expect(buffer.stderr).toHaveLength(0);
  });

  it('never throws when the writer fails or the input is invalid', () => {
    const logger = createStructuredLogger({
      service: 'kme-client',
      env: 'test',
      level: 'debug',
      writer: {
        stdout: {
          write: () => {
            throw new Error('write failed');
          }
        },
        stderr: {
          write: () => {
            throw new Error('write failed');
          }
        }
      }
    });

    expect(() => logger.error({event: 'kme.transport.failed', component: 'kme.transport'})).not.toThrow();
    expect(() => logger.info({event: '', component: 'kme.transport'})).not.toThrow();
  });

  it('provides a noop logger', () => {
    const logger = createNoopLogger();
    expect(logger.info({event: 'x', component: 'y'})).toBeUndefined();
  });
});
