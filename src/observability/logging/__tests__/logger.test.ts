// ═══════════════════════════════════════════════════════════════════════════════
// LOGGER TESTS — Levels, Context & Redaction
// Provisioning Resilience Engine — Observability
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  configureLogger,
  getLogger,
  getCorrelationId,
  getLoggerConfig,
  getTransactionId,
  redact,
  resetLogger,
  runWithLoggingContext,
} from '../index.js';

let entries: Readonly<Record<string, unknown>>[];

beforeEach(() => {
  vi.stubEnv('LOG_LEVEL', '');
  entries = [];
  configureLogger({ level: 'info', timestamp: false, sink: (entry) => entries.push(entry) });
});

afterEach(() => {
  resetLogger();
  vi.unstubAllEnvs();
});

// ─────────────────────────────────────────────────────────────────────────────────
// LEVELS
// ─────────────────────────────────────────────────────────────────────────────────

describe('levels', () => {
  it('should write structured entries to the sink', () => {
    getLogger({ component: 'retry' }).info('Retrying remote operation', { attempt: 2 });

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: 'info',
      levelNum: 30,
      msg: 'Retrying remote operation',
      service: 'provisioning-engine',
      component: 'retry',
      attempt: 2,
    });
  });

  it('should drop entries below the configured level', () => {
    configureLogger({ level: 'warn' });
    const logger = getLogger();

    logger.info('ignored');
    logger.warn('kept');

    expect(entries.map(e => e.msg)).toEqual(['kept']);
    expect(logger.isLevelEnabled('debug')).toBe(false);
    expect(logger.isLevelEnabled('error')).toBe(true);
  });

  it('should let LOG_LEVEL override the configured level', () => {
    vi.stubEnv('LOG_LEVEL', 'ERROR');
    getLogger().warn('ignored');
    getLogger().error('kept');

    expect(entries.map(e => e.msg)).toEqual(['kept']);
  });

  it('should flatten errors into the entry', () => {
    getLogger().error('Remote operation failed', new Error('boom'));

    expect(entries[0]).toMatchObject({ errorName: 'Error', errorMessage: 'boom' });
    expect(entries[0]?.errorStack).toEqual(expect.stringContaining('boom'));
  });

  it('should record non-Error failures as a message', () => {
    getLogger().error('Remote operation failed', 'timeout');

    expect(entries[0]).toMatchObject({ errorMessage: 'timeout' });
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// CONTEXT
// ─────────────────────────────────────────────────────────────────────────────────

describe('context', () => {
  it('should merge child context over the parent', () => {
    getLogger({ component: 'transaction', context: { transactionName: 'analytics' } })
      .child({ context: { attempt: 1 } })
      .info('Tracked resource');

    expect(entries[0]).toMatchObject({
      component: 'transaction',
      transactionName: 'analytics',
      attempt: 1,
    });
  });

  it('should tag entries with the active logging context', () => {
    runWithLoggingContext({ transactionId: 'tx-1' }, () => {
      getLogger().info('inside');
    });
    getLogger().info('outside');

    expect(entries[0]?.transactionId).toBe('tx-1');
    expect(entries[1]?.transactionId).toBeUndefined();
  });

  it('should extend the outer context in nested runs', () => {
    runWithLoggingContext({ transactionId: 'tx-1' }, () => {
      runWithLoggingContext({ correlationId: 'corr-1' }, () => {
        expect(getTransactionId()).toBe('tx-1');
        expect(getCorrelationId()).toBe('corr-1');
      });
      expect(getCorrelationId()).toBeUndefined();
    });
    expect(getTransactionId()).toBeUndefined();
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// REDACTION
// ─────────────────────────────────────────────────────────────────────────────────

describe('redaction', () => {
  it('should redact secret fields and keep secret names', () => {
    getLogger().info('Secret read', {
      secretName: 'api-key',
      password: 'test-secret',
      request: { apiKey: 'test-secret', region: 'us-east-1' },
    });

    expect(entries[0]).toMatchObject({
      secretName: 'api-key',
      password: '[REDACTED]',
      request: { apiKey: '[REDACTED]', region: 'us-east-1' },
    });
  });

  it('should keep boolean flags whose names look sensitive', () => {
    getLogger().info('Engine created', {
      features: { useRemoteSecretStore: true, useRetry: false },
      clientSecret: 'test-secret',
    });

    expect(entries[0]).toMatchObject({
      features: { useRemoteSecretStore: true, useRetry: false },
      clientSecret: '[REDACTED]',
    });
  });

  it('should leave fields untouched when redaction is off', () => {
    configureLogger({ redactSecrets: false });
    getLogger().info('Secret read', { token: 'test-secret' });

    expect(entries[0]?.token).toBe('test-secret');
    expect(getLoggerConfig().redactSecrets).toBe(false);
  });

  it('should apply extra keys and a custom replacement', () => {
    expect(redact({ sessionId: 's-1', user: 'u-1' }, { additionalKeys: ['SESSIONID'], replacement: '***' }))
      .toEqual({ sessionId: '***', user: 'u-1' });
  });

  it('should stop walking past the maximum depth', () => {
    expect(redact({ a: { b: { c: 1 } } }, { maxDepth: 1 })).toEqual({ a: { b: '[MAX_DEPTH]' } });
  });
});
