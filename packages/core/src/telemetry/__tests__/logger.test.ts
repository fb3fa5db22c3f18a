/**
 * Structured Logger Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Logger, createLogger } from '../logger.js';
import { createContext, runWithContext, withContext, parseSeverity } from '../context.js';

describe('Logger', () => {
  let lines: string[];
  let logger: Logger;

  const entries = () => lines.map((line) => JSON.parse(line));

  beforeEach(() => {
    lines = [];
    logger = createLogger('test-service', {
      prettyPrint: false,
      minSeverity: 'DEBUG',
      write: (line) => lines.push(line),
    });
  });

  describe('Basic Logging', () => {
    it('writes one JSON line per entry', () => {
      logger.info('Info message', { attempt: 2 });

      expect(lines).toHaveLength(1);
      const [entry] = entries();
      expect(entry.severity).toBe('INFO');
      expect(entry.message).toBe('Info message');
      expect(entry.service).toBe('test-service');
      expect(entry.attempt).toBe(2);
      expect(typeof entry.timestamp).toBe('string');
    });

    it('maps warn to WARNING', () => {
      logger.warn('careful');
      expect(entries()[0].severity).toBe('WARNING');
    });

    it('drops entries below the minimum severity', () => {
      const quiet = createLogger('quiet', { minSeverity: 'WARNING', write: (line) => lines.push(line) });
      quiet.debug('hidden');
      quiet.info('hidden');
      quiet.warn('shown');
      quiet.error('shown');

      expect(entries().map((e) => e.severity)).toEqual(['WARNING', 'ERROR']);
    });
  });

  describe('Errors', () => {
    it('includes message and code of a coded error', () => {
      const err = Object.assign(new Error('rate limited'), { code: 'EXTERNAL_CALL_FAILURE' });
      logger.error('Call failed', err, { service: 'github' });

      const [entry] = entries();
      expect(entry.severity).toBe('ERROR');
      expect(entry.error.message).toBe('rate limited');
      expect(entry.error.code).toBe('EXTERNAL_CALL_FAILURE');
      expect(entry.service).toBe('github');
    });

    it('stringifies non-Error values', () => {
      logger.error('Odd failure', 'just a string');
      expect(entries()[0].error).toEqual({ message: 'just a string' });
    });
  });

  describe('Telemetry context', () => {
    it('injects run fields from the active context', () => {
      const ctx = createContext({ source: 'runner', runId: 'run-1', pipeline: 'deploy', environment: 'staging' });
      runWithContext(ctx, () => {
        withContext({ stepName: 'apply' }, () => logger.info('inside'));
      });

      const [entry] = entries();
      expect(entry.runId).toBe('run-1');
      expect(entry.pipeline).toBe('deploy');
      expect(entry.environment).toBe('staging');
      expect(entry.stepName).toBe('apply');
    });

    it('adds nothing outside a context', () => {
      logger.info('outside');
      expect(entries()[0].runId).toBeUndefined();
    });
  });

  describe('Step events', () => {
    it('logs step end severity by status', () => {
      logger.stepEnd('a', 'success', 5);
      logger.stepEnd('b', 'failed_recoverable', 5);
      logger.stepEnd('c', 'failed_fatal', 5);

      expect(entries().map((e) => [e.severity, e.eventName])).toEqual([
        ['INFO', 'step.success'],
        ['WARNING', 'step.failed_recoverable'],
        ['ERROR', 'step.failed_fatal'],
      ]);
    });

    it('logs step start at debug with the attempt', () => {
      logger.stepStart('scan', 2);
      expect(entries()[0]).toMatchObject({ severity: 'DEBUG', eventName: 'step.start', stepName: 'scan', attempt: 2 });
    });
  });

  describe('Redaction', () => {
    it('redacts secret-named fields', () => {
      logger.info('config', { token: 'test-secret', webhookSecret: 'test-secret', url: 'https://hooks.test' });

      const [entry] = entries();
      expect(entry.token).toBe('[REDACTED]');
      expect(entry.webhookSecret).toBe('[REDACTED]');
      expect(entry.url).toBe('https://hooks.test');
    });

    it('redacts bearer tokens inside strings and keeps the line valid JSON', () => {
      logger.info('calling api', { header: 'Bearer abc.def' });
      expect(entries()[0].header).toBe('[REDACTED]');
    });

    it('redacts nested values', () => {
      logger.info('nested', { github: { token: 'test-secret', owner: 'acme' } });
      expect(entries()[0].github).toEqual({ token: '[REDACTED]', owner: 'acme' });
    });
  });

  it('child loggers carry extra default fields', () => {
    logger.child({ component: 'recorder' }).info('saved');
    expect(entries()[0].component).toBe('recorder');
  });

  it('child loggers can lower the minimum severity', () => {
    const quiet = createLogger('quiet', { minSeverity: 'WARNING', write: (line) => lines.push(line) });
    const louder = quiet.child({ sink: 'log' }, { minSeverity: 'NOTICE' });

    expect(quiet.isEnabled('NOTICE')).toBe(false);
    expect(louder.isEnabled('NOTICE')).toBe(true);
    louder.notice('posted');
    quiet.notice('hidden');

    expect(entries()).toEqual([expect.objectContaining({ severity: 'NOTICE', message: 'posted', sink: 'log' })]);
  });
});

describe('parseSeverity', () => {
  it('is case-insensitive and accepts WARN', () => {
    expect(parseSeverity('debug')).toBe('DEBUG');
    expect(parseSeverity('warn')).toBe('WARNING');
    expect(parseSeverity('verbose')).toBeUndefined();
    expect(parseSeverity(undefined)).toBeUndefined();
  });
});
