/**
 * @module startup-validator.test
 * @description Unit tests for startup validation and structured logging
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import {
  assertStartupRequirements,
  structuredLog,
  validateStartup,
  type AgentIdentityContext,
} from '../startup-validator.js';
import { AuditSinkError, ConfigurationError, GuardError, RuleTableError } from '../errors.js';

const IDENTITY: AgentIdentityContext = {
  agent_name: 'test-agent',
  agent_version: '0.0.1',
  domain: 'testing',
};

describe('validateStartup', () => {
  it('should pass when no check reports a problem', () => {
    expect(validateStartup([{ name: 'empty', run: () => [] }])).toEqual({
      valid: true,
      errors: [],
      checksRun: ['empty'],
    });
  });

  it('should prefix problems with the check name', () => {
    const result = validateStartup([
      { name: 'rules', run: () => ['duplicate rule ID'] },
      { name: 'config', run: () => ['threshold out of range', 'bad URL'] },
    ]);

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'rules: duplicate rule ID',
      'config: threshold out of range',
      'config: bad URL',
    ]);
  });

  it('should turn a throwing check into a problem', () => {
    const result = validateStartup([
      {
        name: 'rules',
        run: () => {
          throw new RuleTableError('sample', 'duplicate rule ID');
        },
      },
    ]);

    expect(result.errors).toEqual(["rules: Invalid rule 'sample': duplicate rule ID"]);
  });
});

describe('structuredLog', () => {
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write informational levels to stdout as JSON', () => {
    structuredLog('decision_recorded', 'Request approved', IDENTITY, { decision: 'approved' });

    expect(errorSpy).not.toHaveBeenCalled();
    const entry: unknown = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
    expect(entry).toMatchObject({
      level: 'decision_recorded',
      agent_name: 'test-agent',
      agent_version: '0.0.1',
      domain: 'testing',
      message: 'Request approved',
      details: { decision: 'approved' },
    });
  });

  it('should write failures to stderr', () => {
    structuredLog('audit_write_failed', 'Audit record could not be written', IDENTITY);

    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it('should fill unknown identity fields', () => {
    structuredLog('telemetry_flush_failed', 'Failed to flush telemetry events', null);

    const entry: unknown = JSON.parse(String(errorSpy.mock.calls[0]?.[0]));
    expect(entry).toMatchObject({ agent_name: 'unknown', agent_version: 'unknown', domain: 'unknown' });
    expect(entry).not.toHaveProperty('details');
  });
});

describe('assertStartupRequirements', () => {
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should announce a successful start', () => {
    assertStartupRequirements(IDENTITY, [{ name: 'ok', run: () => [] }]);

    const entry: unknown = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
    expect(entry).toMatchObject({ level: 'agent_started' });
  });

  it('should stay quiet when asked not to announce', () => {
    assertStartupRequirements(IDENTITY, [{ name: 'ok', run: () => [] }], { announce: false });
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('should exit the process when a check fails', () => {
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });

    expect(() => assertStartupRequirements(IDENTITY, [{ name: 'bad', run: () => ['broken'] }])).toThrow(
      'process.exit called'
    );
    expect(exitSpy).toHaveBeenCalledWith(1);
  });
});

describe('errors', () => {
  it('should carry codes and messages', () => {
    const config = new ConfigurationError(['a: too big', 'b: too small']);
    expect(config).toBeInstanceOf(GuardError);
    expect(config.code).toBe('CONFIGURATION_INVALID');
    expect(config.message).toBe('Invalid guard configuration: a: too big; b: too small');

    const sink = new AuditSinkError('file', 'EACCES');
    expect(sink.code).toBe('AUDIT_WRITE_FAILED');
    expect(sink.message).toBe("Audit sink 'file' failed: EACCES");
    expect(sink.sink).toBe('file');
  });
});
