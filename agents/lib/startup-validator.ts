/**
 * @module startup-validator
 * @description Startup validation and structured logging for guard processes
 *
 * Rule tables and configuration are fixed once the process is up, so every
 * problem with them must surface here, before the first request. If ANY
 * check fails, the process exits.
 */

// =============================================================================
// TYPES
// =============================================================================

export interface AgentIdentityContext {
  agent_name: string;
  agent_version: string;
  domain: string;
}

/**
 * A named startup check. `run` returns the problems it found.
 */
export interface StartupCheck {
  name: string;
  run(): string[];
}

export interface StartupValidationResult {
  valid: boolean;
  errors: string[];
  checksRun: string[];
}

// =============================================================================
// STRUCTURED LOGGING (MINIMAL)
// =============================================================================

export type LogLevel =
  | 'agent_started'
  | 'decision_recorded'
  | 'audit_write_failed'
  | 'telemetry_flush_failed'
  | 'agent_abort';

interface LogEntry {
  level: LogLevel;
  timestamp: string;
  agent_name: string;
  agent_version: string;
  domain: string;
  message: string;
  details?: Record<string, unknown>;
}

const ERROR_LEVELS: ReadonlySet<LogLevel> = new Set([
  'audit_write_failed',
  'telemetry_flush_failed',
  'agent_abort',
]);

export function structuredLog(
  level: LogLevel,
  message: string,
  identity: AgentIdentityContext | null,
  details?: Record<string, unknown>
): void {
  const entry: LogEntry = {
    level,
    timestamp: new Date().toISOString(),
    agent_name: identity?.agent_name || 'unknown',
    agent_version: identity?.agent_version || 'unknown',
    domain: identity?.domain || 'unknown',
    message,
    ...(details && { details }),
  };

  // Failures go to stderr so they never mix with command output
  if (ERROR_LEVELS.has(level)) {
    console.error(JSON.stringify(entry));
  } else {
    console.log(JSON.stringify(entry));
  }
}

// =============================================================================
// STARTUP VALIDATION
// =============================================================================

export function validateStartup(checks: StartupCheck[]): StartupValidationResult {
  const errors: string[] = [];

  for (const check of checks) {
    try {
      for (const problem of check.run()) {
        errors.push(`${check.name}: ${problem}`);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      errors.push(`${check.name}: ${message}`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    checksRun: checks.map((c) => c.name),
  };
}

// =============================================================================
// CRASH IF VALIDATION FAILS
// =============================================================================

export function assertStartupRequirements(
  identity: AgentIdentityContext,
  checks: StartupCheck[],
  options: { announce?: boolean } = {}
): void {
  const result = validateStartup(checks);

  if (!result.valid) {
    structuredLog('agent_abort', 'Startup validation failed', identity, {
      errors: result.errors,
    });

    console.error('='.repeat(60));
    console.error('FATAL: STARTUP VALIDATION FAILED');
    console.error('='.repeat(60));
    for (const error of result.errors) {
      console.error(`  - ${error}`);
    }
    console.error('='.repeat(60));

    process.exit(1);
  }

  // Commands whose stdout is their result pass announce: false
  if (options.announce === false) return;

  structuredLog('agent_started', 'Startup checks passed', identity, {
    checks: result.checksRun,
  });
}
