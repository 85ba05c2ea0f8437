/**
 * @module config
 * @description Guard configuration, read once at initialization
 */

import { z } from 'zod';
import { ConfigurationError } from '@request-guard/lib';

const Weight = z.number().min(0).max(1);

/**
 * Confidence penalty per evidence item. `criticalRule` extends the
 * bypass/semantic/whitelist formula: at its default of 1.0 a critical match
 * alone takes confidence to 0.
 */
export const PenaltyWeights = z.object({
  bypassAttempt: Weight.default(0.2),
  semanticFlag: Weight.default(0.1),
  whitelistViolation: Weight.default(0.05),
  criticalRule: Weight.default(1.0),
});
export type PenaltyWeights = z.infer<typeof PenaltyWeights>;

export const GuardConfig = z.object({
  /** Below this confidence, a request without rule matches is blocked */
  confidenceThreshold: Weight.default(0.5),
  penalties: PenaltyWeights.default({}),
  /** Apply the leetspeak table during normalization */
  leetspeakEnabled: z.boolean().default(true),
  /** JSON-lines audit log file */
  auditLogPath: z.string().min(1).optional(),
  /** Remote audit service base URL */
  auditServiceUrl: z.string().url().optional(),
  telemetryEnabled: z.boolean().default(false),
});
export type GuardConfig = z.infer<typeof GuardConfig>;
export type GuardConfigInput = z.input<typeof GuardConfig>;

export const DEFAULT_CONFIG: GuardConfig = GuardConfig.parse({});

/**
 * Parse a configuration object. Throws ConfigurationError listing every
 * invalid field.
 */
export function parseConfig(input: unknown): GuardConfig {
  const result = GuardConfig.safeParse(input);

  if (!result.success) {
    throw new ConfigurationError(
      result.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`)
    );
  }

  return result.data;
}

/**
 * Build configuration from environment variables. Unset variables keep
 * their defaults.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): GuardConfig {
  const issues: string[] = [];

  const number = (name: string): number | undefined => {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return undefined;
    const value = Number(raw);
    if (Number.isNaN(value)) {
      issues.push(`${name}: expected a number, got '${raw}'`);
      return undefined;
    }
    return value;
  };

  const flag = (name: string): boolean | undefined => {
    const raw = env[name]?.trim().toLowerCase();
    if (raw === undefined || raw === '') return undefined;
    if (raw === 'true' || raw === '1') return true;
    if (raw === 'false' || raw === '0') return false;
    issues.push(`${name}: expected true or false, got '${raw}'`);
    return undefined;
  };

  const input = {
    confidenceThreshold: number('GUARD_CONFIDENCE_THRESHOLD'),
    penalties: {
      bypassAttempt: number('GUARD_PENALTY_BYPASS'),
      semanticFlag: number('GUARD_PENALTY_SEMANTIC'),
      whitelistViolation: number('GUARD_PENALTY_WHITELIST'),
      criticalRule: number('GUARD_PENALTY_CRITICAL'),
    },
    leetspeakEnabled: flag('GUARD_LEETSPEAK'),
    auditLogPath: env.GUARD_AUDIT_LOG || undefined,
    auditServiceUrl: env.GUARD_AUDIT_URL || undefined,
    telemetryEnabled: flag('TELEMETRY_ENABLED'),
  };

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  return parseConfig(input);
}

/**
 * Problems with a configuration, for startup validation
 */
export function checkConfig(config: GuardConfig): string[] {
  const problems: string[] = [];

  if (config.confidenceThreshold < 0 || config.confidenceThreshold > 1) {
    problems.push(`confidence threshold ${config.confidenceThreshold} is outside [0, 1]`);
  }

  if (config.auditServiceUrl !== undefined) {
    try {
      const url = new URL(config.auditServiceUrl);
      if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        problems.push(`audit service URL must use http or https, got ${url.protocol}`);
      }
    } catch {
      problems.push(`audit service URL '${config.auditServiceUrl}' does not parse`);
    }
  }

  return problems;
}
