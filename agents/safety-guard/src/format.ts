/**
 * @module format
 * @description Human-readable rendering of guard results for the CLI
 */

import chalk, { type ChalkInstance } from 'chalk';
import type { GuardDecision, SafetyCheck } from '@request-guard/contracts';
import type { GuardConfig } from './config.js';
import { CONFIRM_RULES, CRITICAL_RULES, RULESET_VERSION, getRuleCountByCategory } from './patterns.js';

/**
 * Process exit code for a decision
 */
export function exitCodeFor(decision: GuardDecision): number {
  switch (decision) {
    case 'approved':
      return 0;
    case 'confirm_required':
      return 2;
    case 'blocked':
      return 1;
  }
}

function decisionLabel(decision: GuardDecision, c: ChalkInstance): string {
  switch (decision) {
    case 'approved':
      return c.green('✓ APPROVED');
    case 'confirm_required':
      return c.yellow('? CONFIRMATION REQUIRED');
    case 'blocked':
      return c.red('✗ BLOCKED');
  }
}

export function formatSafetyCheck(check: SafetyCheck, c: ChalkInstance = chalk): string {
  const record = check.metadata;
  const lines: string[] = [
    c.bold('=== Request Safety Evaluation ==='),
    '',
    `Decision:   ${decisionLabel(check.decision, c)}`,
    `Confidence: ${(check.confidence_score * 100).toFixed(1)}%`,
    `Rules:      ${record.patterns_matched.length > 0 ? record.patterns_matched.join(', ') : 'none'}`,
  ];

  if (check.blocked_keywords.length > 0) {
    lines.push(`Blocked:    ${check.blocked_keywords.join(', ')}`);
  }

  if (record.bypass_attempts_detected.length > 0) {
    lines.push(`Bypass:     ${record.bypass_attempts_detected.join(', ')}`);
  }

  if (check.required_confirmations.length > 0) {
    lines.push('', c.bold('Confirm before proceeding:'));
    for (const prompt of check.required_confirmations) lines.push(`  - ${prompt}`);
  }

  if (check.warnings.length > 0) {
    lines.push('', c.bold('Warnings:'));
    for (const warning of check.warnings) lines.push(`  - ${warning}`);
  }

  lines.push('', c.gray(`Evaluation ${record.evaluation_id} (ruleset ${record.ruleset_version})`));

  return lines.join('\n');
}

/**
 * Rule counts and active configuration, as printed by `inspect`
 */
export function describeGuard(config: GuardConfig): Record<string, unknown> {
  return {
    ruleset_version: RULESET_VERSION,
    rules: {
      critical: CRITICAL_RULES.length,
      confirm: CONFIRM_RULES.length,
      by_category: getRuleCountByCategory(),
    },
    configuration: {
      confidence_threshold: config.confidenceThreshold,
      penalties: config.penalties,
      leetspeak_enabled: config.leetspeakEnabled,
      audit_log_path: config.auditLogPath ?? null,
      audit_service_url: config.auditServiceUrl ?? null,
      telemetry_enabled: config.telemetryEnabled,
    },
  };
}

export function formatInspection(config: GuardConfig, c: ChalkInstance = chalk): string {
  const lines: string[] = [
    c.bold('=== Safety Guard ==='),
    '',
    `Ruleset:    ${RULESET_VERSION}`,
    `Rules:      ${CRITICAL_RULES.length} critical, ${CONFIRM_RULES.length} confirm`,
    '',
    c.bold('By category:'),
  ];

  for (const [category, count] of Object.entries(getRuleCountByCategory())) {
    lines.push(`  ${category.padEnd(20)} ${count}`);
  }

  const p = config.penalties;
  lines.push(
    '',
    c.bold('Configuration:'),
    `  threshold            ${config.confidenceThreshold}`,
    `  penalties            bypass ${p.bypassAttempt}, semantic ${p.semanticFlag}, whitelist ${p.whitelistViolation}, critical ${p.criticalRule}`,
    `  leetspeak            ${config.leetspeakEnabled ? 'on' : 'off'}`,
    `  audit log            ${config.auditLogPath ?? '-'}`,
    `  audit service        ${config.auditServiceUrl ?? '-'}`,
    `  telemetry            ${config.telemetryEnabled ? 'on' : 'off'}`
  );

  return lines.join('\n');
}
