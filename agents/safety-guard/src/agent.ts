/**
 * @module agent
 * @description Safety Guard Agent implementation
 *
 * Classification: ENFORCEMENT
 * Decision Type: request_safety_evaluation
 *
 * Gates project requests before any generation work runs. Every evaluation
 * yields a SafetyCheck and exactly one audit record.
 */

import { createHash, randomUUID } from 'crypto';
import {
  type AgentIdentity,
  type AuditRecord,
  type GuardRequest,
  type RequestContext,
  type SafetyCheck,
  GuardRequest as GuardRequestSchema,
} from '@request-guard/contracts';
import {
  InputValidationError,
  structuredLog,
  type AgentIdentityContext,
  type StartupCheck,
} from '@request-guard/lib';
import { DecisionAggregator } from './aggregator.js';
import {
  FanOutAuditSink,
  FileAuditSink,
  RemoteAuditSink,
  type AuditSink,
} from './audit-sink.js';
import { checkConfig, parseConfig, type GuardConfig, type GuardConfigInput } from './config.js';
import { PatternMatcher } from './matcher.js';
import { normalizeWithReport } from './normalizer.js';
import { RULESET_VERSION, checkRuleTables } from './patterns.js';
import { SemanticAnalyzer } from './semantic.js';
import { TelemetryEmitter, type TelemetryConfig } from './telemetry.js';
import type { Evidence, EvidenceItem } from './types.js';
import { WhitelistValidator } from './whitelist.js';

/**
 * Agent identity constant
 */
export const AGENT_IDENTITY: AgentIdentity = {
  agent_id: 'safety-guard-agent',
  agent_version: '1.0.0',
  classification: 'ENFORCEMENT',
  decision_type: 'request_safety_evaluation',
};

/**
 * Identity used in structured log lines
 */
export const AGENT_LOG_CONTEXT: AgentIdentityContext = {
  agent_name: AGENT_IDENTITY.agent_id,
  agent_version: AGENT_IDENTITY.agent_version,
  domain: 'request-safety',
};

/**
 * Agent options
 */
export interface AgentOptions {
  /** Guard configuration; defaults fill anything left out */
  config?: GuardConfigInput;
  /** Audit destination. Defaults to the sinks named in config; null disables. */
  sink?: AuditSink | null;
  /** Telemetry emitter. Defaults to one built from config.telemetryEnabled */
  telemetry?: TelemetryEmitter;
  /** Overrides for the default telemetry emitter */
  telemetryConfig?: Partial<TelemetryConfig>;
  /** Log a decision_recorded line per evaluation */
  logDecisions?: boolean;
  clock?: () => Date;
  idGenerator?: () => string;
}

/**
 * Build the audit sink named by configuration, if any
 */
export function createAuditSink(config: GuardConfig): AuditSink | null {
  const sinks: AuditSink[] = [];
  if (config.auditLogPath) sinks.push(new FileAuditSink(config.auditLogPath));
  if (config.auditServiceUrl) sinks.push(new RemoteAuditSink({ baseUrl: config.auditServiceUrl }));

  if (sinks.length === 0) return null;
  if (sinks.length === 1) return sinks[0] ?? null;
  return new FanOutAuditSink(sinks);
}

/**
 * Text the guard analyzes: the description followed by every declared
 * feature, constraint and environment, one per line. Target users are
 * context only.
 */
export function combineRequestText(request: GuardRequest): string {
  const environment =
    request.environment === undefined
      ? []
      : Array.isArray(request.environment)
        ? request.environment
        : [request.environment];

  return [
    request.description,
    ...(request.features ?? []),
    ...(request.constraints ?? []),
    ...environment,
  ]
    .filter((part) => part.length > 0)
    .join('\n');
}

function correlation(
  context: RequestContext | undefined
): Pick<AuditRecord, 'execution_ref' | 'caller_id' | 'session_id'> {
  return {
    ...(context?.execution_ref !== undefined && { execution_ref: context.execution_ref }),
    ...(context?.caller_id !== undefined && { caller_id: context.caller_id }),
    ...(context?.session_id !== undefined && { session_id: context.session_id }),
  };
}

/**
 * Safety Guard Agent
 *
 * Responsibilities:
 * - Normalize request text and match it against the rule tables
 * - Collect bypass, semantic and whitelist evidence
 * - Decide blocked / confirm_required / approved
 * - Hand one audit record per evaluation to the audit sink
 *
 * Non-Responsibilities:
 * - Does NOT execute or sandbox anything
 * - Does NOT modify rule tables at runtime
 * - Does NOT fail an evaluation because the audit sink failed
 */
export class SafetyGuardAgent {
  readonly config: GuardConfig;
  private readonly matcher = new PatternMatcher();
  private readonly semantic = new SemanticAnalyzer();
  private readonly whitelist = new WhitelistValidator();
  private readonly aggregator: DecisionAggregator;
  private readonly sink: AuditSink | null;
  private readonly telemetry: TelemetryEmitter;
  private readonly logDecisions: boolean;
  private readonly clock: () => Date;
  private readonly idGenerator: () => string;
  private readonly pendingWrites = new Set<Promise<void>>();

  constructor(options: AgentOptions = {}) {
    this.config = parseConfig(options.config ?? {});
    this.aggregator = new DecisionAggregator({
      confidenceThreshold: this.config.confidenceThreshold,
      penalties: this.config.penalties,
      getRule: (id) => this.matcher.getRule(id),
    });
    this.sink = options.sink === undefined ? createAuditSink(this.config) : options.sink;
    this.telemetry =
      options.telemetry ??
      new TelemetryEmitter(AGENT_IDENTITY, {
        enabled: this.config.telemetryEnabled,
        ...options.telemetryConfig,
      });
    this.logDecisions = options.logDecisions ?? false;
    this.clock = options.clock ?? (() => new Date());
    this.idGenerator = options.idGenerator ?? randomUUID;
  }

  /**
   * Evaluate a request. Always returns a SafetyCheck; never throws for a
   * request that passed validateInput.
   */
  evaluate(request: GuardRequest): SafetyCheck {
    const startTime = performance.now();
    const evaluationId = this.idGenerator();
    const timestamp = this.clock().toISOString();
    const rawText = combineRequestText(request);

    this.telemetry.emitEvaluationStart(evaluationId, rawText.length);

    const report = normalizeWithReport(rawText, { leetspeak: this.config.leetspeakEnabled });
    const matches = this.matcher.match(report.text);
    const bypassAttempts = this.matcher.detectBypassAttempts(report);
    const flags = this.semantic.analyze(report.text, {
      environment: request.environment,
      targetUsers: request.target_users,
      confirmMatches: matches.confirm,
    });
    const whitelist = this.whitelist.validate(report.text);

    const items: EvidenceItem[] = [];
    for (const ruleId of matches.critical) items.push({ kind: 'critical_rule', ruleId });
    for (const ruleId of matches.confirm) items.push({ kind: 'confirm_rule', ruleId });
    for (const technique of bypassAttempts) items.push({ kind: 'bypass_attempt', technique });
    for (const flag of flags) items.push({ kind: 'semantic_flag', flag });
    for (const violation of whitelist.violations) items.push({ kind: 'whitelist_violation', violation });

    const evidence: Evidence = {
      normalizedText: report.text,
      matches,
      matchedCategories: whitelist.matchedCategories,
      items,
    };
    const verdict = this.aggregator.aggregate(evidence);
    const approved = verdict.decision === 'approved';

    const record: AuditRecord = {
      evaluation_id: evaluationId,
      timestamp,
      ruleset_version: RULESET_VERSION,
      raw_text: rawText,
      inputs_hash: createHash('sha256').update(rawText).digest('hex'),
      normalized_text: report.text,
      patterns_matched: [...matches.critical, ...matches.confirm],
      bypass_attempts_detected: bypassAttempts,
      semantic_flags: flags.map((f) => `${f.kind}:${f.subject}`),
      whitelist_violations: whitelist.violations,
      matched_categories: [...whitelist.matchedCategories],
      confidence_score: verdict.confidence,
      decision: verdict.decision,
      approved,
      ...correlation(request.context),
    };

    for (const ruleId of record.patterns_matched) {
      const rule = this.matcher.getRule(ruleId);
      if (rule) this.telemetry.emitRuleMatched(evaluationId, rule.id, rule.category, rule.severity);
    }

    this.dispatch(record);

    if (this.logDecisions) {
      structuredLog('decision_recorded', `Request ${verdict.decision}`, AGENT_LOG_CONTEXT, {
        evaluation_id: evaluationId,
        inputs_hash: record.inputs_hash,
        input_length: rawText.length,
        decision: verdict.decision,
        confidence_score: verdict.confidence,
        patterns_matched: record.patterns_matched,
      });
    }

    this.telemetry.emitEvaluationComplete(
      evaluationId,
      performance.now() - startTime,
      verdict.decision,
      verdict.confidence,
      record.patterns_matched.length,
      bypassAttempts
    );

    return {
      approved,
      decision: verdict.decision,
      warnings: verdict.warnings,
      required_confirmations: verdict.requiredConfirmations,
      blocked_keywords: verdict.blockedKeywords,
      confidence_score: verdict.confidence,
      metadata: record,
    };
  }

  /**
   * Validate input against schema
   */
  validateInput(input: unknown): GuardRequest {
    const result = GuardRequestSchema.safeParse(input);

    if (!result.success) {
      throw new InputValidationError(
        result.error.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        }))
      );
    }

    return result.data;
  }

  /**
   * Wait for every audit write started so far, then flush telemetry
   */
  async flush(): Promise<void> {
    await Promise.all([...this.pendingWrites]);
    await this.telemetry.flush();
  }

  /**
   * Shutdown agent gracefully
   */
  async shutdown(): Promise<void> {
    await Promise.all([...this.pendingWrites]);
    await this.telemetry.shutdown();
  }

  /**
   * Audit writes in flight
   */
  get pendingAuditWrites(): number {
    return this.pendingWrites.size;
  }

  private dispatch(record: AuditRecord): void {
    if (!this.sink) return;

    const write = this.writeRecord(this.sink, record);
    this.pendingWrites.add(write);
    void write.then(() => {
      this.pendingWrites.delete(write);
    });
  }

  private async writeRecord(sink: AuditSink, record: AuditRecord): Promise<void> {
    try {
      await sink.append(record);
      this.telemetry.emitAuditSuccess(record.evaluation_id, sink.name);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      structuredLog('audit_write_failed', 'Audit record could not be written', AGENT_LOG_CONTEXT, {
        evaluation_id: record.evaluation_id,
        inputs_hash: record.inputs_hash,
        decision: record.decision,
        sink: sink.name,
        error: message,
      });
      this.telemetry.emitAuditFailure(record.evaluation_id, sink.name, message);
    }
  }
}

/**
 * Checks run before a long-lived guard process accepts requests
 */
export function startupChecks(config: GuardConfig): StartupCheck[] {
  return [
    { name: 'rule-tables', run: checkRuleTables },
    { name: 'config', run: () => checkConfig(config) },
  ];
}

/**
 * Create agent instance with default configuration
 */
export function createAgent(options?: AgentOptions): SafetyGuardAgent {
  return new SafetyGuardAgent(options);
}
