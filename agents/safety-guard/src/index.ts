/**
 * @module safety-guard
 * @description Safety Guard Agent
 *
 * Gates project requests before any generation work runs: normalizes the
 * request text, matches it against critical and confirm rules, collects
 * semantic and whitelist evidence, and decides blocked, confirm_required
 * or approved. Every evaluation produces one audit record.
 *
 * Classification: ENFORCEMENT
 * Decision Type: request_safety_evaluation
 */

// Agent
export {
  SafetyGuardAgent,
  createAgent,
  createAuditSink,
  combineRequestText,
  startupChecks,
  AGENT_IDENTITY,
  AGENT_LOG_CONTEXT,
  type AgentOptions,
} from './agent.js';

// Handler
export { handler, createHandler, type Handler, type EdgeRequest, type EdgeResponse } from './handler.js';

// Pipeline stages
export { normalize, normalizeWithReport, CONFUSABLES, LEET_TABLE, type NormalizerOptions } from './normalizer.js';
export {
  PatternMatcher,
  SYMBOL_DENSITY_THRESHOLD,
  SYMBOL_DENSITY_MIN_LENGTH,
} from './matcher.js';
export {
  SemanticAnalyzer,
  DESTRUCTIVE_VERBS,
  RISKY_PAIRS,
  isPrivilegedContext,
  type RiskyPair,
  type SemanticContext,
} from './semantic.js';
export { WhitelistValidator, APPROVED_OPERATIONS, findHeadVerb } from './whitelist.js';
export {
  DecisionAggregator,
  scoreConfidence,
  penaltyFor,
  type AggregatorOptions,
} from './aggregator.js';

// Rule tables
export {
  RULESET_VERSION,
  CRITICAL_RULES,
  CONFIRM_RULES,
  compileRuleTable,
  getAllRules,
  getRuleById,
  getRuleCountByCategory,
} from './patterns.js';

// Configuration
export {
  GuardConfig,
  PenaltyWeights,
  DEFAULT_CONFIG,
  parseConfig,
  loadConfigFromEnv,
  type GuardConfigInput,
} from './config.js';

// Types
export type {
  RuleDefinition,
  CompiledRule,
  RuleId,
  MatchResult,
  NormalizationReport,
  SemanticFlag,
  SemanticFlagKind,
  WhitelistResult,
  Evidence,
  EvidenceItem,
  EvidenceKind,
  Verdict,
} from './types.js';

// Audit sinks
export {
  FileAuditSink,
  RemoteAuditSink,
  InMemoryAuditSink,
  FanOutAuditSink,
  type AuditSink,
  type RemoteAuditSinkConfig,
} from './audit-sink.js';

// Telemetry
export {
  TelemetryEmitter,
  type TelemetryConfig,
  type TelemetryEvent,
  type TelemetryEventType,
} from './telemetry.js';
