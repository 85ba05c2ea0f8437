/**
 * @module contracts
 * @description Schema definitions for the request safety guard
 *
 * Every wire shape the guard accepts or produces is defined here.
 * Agents, handlers and sinks import schemas exclusively from this module.
 */

import { z } from 'zod';

// =============================================================================
// CORE ENUMS
// =============================================================================

/**
 * Agent classification determines behavior and capabilities
 */
export const AgentClassification = z.enum([
  'DETECTION_ONLY',    // Reports findings, never decides
  'ENFORCEMENT',       // Decides: approve / confirm / block
]);
export type AgentClassification = z.infer<typeof AgentClassification>;

/**
 * Decision types emitted by agents
 */
export const DecisionType = z.enum(['request_safety_evaluation']);
export type DecisionType = z.infer<typeof DecisionType>;

/**
 * Rule severity. Critical rules block outright; confirm rules need a human.
 */
export const RuleSeverity = z.enum(['critical', 'confirm']);
export type RuleSeverity = z.infer<typeof RuleSeverity>;

/**
 * Terminal states of the decision state machine
 */
export const GuardDecision = z.enum(['blocked', 'confirm_required', 'approved']);
export type GuardDecision = z.infer<typeof GuardDecision>;

/**
 * Obfuscation techniques the bypass sub-check can report
 */
export const BypassTechnique = z.enum([
  'zero_width_insertion',
  'homoglyph_substitution',
  'mixed_script',
  'case_mixing',
  'character_spacing',
  'leetspeak',
  'symbol_density',
]);
export type BypassTechnique = z.infer<typeof BypassTechnique>;

// =============================================================================
// AGENT IDENTITY
// =============================================================================

/**
 * Unique agent identifier with semantic versioning
 */
export const AgentIdentity = z.object({
  /** Unique agent ID (e.g., "safety-guard-agent") */
  agent_id: z.string().regex(/^[a-z][a-z0-9-]*[a-z0-9]$/),
  /** Semantic version (e.g., "1.0.0") */
  agent_version: z.string().regex(/^\d+\.\d+\.\d+(-[a-zA-Z0-9.]+)?$/),
  /** Agent classification */
  classification: AgentClassification,
  /** Decision type this agent emits */
  decision_type: DecisionType,
});
export type AgentIdentity = z.infer<typeof AgentIdentity>;

// =============================================================================
// INPUT SCHEMAS
// =============================================================================

/**
 * Caller-supplied correlation data, copied into the audit record
 */
export const RequestContext = z.object({
  /** Unique execution reference for tracing */
  execution_ref: z.string().uuid().optional(),
  /** Caller identifier */
  caller_id: z.string().optional(),
  /** Session identifier for correlation */
  session_id: z.string().optional(),
});
export type RequestContext = z.infer<typeof RequestContext>;

/**
 * A project request submitted for safety evaluation.
 *
 * The description may be empty: empty requests are evaluated (and blocked)
 * rather than rejected.
 */
export const GuardRequest = z.object({
  /** Free-text description of what to build */
  description: z.string(),
  /** Target user roles (e.g., "marine engineer") */
  target_users: z.array(z.string()).optional(),
  /** Operating environment, one entry or several */
  environment: z.union([z.string(), z.array(z.string())]).optional(),
  /** Declared features */
  features: z.array(z.string()).optional(),
  /** Known constraints */
  constraints: z.array(z.string()).optional(),
  /** Correlation context */
  context: RequestContext.optional(),
});
export type GuardRequest = z.infer<typeof GuardRequest>;

// =============================================================================
// OUTPUT SCHEMAS
// =============================================================================

/**
 * Audit record built for every evaluation, one per call
 */
export const AuditRecord = z.object({
  /** Unique evaluation ID */
  evaluation_id: z.string().uuid(),
  /** Evaluation time (UTC ISO 8601) */
  timestamp: z.string().datetime(),
  /** Version of the rule tables that produced the decision */
  ruleset_version: z.string(),
  /** Combined request text, kept for human review only */
  raw_text: z.string(),
  /** SHA-256 of raw_text */
  inputs_hash: z.string().regex(/^[a-f0-9]{64}$/),
  /** Text every stage analyzed */
  normalized_text: z.string(),
  /** Matched rule IDs, critical first, in table order */
  patterns_matched: z.array(z.string()),
  /** Obfuscation techniques detected */
  bypass_attempts_detected: z.array(BypassTechnique),
  /** Semantic flags, in detection order */
  semantic_flags: z.array(z.string()),
  /** Whitelist violations */
  whitelist_violations: z.array(z.string()),
  /** Approved operation categories found in the text */
  matched_categories: z.array(z.string()),
  /** Final confidence score (0.0 - 1.0) */
  confidence_score: z.number().min(0).max(1),
  /** Terminal decision */
  decision: GuardDecision,
  /** Whether the request was approved */
  approved: z.boolean(),
  /** Execution reference supplied by the caller */
  execution_ref: z.string().uuid().optional(),
  /** Caller identifier supplied by the caller */
  caller_id: z.string().optional(),
  /** Session identifier supplied by the caller */
  session_id: z.string().optional(),
});
export type AuditRecord = z.infer<typeof AuditRecord>;

/**
 * Result returned to the caller of evaluate()
 */
export const SafetyCheck = z.object({
  /** Whether the request may proceed */
  approved: z.boolean(),
  /** Terminal decision */
  decision: GuardDecision,
  /** Human-readable warnings and block reasons */
  warnings: z.array(z.string()),
  /** Prompts the caller must confirm with the user before proceeding */
  required_confirmations: z.array(z.string()),
  /** Categories of the critical rules that blocked the request */
  blocked_keywords: z.array(z.string()),
  /** Confidence in request safety (0.0 - 1.0) */
  confidence_score: z.number().min(0).max(1),
  /** Audit record of this evaluation */
  metadata: AuditRecord,
});
export type SafetyCheck = z.infer<typeof SafetyCheck>;

// =============================================================================
// ERROR SCHEMAS
// =============================================================================

/**
 * Agent error codes
 */
export const AgentErrorCode = z.enum([
  'INVALID_INPUT',
  'VALIDATION_FAILED',
  'INTERNAL_ERROR',
  'CONFIGURATION_ERROR',
]);
export type AgentErrorCode = z.infer<typeof AgentErrorCode>;

/**
 * Agent error response
 */
export const AgentError = z.object({
  /** Error code */
  code: AgentErrorCode,
  /** Human-readable message */
  message: z.string(),
  /** Agent identity */
  agent: AgentIdentity.optional(),
  /** Timestamp */
  timestamp: z.string().datetime(),
  /** Additional error details (no request text) */
  details: z.record(z.string(), z.unknown()).optional(),
});
export type AgentError = z.infer<typeof AgentError>;
