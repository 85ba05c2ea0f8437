/**
 * @module types
 * @description Internal type definitions for the Safety Guard Agent
 */

import type { BypassTechnique, GuardDecision, RuleSeverity } from '@request-guard/contracts';

/**
 * Static rule definition, as written in the rule tables
 */
export interface RuleDefinition {
  /** Stable rule ID (kebab-case) */
  id: string;
  /** Rule revision; bumped whenever the pattern changes */
  version: number;
  /** Regex source, matched against normalized (lowercase) text */
  pattern: string;
  /** Critical rules block; confirm rules require a human */
  severity: RuleSeverity;
  /** Free label, e.g. "equipment-control" */
  category: string;
  /** Human-readable description */
  description: string;
  /** Confirmation prompt shown to the user (confirm rules only) */
  prompt?: string;
}

/**
 * Rule with its regex compiled once at load
 */
export interface CompiledRule extends Readonly<RuleDefinition> {
  readonly regex: RegExp;
}

export type RuleId = string;

/**
 * Output of the pattern matcher
 */
export interface MatchResult {
  critical: RuleId[];
  confirm: RuleId[];
}

/**
 * What the normalizer saw while canonicalizing the raw text.
 * The bypass sub-check turns these observations into technique names.
 */
export interface NormalizationReport {
  /** Canonical text */
  text: string;
  /** Zero-width or bidi-control characters removed */
  zeroWidthRemoved: number;
  /** Characters folded by compatibility decomposition (full-width, ligatures, ...) */
  compatibilityFolded: number;
  /** Tokens mixing Latin with look-alike letters of another script */
  mixedScriptTokens: number;
  /** Tokens with alternating letter case (e.g. "cOnTrOl") */
  caseMixedTokens: number;
  /** Runs of single characters rejoined into one word */
  spacedRunsJoined: number;
  /** Tokens rewritten by the leetspeak table */
  leetTokens: number;
  /** Rewritten tokens with a substitution between two letters, or several substitutions */
  leetSuspiciousTokens: number;
  /** Ratio of non-alphanumeric, non-space characters in the raw text */
  symbolDensity: number;
  /** Non-space characters in the raw text */
  visibleLength: number;
}

/**
 * Kinds of semantic flag
 */
export type SemanticFlagKind =
  | 'destructive_verb'
  | 'risky_pair'
  | 'privileged_context'
  | 'missing_safe_operation';

/**
 * Intent signal reported by the semantic analyzer
 */
export interface SemanticFlag {
  kind: SemanticFlagKind;
  /** What triggered the flag (verb, pair ID, rule ID) */
  subject: string;
  /** Human-readable explanation */
  message: string;
}

/**
 * Output of the whitelist validator
 */
export interface WhitelistResult {
  matchedCategories: Set<string>;
  violations: string[];
}

/**
 * A single piece of evidence accumulated during one evaluation
 */
export type EvidenceItem =
  | { kind: 'critical_rule'; ruleId: RuleId }
  | { kind: 'confirm_rule'; ruleId: RuleId }
  | { kind: 'bypass_attempt'; technique: BypassTechnique }
  | { kind: 'semantic_flag'; flag: SemanticFlag }
  | { kind: 'whitelist_violation'; violation: string };

export type EvidenceKind = EvidenceItem['kind'];

/**
 * Per-evaluation accumulator. Built and discarded within one call.
 */
export interface Evidence {
  normalizedText: string;
  matches: MatchResult;
  matchedCategories: Set<string>;
  items: EvidenceItem[];
}

/**
 * States of the decision state machine
 */
export type DecisionState = 'pending' | GuardDecision;

/**
 * Aggregated verdict, before it is wrapped into a SafetyCheck
 */
export interface Verdict {
  decision: GuardDecision;
  confidence: number;
  warnings: string[];
  requiredConfirmations: string[];
  blockedKeywords: string[];
}
