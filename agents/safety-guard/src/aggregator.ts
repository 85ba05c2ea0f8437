/**
 * @module aggregator
 * @description Reduces evidence to a confidence score and a decision
 *
 * Decision order:
 * 1. any critical rule         -> blocked
 * 2. no word tokens           -> blocked
 * 3. any confirm rule          -> confirm_required
 * 4. confidence below threshold -> blocked
 * 5. otherwise                 -> approved
 */

import type { CompiledRule, DecisionState, Evidence, EvidenceItem, EvidenceKind, Verdict } from './types.js';
import type { PenaltyWeights } from './config.js';
import { tokenize } from './stems.js';

export const INSUFFICIENT_CONFIDENCE_WARNING = 'BLOCKED: Insufficient confidence in request safety';
export const EMPTY_REQUEST_WARNING = 'BLOCKED: Request contains no analyzable text';

/**
 * Confidence penalty of one evidence item
 */
export function penaltyFor(kind: EvidenceKind, penalties: PenaltyWeights): number {
  switch (kind) {
    case 'critical_rule':
      return penalties.criticalRule;
    case 'confirm_rule':
      return 0;
    case 'bypass_attempt':
      return penalties.bypassAttempt;
    case 'semantic_flag':
      return penalties.semanticFlag;
    case 'whitelist_violation':
      return penalties.whitelistViolation;
  }
}

/**
 * 1.0 minus the penalty of every item, clamped to [0, 1] and rounded to
 * four decimals. Never increases as items are added.
 */
export function scoreConfidence(items: readonly EvidenceItem[], penalties: PenaltyWeights): number {
  const raw = items.reduce((score, item) => score - penaltyFor(item.kind, penalties), 1.0);
  const clamped = Math.max(0, Math.min(1, raw));
  return Math.round(clamped * 10_000) / 10_000;
}

export interface AggregatorOptions {
  confidenceThreshold: number;
  penalties: PenaltyWeights;
  /** Resolves rule IDs to rules for warnings, prompts and categories */
  getRule: (id: string) => CompiledRule | undefined;
}

export class DecisionAggregator {
  constructor(private readonly options: AggregatorOptions) {}

  aggregate(evidence: Evidence): Verdict {
    const confidence = scoreConfidence(evidence.items, this.options.penalties);
    const { critical, confirm } = evidence.matches;

    let state: DecisionState = 'pending';
    const reasons: string[] = [];

    if (critical.length > 0) {
      state = 'blocked';
      for (const id of critical) {
        const rule = this.options.getRule(id);
        reasons.push(`BLOCKED: ${rule?.description ?? id} (rule ${id})`);
      }
    } else if (tokenize(evidence.normalizedText).length === 0) {
      state = 'blocked';
      reasons.push(EMPTY_REQUEST_WARNING);
    } else if (confirm.length > 0) {
      state = 'confirm_required';
    } else if (confidence < this.options.confidenceThreshold) {
      state = 'blocked';
      reasons.push(INSUFFICIENT_CONFIDENCE_WARNING);
    } else {
      state = 'approved';
    }

    const requiredConfirmations =
      state === 'confirm_required'
        ? confirm.map((id) => this.options.getRule(id)?.prompt ?? `Confirm operation '${id}' before proceeding.`)
        : [];

    const blockedKeywords: string[] = [];
    if (state === 'blocked') {
      for (const id of critical) {
        const category = this.options.getRule(id)?.category ?? id;
        if (!blockedKeywords.includes(category)) blockedKeywords.push(category);
      }
    }

    return {
      decision: state,
      confidence,
      warnings: [...reasons, ...this.notes(evidence.items)],
      requiredConfirmations,
      blockedKeywords,
    };
  }

  private notes(items: readonly EvidenceItem[]): string[] {
    const notes: string[] = [];

    for (const item of items) {
      switch (item.kind) {
        case 'bypass_attempt':
          notes.push(`Warning: Possible obfuscation detected (${item.technique})`);
          break;
        case 'semantic_flag':
          notes.push(`Warning: ${item.flag.message}`);
          break;
        case 'whitelist_violation':
          notes.push(`Note: ${item.violation}`);
          break;
        case 'critical_rule':
        case 'confirm_rule':
          break;
      }
    }

    return notes;
  }
}
