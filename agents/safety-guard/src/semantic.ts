/**
 * @module semantic
 * @description Intent signals that single regex rules cannot express
 *
 * The analyzer only reports flags. Weighting them is the aggregator's job.
 */

import { StemLexicon, tokenize } from './stems.js';
import { containsApprovedOperation } from './whitelist.js';
import type { RuleId, SemanticFlag } from './types.js';

export const DESTRUCTIVE_VERBS = [
  'destroy',
  'wipe',
  'erase',
  'corrupt',
  'damage',
  'break',
  'crash',
  'kill',
  'sabotage',
  'circumvent',
  'evade',
] as const;

/**
 * Keyword pairs that are only risky together. Each side lists stems.
 */
export interface RiskyPair {
  id: string;
  left: readonly string[];
  right: readonly string[];
  description: string;
}

export const RISKY_PAIRS: readonly RiskyPair[] = [
  {
    id: 'system-control',
    left: ['system'],
    right: ['control'],
    description: 'Request combines system and control',
  },
  {
    id: 'system-access',
    left: ['system'],
    right: ['access'],
    description: 'Request combines system and access',
  },
  {
    id: 'system-override',
    left: ['system'],
    right: ['override'],
    description: 'Request combines system and override',
  },
  {
    id: 'obfuscate-execute',
    left: ['obfuscate', 'hide', 'encrypt'],
    right: ['execute', 'exec', 'run'],
    description: 'Request combines obfuscation with code execution',
  },
  {
    id: 'encode-eval',
    left: ['encode', 'decode'],
    right: ['eval'],
    description: 'Request combines encoding with eval',
  },
];

/** Words marking a privileged operating context or audience */
export const PRIVILEGED_TERMS = new Set([
  'admin',
  'admins',
  'administrator',
  'administrators',
  'root',
  'superuser',
  'production',
  'prod',
  'privileged',
  'sysadmin',
  'sysadmins',
]);

/**
 * Structured hints that travel with the request text
 */
export interface SemanticContext {
  environment?: string | string[];
  targetUsers?: string[];
  /** Confirm rules that matched the same text */
  confirmMatches?: RuleId[];
}

const DESTRUCTIVE_LEXICON = new StemLexicon(DESTRUCTIVE_VERBS);

const PAIR_LEXICONS = RISKY_PAIRS.map((pair) => ({
  pair,
  left: new StemLexicon(pair.left),
  right: new StemLexicon(pair.right),
}));

export class SemanticAnalyzer {
  /**
   * Analyze normalized text. Flags come out in a fixed order: destructive
   * verbs, risky pairs, privileged context, missing safe operation.
   */
  analyze(normalized: string, context: SemanticContext = {}): SemanticFlag[] {
    const tokens = tokenize(normalized);
    const flags: SemanticFlag[] = [];

    for (const verb of DESTRUCTIVE_LEXICON.findAll(tokens)) {
      flags.push({
        kind: 'destructive_verb',
        subject: verb,
        message: `Destructive action '${verb}' requested`,
      });
    }

    for (const { pair, left, right } of PAIR_LEXICONS) {
      if (left.has(tokens) && right.has(tokens)) {
        flags.push({ kind: 'risky_pair', subject: pair.id, message: pair.description });
      }
    }

    if (isPrivilegedContext(context)) {
      for (const ruleId of context.confirmMatches ?? []) {
        flags.push({
          kind: 'privileged_context',
          subject: ruleId,
          message: `Operation '${ruleId}' requested in a privileged context`,
        });
      }
    }

    if (!containsApprovedOperation(tokens)) {
      flags.push({
        kind: 'missing_safe_operation',
        subject: 'approved-operations',
        message: 'No recognized safe operation in request',
      });
    }

    return flags;
  }
}

/**
 * True when the environment or target users mention a privileged context
 */
export function isPrivilegedContext(context: SemanticContext): boolean {
  const environment =
    context.environment === undefined
      ? []
      : Array.isArray(context.environment)
        ? context.environment
        : [context.environment];

  return [...environment, ...(context.targetUsers ?? [])].some((entry) =>
    entry
      .toLowerCase()
      .split(/[^\p{L}\p{N}]+/u)
      .some((word) => PRIVILEGED_TERMS.has(word))
  );
}
