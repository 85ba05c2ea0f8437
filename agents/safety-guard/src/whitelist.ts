/**
 * @module whitelist
 * @description Approved-operation validator
 *
 * Finds which approved operation categories a request uses, and checks that
 * the head verb of the request (the action it asks for) belongs to one of
 * them. Violations lower confidence but never block on their own.
 */

import { StemLexicon, tokenize } from './stems.js';
import type { WhitelistResult } from './types.js';

/**
 * Approved verb stems per operation category
 */
export const APPROVED_OPERATIONS: Readonly<Record<string, readonly string[]>> = {
  read: ['read', 'display', 'show', 'list', 'view', 'get', 'fetch'],
  calculate: ['calculate', 'compute', 'analyze', 'parse', 'validate'],
  transform: ['format', 'convert', 'transform', 'encode', 'decode'],
  monitor: ['log', 'track', 'monitor', 'measure', 'report'],
  search: ['search', 'find', 'filter', 'sort', 'query'],
  create: ['create', 'generate', 'build', 'make', 'initialize'],
  test: ['test', 'verify', 'check', 'inspect', 'scan'],
  update: ['update', 'modify', 'edit', 'change', 'adjust'],
  help: ['help', 'guide', 'assist', 'support', 'document'],
};

/** Words that open a request without carrying its action */
const FILLERS = new Set([
  'a', 'an', 'the', 'i', 'we', 'you', 'please', 'want', 'need', 'would',
  'like', 'to', 'can', 'could', 'let', 'lets', 'us', 'me',
]);

/** Words that open a noun phrase naming the thing to build ("a tool that ...") */
const NOUN_INTRO = new Set([
  'tool', 'app', 'application', 'program', 'script', 'utility', 'service',
  'bot', 'dashboard', 'system', 'website', 'page', 'something', 'way',
  'function', 'module', 'library', 'cli', 'simple', 'small', 'basic', 'new',
  'quick', 'web', 'mobile', 'desktop',
]);

const CONNECTORS = new Set(['to', 'that', 'which']);
const MODALS = new Set(['can', 'will', 'should', 'would', 'could']);

const CATEGORY_LEXICONS: ReadonlyArray<[string, StemLexicon]> = Object.entries(
  APPROVED_OPERATIONS
).map(([category, stems]) => [category, new StemLexicon(stems)]);

const APPROVED_LEXICON = new StemLexicon(Object.values(APPROVED_OPERATIONS).flat());

/**
 * True when any approved verb stem appears in the tokens
 */
export function containsApprovedOperation(tokens: readonly string[]): boolean {
  return APPROVED_LEXICON.has(tokens);
}

/**
 * Head verb of a request: the first token after leading fillers, or, when
 * the request opens with a noun phrase, the first token after the
 * to/that/which that introduces its action.
 */
export function findHeadVerb(tokens: readonly string[]): string | undefined {
  let i = 0;
  while (i < tokens.length && FILLERS.has(tokens[i] ?? '')) i++;

  const first = tokens[i];
  if (first === undefined) return undefined;
  if (!NOUN_INTRO.has(first)) return first;

  for (let j = i + 1; j < tokens.length; j++) {
    if (!CONNECTORS.has(tokens[j] ?? '')) continue;
    let k = j + 1;
    while (k < tokens.length && MODALS.has(tokens[k] ?? '')) k++;
    return tokens[k];
  }

  return undefined;
}

export class WhitelistValidator {
  /**
   * Validate normalized text against the approved operations
   */
  validate(normalized: string): WhitelistResult {
    const tokens = tokenize(normalized);
    const matchedCategories = new Set<string>();

    for (const [category, lexicon] of CATEGORY_LEXICONS) {
      if (lexicon.has(tokens)) matchedCategories.add(category);
    }

    const violations: string[] = [];
    const head = findHeadVerb(tokens);
    if (head !== undefined && /\p{L}/u.test(head) && APPROVED_LEXICON.lookup(head) === undefined) {
      violations.push(`Action '${head}' is not a recognized safe operation`);
    }

    return { matchedCategories, violations };
  }
}
