/**
 * @module normalizer
 * @description Canonicalizes raw request text before any analysis
 *
 * Every downstream stage sees only the output of this module. The function
 * is total: malformed input is repaired, never rejected, and
 * normalize(normalize(x)) === normalize(x).
 */

import type { NormalizationReport } from './types.js';

export interface NormalizerOptions {
  /** Apply the leetspeak substitution table (default: true) */
  leetspeak?: boolean;
}

/** Lone UTF-16 surrogates (what malformed byte sequences decode to) */
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

/**
 * Characters that render as nothing: zero-width spaces and joiners, bidi
 * controls, soft hyphens, tag characters, Hangul fillers, variation selectors.
 * Removed outright.
 */
const INVISIBLE = /\p{Default_Ignorable_Code_Point}/gu;
const INVISIBLE_SINGLE = /^\p{Default_Ignorable_Code_Point}$/u;

const SEPARATORS = /[_\-./\\|\u2010-\u2015\u2212]/g;

const COMBINING_MARK = /\p{M}/gu;

/** Runs of three or more single characters separated by single spaces */
const SPACED_RUN = /(?<!\S)(?:[\p{L}\p{N}] ){2,}[\p{L}\p{N}](?!\S)/gu;

const LETTER_RUN = /\p{L}+/gu;
const WORD_RUN = /[\p{L}\p{N}$]+/gu;

/**
 * Lowercase Cyrillic and Greek letters that render like Latin ones.
 * Applied inside tokens that contain Latin letters, and to whole foreign
 * tokens made only of these letters when the text around them is Latin.
 */
export const CONFUSABLES: Readonly<Record<string, string>> = {
  '\u0430': 'a', // а
  '\u0435': 'e', // е
  '\u0456': 'i', // і
  '\u0458': 'j', // ј
  '\u043E': 'o', // о
  '\u0440': 'p', // р
  '\u0441': 'c', // с
  '\u0443': 'y', // у
  '\u0445': 'x', // х
  '\u0455': 's', // ѕ
  '\u043A': 'k', // к
  '\u0501': 'd', // ԁ
  '\u04BB': 'h', // һ
  '\u051B': 'q', // ԛ
  '\u051D': 'w', // ԝ
  '\u03B1': 'a', // α
  '\u03B5': 'e', // ε
  '\u03B9': 'i', // ι
  '\u03BA': 'k', // κ
  '\u03BD': 'v', // ν
  '\u03BF': 'o', // ο
  '\u03C1': 'p', // ρ
  '\u03C5': 'u', // υ
  '\u03F2': 'c', // ϲ
};

/**
 * Leetspeak table. '1' is resolved by context in {@link resolveLeetOne}.
 */
export const LEET_TABLE: Readonly<Record<string, string>> = {
  '0': 'o',
  '3': 'e',
  '4': 'a',
  '$': 's',
};

const LEET_CHARS = new Set(['0', '1', '3', '4', '$']);
const NON_LEET_DIGIT = /[25-9]/;
const VOWELISH = new Set(['a', 'e', 'i', 'o', 'u', '0', '3', '4']);

/**
 * Normalize raw text. See {@link normalizeWithReport} for the steps.
 */
export function normalize(raw: string, options: NormalizerOptions = {}): string {
  return normalizeWithReport(raw, options).text;
}

/**
 * Normalize raw text and report the obfuscation signals observed on the way.
 *
 * Steps, in order:
 * 1. repair lone surrogates, measure symbol density
 * 2. remove invisible characters (default-ignorable code points)
 * 3. note case-mixed tokens
 * 4. compatibility decomposition (NFKD), drop combining marks, lowercase
 * 5. separators to spaces, collapse whitespace, trim
 * 6. rejoin spelled-out words ("c o n t r o l")
 * 7. leetspeak table, when enabled
 * 8. map Latin look-alikes inside mixed-script tokens, and whole look-alike
 *    tokens in Latin text
 */
export function normalizeWithReport(
  raw: string,
  options: NormalizerOptions = {}
): NormalizationReport {
  const leetspeak = options.leetspeak ?? true;

  let text = raw.replace(LONE_SURROGATE, '\uFFFD');
  const { density, visible } = measureSymbolDensity(text);

  let zeroWidthRemoved = 0;
  text = text.replace(INVISIBLE, () => {
    zeroWidthRemoved++;
    return '';
  });

  const caseMixedTokens = countCaseMixedTokens(text);
  const compatibilityFolded = countCompatibilityForms(text);

  text = text
    .normalize('NFKD')
    .replace(COMBINING_MARK, '')
    .toLowerCase()
    .replace(COMBINING_MARK, '');

  text = text.replace(SEPARATORS, ' ').replace(/\s+/g, ' ').trim();

  let spacedRunsJoined = 0;
  text = text.replace(SPACED_RUN, (run) => {
    spacedRunsJoined++;
    return run.replace(/ /g, '');
  });

  let leetTokens = 0;
  let leetSuspiciousTokens = 0;
  if (leetspeak) {
    text = text.replace(WORD_RUN, (run) => {
      const result = applyLeetTable(run);
      if (result.substitutions > 0) {
        leetTokens++;
        if (result.interior || result.substitutions > 1) leetSuspiciousTokens++;
      }
      return result.text;
    });
  }

  // After leetspeak, which can put Latin letters into a foreign-script token
  let mixedScriptTokens = 0;
  const latinText = /[a-z]/.test(text);
  text = text.replace(LETTER_RUN, (token) => {
    const repaired = repairMixedScript(token, latinText);
    if (repaired !== token) mixedScriptTokens++;
    return repaired;
  });

  return {
    text,
    zeroWidthRemoved,
    compatibilityFolded,
    mixedScriptTokens,
    caseMixedTokens,
    spacedRunsJoined,
    leetTokens,
    leetSuspiciousTokens,
    symbolDensity: density,
    visibleLength: visible,
  };
}

// =============================================================================
// Helpers
// =============================================================================

function measureSymbolDensity(text: string): { density: number; visible: number } {
  let visible = 0;
  let symbols = 0;

  for (const ch of text) {
    if (/\s/.test(ch) || INVISIBLE_SINGLE.test(ch)) continue;
    visible++;
    if (!/[\p{L}\p{N}]/u.test(ch)) symbols++;
  }

  return { density: visible === 0 ? 0 : symbols / visible, visible };
}

function isCased(ch: string): boolean {
  return ch.toLowerCase() !== ch.toUpperCase();
}

function isUpper(ch: string): boolean {
  return isCased(ch) && ch === ch.toUpperCase();
}

/**
 * A token is case-mixed when at least half of its adjacent letter pairs
 * switch case, and at least three do ("cOnTrOl", not "JavaScript").
 */
function countCaseMixedTokens(text: string): number {
  let count = 0;

  for (const token of text.match(LETTER_RUN) ?? []) {
    const letters = Array.from(token);
    if (letters.length < 4) continue;

    let pairs = 0;
    let switches = 0;
    for (let i = 1; i < letters.length; i++) {
      const prev = letters[i - 1];
      const curr = letters[i];
      if (prev === undefined || curr === undefined) continue;
      if (!isCased(prev) || !isCased(curr)) continue;
      pairs++;
      if (isUpper(prev) !== isUpper(curr)) switches++;
    }

    if (switches >= 3 && switches / pairs >= 0.5) count++;
  }

  return count;
}

/**
 * Count characters whose compatibility decomposition differs from their
 * canonical one and yields a letter or digit (full-width forms, ligatures,
 * mathematical alphanumerics). Plain accents are canonical and not counted.
 */
function countCompatibilityForms(text: string): number {
  let count = 0;

  for (const ch of text) {
    if (/\s/.test(ch)) continue;
    const compat = ch.normalize('NFKD');
    if (compat !== ch.normalize('NFD') && /[\p{L}\p{N}]/u.test(compat)) {
      count++;
    }
  }

  return count;
}

/**
 * Map look-alike letters to Latin. A token without Latin letters is mapped
 * only when the surrounding text is Latin and every letter has a mapping
 * ("һаск" in English text), so foreign words stay intact.
 */
function repairMixedScript(token: string, latinText: boolean): string {
  if (!/[a-z]/.test(token)) {
    if (!latinText) return token;
    if (!Array.from(token).every((ch) => CONFUSABLES[ch] !== undefined)) return token;
  }

  let changed = false;
  let out = '';
  for (const ch of token) {
    const mapped = CONFUSABLES[ch];
    if (mapped !== undefined) {
      out += mapped;
      changed = true;
    } else {
      out += ch;
    }
  }

  return changed ? out : token;
}

interface LeetResult {
  text: string;
  substitutions: number;
  interior: boolean;
}

/**
 * Rewrite one word run. Runs are left alone when they hold a digit outside
 * the table or fewer than two letters, and when their trailing leet block
 * reads as a number: several characters including a zero ("win10"), or
 * a version after a plain word ("python3").
 */
function applyLeetTable(run: string): LeetResult {
  const chars = Array.from(run);
  const untouched: LeetResult = { text: run, substitutions: 0, interior: false };

  if (NON_LEET_DIGIT.test(run)) return untouched;
  if (!chars.some((c) => LEET_CHARS.has(c))) return untouched;
  if (chars.filter((c) => /\p{L}/u.test(c)).length < 2) return untouched;

  let suffix = 0;
  for (let i = chars.length - 1; i >= 0 && LEET_CHARS.has(chars[i] ?? ''); i--) suffix++;
  if (suffix > 0) {
    const block = chars.slice(chars.length - suffix);
    const stem = chars.slice(0, chars.length - suffix);
    if (suffix >= 2 && block.includes('0')) return untouched;
    if (stem.length >= 4 && !stem.some((c) => LEET_CHARS.has(c))) return untouched;
  }

  let substitutions = 0;
  let interior = false;
  const out = chars.map((ch, i) => {
    if (!LEET_CHARS.has(ch)) return ch;

    const prev = chars[i - 1];
    const next = chars[i + 1];
    substitutions++;
    if (isLetter(prev) && isLetter(next)) interior = true;

    if (ch === '1') return resolveLeetOne(prev, next, i === chars.length - 1);
    return LEET_TABLE[ch] ?? ch;
  });

  return { text: out.join(''), substitutions, interior };
}

function isLetter(ch: string | undefined): boolean {
  return ch !== undefined && /\p{L}/u.test(ch);
}

/**
 * '1' reads as 'l' beside another '1' ("ki11") or at the end of a word
 * after a vowel ("too1"), and as 'i' everywhere else ("h1jack", "expl01t").
 */
function resolveLeetOne(prev: string | undefined, next: string | undefined, last: boolean): string {
  if (prev === '1' || next === '1') return 'l';
  if (last && prev !== undefined && VOWELISH.has(prev)) return 'l';
  return 'i';
}
