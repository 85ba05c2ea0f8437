/**
 * @module stems
 * @description Word-form expansion for verb and noun stems
 *
 * Normalized text is tokenized into letter/digit runs and looked up against
 * the inflected forms of each stem. Forms are expanded once when a lexicon
 * is built, so lookups at request time are plain set membership.
 */

const TOKEN = /[\p{L}\p{N}]+/gu;
const VOWELS = new Set(['a', 'e', 'i', 'o', 'u']);

/** Irregular forms that suffix rules cannot produce */
const IRREGULAR: Readonly<Record<string, readonly string[]>> = {
  break: ['broke', 'broken'],
  build: ['built'],
  find: ['found'],
  get: ['got', 'gotten'],
  make: ['made'],
  run: ['ran'],
  show: ['shown'],
  hide: ['hid', 'hidden'],
};

/**
 * Split normalized text into tokens
 */
export function tokenize(normalized: string): string[] {
  return normalized.match(TOKEN) ?? [];
}

/**
 * All forms of a stem: the stem itself, -s/-es, -ed/-d, -ing, -er/-ers,
 * with e-drop ("parse" -> "parsing"), y-to-i ("modify" -> "modifies") and a
 * doubled final consonant ("log" -> "logging").
 */
export function inflect(stem: string): string[] {
  const forms = new Set<string>([stem, ...(IRREGULAR[stem] ?? [])]);
  const last = stem.charAt(stem.length - 1);
  const beforeLast = stem.charAt(stem.length - 2);

  if (last === 'e') {
    const base = stem.slice(0, -1);
    for (const suffix of ['s', 'd', 'r', 'rs']) forms.add(stem + suffix);
    forms.add(base + 'ing');
    return [...forms];
  }

  if (last === 'y' && !VOWELS.has(beforeLast)) {
    const base = stem.slice(0, -1);
    for (const suffix of ['ies', 'ied', 'ier', 'iers']) forms.add(base + suffix);
    forms.add(stem + 'ing');
    return [...forms];
  }

  const sibilant = /(?:s|x|z|ch|sh)$/.test(stem);
  forms.add(stem + (sibilant ? 'es' : 's'));
  for (const suffix of ['ed', 'ing', 'er', 'ers']) forms.add(stem + suffix);

  if (endsConsonantVowelConsonant(stem)) {
    for (const suffix of ['ed', 'ing', 'er', 'ers']) forms.add(stem + last + suffix);
  }

  return [...forms];
}

function endsConsonantVowelConsonant(stem: string): boolean {
  if (stem.length < 3) return false;
  const [c1, v, c2] = Array.from(stem.slice(-3));
  if (c1 === undefined || v === undefined || c2 === undefined) return false;
  return !VOWELS.has(c1) && VOWELS.has(v) && !VOWELS.has(c2) && !/[wxy]/.test(c2);
}

/**
 * Lookup table from every inflected form to the stem it came from
 */
export class StemLexicon {
  private readonly forms = new Map<string, string>();

  constructor(stems: Iterable<string>) {
    for (const stem of stems) {
      for (const form of inflect(stem)) {
        if (!this.forms.has(form)) this.forms.set(form, stem);
      }
    }
  }

  /**
   * Stem a token belongs to, if any
   */
  lookup(token: string): string | undefined {
    return this.forms.get(token);
  }

  /**
   * Distinct stems present in the tokens, in first-seen order
   */
  findAll(tokens: readonly string[]): string[] {
    const found: string[] = [];
    for (const token of tokens) {
      const stem = this.forms.get(token);
      if (stem !== undefined && !found.includes(stem)) found.push(stem);
    }
    return found;
  }

  has(tokens: readonly string[]): boolean {
    return tokens.some((token) => this.forms.has(token));
  }
}
