/**
 * @module normalizer.test
 * @description Unit tests for request text normalization
 */

import { describe, it, expect } from 'vitest';
import { normalize, normalizeWithReport } from '../src/normalizer.js';

const ZWSP = String.fromCharCode(0x200b);
const ZWJ = String.fromCharCode(0x200d);
const RLO = String.fromCharCode(0x202e);
const CYRILLIC_A = String.fromCharCode(0x0430);
const CYRILLIC_O = String.fromCharCode(0x043e);
const SOFT_HYPHEN = String.fromCharCode(0x00ad);
const HANGUL_FILLER = String.fromCharCode(0x3164);
const TAG_LATIN_X = String.fromCodePoint(0xe0078);
const CANCEL_TAG = String.fromCodePoint(0xe007f);
const CYRILLIC_DE = String.fromCharCode(0x0434);
const CYRILLIC_ES = String.fromCharCode(0x0441);
const CYRILLIC_KA = String.fromCharCode(0x043a);
const CYRILLIC_SHHA = String.fromCharCode(0x04bb);
const LONE_HIGH_SURROGATE = String.fromCharCode(0xd800);
const REPLACEMENT = String.fromCharCode(0xfffd);

/** Full-width form of an ASCII lowercase string */
function fullWidth(text: string): string {
  return Array.from(text)
    .map((ch) => (ch === ' ' ? ch : String.fromCharCode(ch.charCodeAt(0) + 0xfee0)))
    .join('');
}

describe('normalize', () => {
  describe('Separators and whitespace', () => {
    it.each([
      ['control_equipment', 'control equipment'],
      ['Control  Equipment', 'control equipment'],
      ['control-equipment', 'control equipment'],
      ['control.equipment', 'control equipment'],
      ['control/equipment', 'control equipment'],
      ['control\\equipment', 'control equipment'],
      ['control|equipment', 'control equipment'],
      ['  control \t\n equipment  ', 'control equipment'],
    ])('normalizes %j to %j', (input, expected) => {
      expect(normalize(input)).toBe(expected);
    });

    it('rejoins spelled-out words', () => {
      expect(normalize('c-o-n-t-r-o-l equipment')).toBe('control equipment');
      expect(normalize('h a c k the server')).toBe('hack the server');
    });

    it('leaves pairs of single characters alone', () => {
      expect(normalize('version 2.0')).toBe('version 2 0');
    });
  });

  describe('Invisible characters', () => {
    it('removes zero-width characters without inserting a space', () => {
      expect(normalize(`control${ZWSP}equipment`)).toBe('controlequipment');
      expect(normalize(`ha${ZWJ}ck`)).toBe('hack');
    });

    it('removes bidi controls', () => {
      expect(normalize(`${RLO}exploit`)).toBe('exploit');
    });

    it('removes soft hyphens', () => {
      expect(normalize(`ex${SOFT_HYPHEN}ploit`)).toBe('exploit');
    });

    it('removes tag characters', () => {
      expect(normalize(`ha${TAG_LATIN_X}ck${CANCEL_TAG}`)).toBe('hack');
    });

    it('removes Hangul fillers', () => {
      expect(normalize(`ki${HANGUL_FILLER}ll`)).toBe('kill');
    });
  });

  describe('Unicode folding', () => {
    it('folds full-width forms', () => {
      expect(normalize(fullWidth('control equipment'))).toBe('control equipment');
    });

    it('strips diacritics', () => {
      expect(normalize('Café résumé')).toBe('cafe resume');
    });

    it('maps look-alike letters inside Latin tokens', () => {
      expect(normalize(`h${CYRILLIC_A}ck`)).toBe('hack');
      expect(normalize(`c${CYRILLIC_O}ntr${CYRILLIC_O}l`)).toBe('control');
    });

    it('maps whole look-alike words in Latin text', () => {
      const word = `${CYRILLIC_SHHA}${CYRILLIC_A}${CYRILLIC_ES}${CYRILLIC_KA}`;
      expect(normalize(`${word} the server`)).toBe('hack the server');
    });

    it('leaves words written entirely in another script', () => {
      const word = `${CYRILLIC_O}${CYRILLIC_A}`;
      expect(normalize(word)).toBe(word);
    });

    it('leaves foreign words with letters outside the look-alike table', () => {
      const word = `${CYRILLIC_DE}${CYRILLIC_A}`;
      expect(normalize(`${word} hello`)).toBe(`${word} hello`);
    });

    it('replaces lone surrogates', () => {
      expect(normalize(`abc${LONE_HIGH_SURROGATE}def`)).toBe(`abc${REPLACEMENT}def`);
    });
  });

  describe('Leetspeak', () => {
    it('substitutes leet characters inside words', () => {
      expect(normalize('h4ck th3 s3rv3r')).toBe('hack the server');
      expect(normalize('expl01t')).toBe('exploit');
      expect(normalize('pa$$word')).toBe('password');
    });

    it('reads 1 as l beside another 1', () => {
      expect(normalize('ki11')).toBe('kill');
    });

    it('does not touch numbers and version strings', () => {
      expect(normalize('costs $100')).toBe('costs $100');
      expect(normalize('win10 laptops')).toBe('win10 laptops');
      expect(normalize('python3 scripts')).toBe('python3 scripts');
      expect(normalize('route 66')).toBe('route 66');
    });

    it('can be disabled', () => {
      expect(normalize('h4ck', { leetspeak: false })).toBe('h4ck');
    });
  });

  describe('Edge cases', () => {
    it('normalizes empty and blank input to the empty string', () => {
      expect(normalize('')).toBe('');
      expect(normalize('   ')).toBe('');
      expect(normalize(ZWSP)).toBe('');
    });
  });

  describe('Idempotence', () => {
    const samples = [
      'Parse alarm logs and identify patterns in critical events',
      'c-o-n-t-r-o-l equipment',
      `control${ZWSP}equipment`,
      fullWidth('hack the planet'),
      `h${CYRILLIC_A}ck`,
      `${CYRILLIC_SHHA}${CYRILLIC_A}${CYRILLIC_ES}${CYRILLIC_KA} the server`,
      `${CYRILLIC_DE}${CYRILLIC_A} ${CYRILLIC_O}${CYRILLIC_A}`,
      `ex${SOFT_HYPHEN}ploit${TAG_LATIN_X}`,
      `${CYRILLIC_O} 4 ${CYRILLIC_A}`,
      'h4ck th3 s3rv3r',
      'ki11 -- the -- pr0cess!!!',
      'cOnTrOl EqUiPmEnT',
      'a b c d e f',
      'ab c d e',
      'rm -rf /',
      '$$$ 100%',
      `abc${LONE_HIGH_SURROGATE}def`,
      '',
    ];

    it.each(samples)('normalize(normalize(%j)) equals normalize(%j)', (sample) => {
      const once = normalize(sample);
      expect(normalize(once)).toBe(once);
    });
  });
});

describe('normalizeWithReport', () => {
  it('reports nothing for plain text', () => {
    const report = normalizeWithReport('Parse alarm logs');
    expect(report).toEqual({
      text: 'parse alarm logs',
      zeroWidthRemoved: 0,
      compatibilityFolded: 0,
      mixedScriptTokens: 0,
      caseMixedTokens: 0,
      spacedRunsJoined: 0,
      leetTokens: 0,
      leetSuspiciousTokens: 0,
      symbolDensity: 0,
      visibleLength: 14,
    });
  });

  it('counts zero-width characters removed', () => {
    expect(normalizeWithReport(`con${ZWSP}trol${ZWSP}`).zeroWidthRemoved).toBe(2);
  });

  it('counts each invisible code point once', () => {
    const report = normalizeWithReport(`ex${SOFT_HYPHEN}ploit${TAG_LATIN_X}${CANCEL_TAG}`);
    expect(report.zeroWidthRemoved).toBe(3);
    expect(report.visibleLength).toBe(7);
  });

  it('counts whole look-alike words as mixed-script tokens', () => {
    const report = normalizeWithReport(`${CYRILLIC_SHHA}${CYRILLIC_A}${CYRILLIC_ES}${CYRILLIC_KA} it`);
    expect(report.text).toBe('hack it');
    expect(report.mixedScriptTokens).toBe(1);
  });

  it('counts compatibility forms but not plain accents', () => {
    expect(normalizeWithReport(fullWidth('hack')).compatibilityFolded).toBe(4);
    expect(normalizeWithReport('café').compatibilityFolded).toBe(0);
  });

  it('counts case-mixed tokens', () => {
    expect(normalizeWithReport('cOnTrOl EqUiPmEnT').caseMixedTokens).toBe(2);
    expect(normalizeWithReport('JavaScript iPhone NASA').caseMixedTokens).toBe(0);
  });

  it('counts rejoined runs', () => {
    expect(normalizeWithReport('c o n t r o l the e q u i p').spacedRunsJoined).toBe(2);
  });

  it('separates suspicious leet tokens from trailing substitutions', () => {
    const interior = normalizeWithReport('h4ck');
    expect(interior.leetTokens).toBe(1);
    expect(interior.leetSuspiciousTokens).toBe(1);

    const trailing = normalizeWithReport('th3');
    expect(trailing.text).toBe('the');
    expect(trailing.leetTokens).toBe(1);
    expect(trailing.leetSuspiciousTokens).toBe(0);
  });

  it('measures symbol density on the raw text', () => {
    const report = normalizeWithReport('a!b@ c#d$');
    expect(report.visibleLength).toBe(8);
    expect(report.symbolDensity).toBe(0.5);
  });
});
