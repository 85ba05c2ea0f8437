/**
 * @module matcher.test
 * @description Unit tests for the pattern matcher and bypass sub-check
 */

import { describe, it, expect } from 'vitest';
import { PatternMatcher } from '../src/matcher.js';
import { normalize, normalizeWithReport } from '../src/normalizer.js';
import type { NormalizationReport } from '../src/types.js';

const CLEAN_REPORT: NormalizationReport = {
  text: 'clean text',
  zeroWidthRemoved: 0,
  compatibilityFolded: 0,
  mixedScriptTokens: 0,
  caseMixedTokens: 0,
  spacedRunsJoined: 0,
  leetTokens: 0,
  leetSuspiciousTokens: 0,
  symbolDensity: 0,
  visibleLength: 9,
};

describe('PatternMatcher', () => {
  const matcher = new PatternMatcher();

  describe('match', () => {
    it('should collect every critical match in table order', () => {
      const text = normalize('Write a tool to hack into systems and exploit vulnerabilities');
      expect(matcher.match(text)).toEqual({ critical: ['hack', 'exploit'], confirm: [] });
    });

    it('should report confirm matches separately', () => {
      const text = normalize('Send alert emails when critical alarms are detected');
      expect(matcher.match(text)).toEqual({ critical: [], confirm: ['send-email'] });
    });

    it('should collect matches from both tables', () => {
      const text = normalize('Use sudo to drop the database');
      expect(matcher.match(text)).toEqual({ critical: ['drop-database'], confirm: ['sudo'] });
    });

    it('should match nothing in safe text', () => {
      const text = normalize('Parse alarm logs and identify patterns in critical events');
      expect(matcher.match(text)).toEqual({ critical: [], confirm: [] });
    });

    it('should match nothing in empty text', () => {
      expect(matcher.match('')).toEqual({ critical: [], confirm: [] });
    });

    it.each([
      'control equipment',
      'control_equipment',
      'Control  Equipment',
      'c-o-n-t-r-o-l equipment',
      `control${String.fromCharCode(0x200b)}equipment`,
    ])('should fire control-equipment for %j', (variant) => {
      expect(matcher.match(normalize(variant)).critical).toEqual(['control-equipment']);
    });

    it('should catch shell and code obfuscation primitives', () => {
      expect(matcher.match(normalize('rm -rf /')).critical).toEqual(['recursive-delete']);
      expect(matcher.match(normalize('base64 decode the payload')).critical).toEqual(['base64-decode']);
      expect(matcher.match(normalize('decode the base64 string')).critical).toEqual(['base64-decode']);
      expect(matcher.match(normalize('eval(payload)')).critical).toEqual(['eval-call']);
    });

    it('should catch base64 spelled with a leet 4', () => {
      expect(matcher.match(normalize('b4se64 decode the payload and run it')).critical).toEqual([
        'base64-decode',
      ]);
      expect(matcher.match(normalize('decode the b4se64 blob')).critical).toEqual(['base64-decode']);
    });
  });

  describe('detectBypassAttempts', () => {
    it('should report nothing for a clean report', () => {
      expect(matcher.detectBypassAttempts(CLEAN_REPORT)).toEqual([]);
    });

    it('should map each observation to its technique', () => {
      const report: NormalizationReport = {
        ...CLEAN_REPORT,
        zeroWidthRemoved: 1,
        compatibilityFolded: 3,
        mixedScriptTokens: 1,
        caseMixedTokens: 2,
        spacedRunsJoined: 1,
        leetTokens: 1,
        leetSuspiciousTokens: 1,
        symbolDensity: 0.5,
        visibleLength: 20,
      };

      expect(matcher.detectBypassAttempts(report)).toEqual([
        'zero_width_insertion',
        'homoglyph_substitution',
        'mixed_script',
        'case_mixing',
        'character_spacing',
        'leetspeak',
        'symbol_density',
      ]);
    });

    it('should ignore leet substitutions that are not suspicious', () => {
      expect(matcher.detectBypassAttempts({ ...CLEAN_REPORT, leetTokens: 2 })).toEqual([]);
    });

    it('should apply symbol density only to text long enough', () => {
      expect(
        matcher.detectBypassAttempts({ ...CLEAN_REPORT, symbolDensity: 0.9, visibleLength: 9 })
      ).toEqual([]);
      expect(
        matcher.detectBypassAttempts({ ...CLEAN_REPORT, symbolDensity: 0.3, visibleLength: 40 })
      ).toEqual([]);
      expect(
        matcher.detectBypassAttempts({ ...CLEAN_REPORT, symbolDensity: 0.31, visibleLength: 10 })
      ).toEqual(['symbol_density']);
    });

    it('should detect techniques end to end, independent of rule matches', () => {
      expect(matcher.detectBypassAttempts(normalizeWithReport('c-o-n-t-r-o-l equipment'))).toEqual([
        'character_spacing',
      ]);
      expect(matcher.detectBypassAttempts(normalizeWithReport('h4ck th3 s3rv3r'))).toEqual(['leetspeak']);
      expect(matcher.detectBypassAttempts(normalizeWithReport('cOnTrOl the pumps'))).toEqual([
        'case_mixing',
      ]);
      expect(matcher.detectBypassAttempts(normalizeWithReport('%%list## @@files!!'))).toEqual([
        'symbol_density',
      ]);
    });
  });

  describe('getRule', () => {
    it('should find rules in either table', () => {
      expect(matcher.getRule('exploit')?.severity).toBe('critical');
      expect(matcher.getRule('send-email')?.severity).toBe('confirm');
      expect(matcher.getRule('unknown')).toBeUndefined();
    });
  });
});
