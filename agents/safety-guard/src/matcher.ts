/**
 * @module matcher
 * @description Runs the compiled rule tables against normalized text
 */

import type { BypassTechnique } from '@request-guard/contracts';
import { CONFIRM_RULES, CRITICAL_RULES } from './patterns.js';
import type { CompiledRule, MatchResult, NormalizationReport } from './types.js';

/** Symbol ratio above which raw text counts as padded with noise */
export const SYMBOL_DENSITY_THRESHOLD = 0.3;
/** Shortest raw text the density check applies to */
export const SYMBOL_DENSITY_MIN_LENGTH = 10;

export class PatternMatcher {
  constructor(
    private readonly criticalRules: readonly CompiledRule[] = CRITICAL_RULES,
    private readonly confirmRules: readonly CompiledRule[] = CONFIRM_RULES
  ) {}

  /**
   * Collect every matching rule ID from both tables, in table order.
   * Empty text matches nothing.
   */
  match(normalized: string): MatchResult {
    if (normalized.length === 0) return { critical: [], confirm: [] };

    return {
      critical: this.criticalRules.filter((r) => r.regex.test(normalized)).map((r) => r.id),
      confirm: this.confirmRules.filter((r) => r.regex.test(normalized)).map((r) => r.id),
    };
  }

  /**
   * Turn normalizer observations into detected obfuscation techniques.
   * Runs whether or not any rule fired.
   */
  detectBypassAttempts(report: NormalizationReport): BypassTechnique[] {
    const detected: BypassTechnique[] = [];

    if (report.zeroWidthRemoved > 0) detected.push('zero_width_insertion');
    if (report.compatibilityFolded > 0) detected.push('homoglyph_substitution');
    if (report.mixedScriptTokens > 0) detected.push('mixed_script');
    if (report.caseMixedTokens > 0) detected.push('case_mixing');
    if (report.spacedRunsJoined > 0) detected.push('character_spacing');
    if (report.leetSuspiciousTokens > 0) detected.push('leetspeak');
    if (
      report.visibleLength >= SYMBOL_DENSITY_MIN_LENGTH &&
      report.symbolDensity > SYMBOL_DENSITY_THRESHOLD
    ) {
      detected.push('symbol_density');
    }

    return detected;
  }

  /**
   * Look up a rule from either table
   */
  getRule(id: string): CompiledRule | undefined {
    return (
      this.criticalRules.find((r) => r.id === id) ?? this.confirmRules.find((r) => r.id === id)
    );
  }
}
