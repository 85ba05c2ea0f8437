/**
 * @module patterns
 * @description Static rule tables for the Safety Guard
 *
 * Rules match normalized text: lowercase, separators already turned into
 * single spaces. Phrases therefore allow zero or one space between words
 * (`control\s?equipment` catches "control equipment" and "controlequipment").
 *
 * Tables are compiled once when this module loads. An invalid pattern or a
 * duplicate ID throws RuleTableError at import time, never at request time.
 */

import { RuleTableError } from '@request-guard/lib';
import type { CompiledRule, RuleDefinition } from './types.js';

/**
 * Version of the rule tables, recorded in every audit record
 */
export const RULESET_VERSION = '1.2.0';

// =============================================================================
// CRITICAL RULES
// =============================================================================

const CRITICAL_RULE_DEFINITIONS: RuleDefinition[] = [
  // Physical system control
  {
    id: 'control-equipment',
    version: 2,
    pattern: String.raw`\bcontrol(?:s|led|ling)?\s?(?:the\s?)?(?:physical\s?)?equipment`,
    severity: 'critical',
    category: 'equipment-control',
    description: 'Physical equipment control',
  },
  {
    id: 'actuate',
    version: 1,
    pattern: String.raw`\bactuat(?:e|es|ed|ing)\b`,
    severity: 'critical',
    category: 'equipment-control',
    description: 'Actuator control',
  },
  {
    id: 'bypass-interlock',
    version: 1,
    pattern: String.raw`\bbypass(?:es|ed|ing)?\s?(?:the\s?)?(?:safety\s?)?interlocks?`,
    severity: 'critical',
    category: 'equipment-control',
    description: 'Safety interlock bypass',
  },
  {
    id: 'override-safety',
    version: 1,
    pattern: String.raw`\boverrid(?:e|es|ing|den)\s?(?:the\s?)?safety`,
    severity: 'critical',
    category: 'equipment-control',
    description: 'Safety override',
  },
  {
    id: 'disable-alarm',
    version: 1,
    pattern: String.raw`\bdisabl(?:e|es|ed|ing)\s?(?:the\s?|all\s?)?alarms?`,
    severity: 'critical',
    category: 'equipment-control',
    description: 'Alarm disabling',
  },
  {
    id: 'physical-control',
    version: 1,
    pattern: String.raw`\bphysical\s?control`,
    severity: 'critical',
    category: 'equipment-control',
    description: 'Physical control system',
  },

  // Security violations
  {
    id: 'hack',
    version: 1,
    pattern: String.raw`\bhack(?:s|ed|ing|er|ers)?\b`,
    severity: 'critical',
    category: 'exploit',
    description: 'Hacking or unauthorized access',
  },
  {
    id: 'exploit',
    version: 1,
    pattern: String.raw`\bexploit(?:s|ed|ing|ation)?\b`,
    severity: 'critical',
    category: 'exploit',
    description: 'Exploit development',
  },
  {
    id: 'crack-password',
    version: 1,
    pattern: String.raw`\bcrack(?:s|ed|ing)?\s?(?:the\s?|a\s?|user\s?)?passwords?`,
    severity: 'critical',
    category: 'exploit',
    description: 'Password cracking',
  },
  {
    id: 'inject',
    version: 2,
    pattern: String.raw`\binject(?:s|ed|ing)?\b|\b(?:sql|code|command|shell)\s?injection\b`,
    severity: 'critical',
    category: 'exploit',
    description: 'Code or SQL injection',
  },
  {
    id: 'privilege-escalation',
    version: 1,
    pattern: String.raw`\bprivilege\s?escalation|\bescalat(?:e|es|ed|ing)\s?(?:my\s?|user\s?)?privileges?`,
    severity: 'critical',
    category: 'exploit',
    description: 'Privilege escalation',
  },
  {
    id: 'malware',
    version: 1,
    pattern: String.raw`\b(?:malware|ransomware|spyware|keyloggers?)\b`,
    severity: 'critical',
    category: 'malware',
    description: 'Malware development',
  },
  {
    id: 'virus',
    version: 1,
    pattern: String.raw`\bvirus(?:es)?\b`,
    severity: 'critical',
    category: 'malware',
    description: 'Virus development',
  },
  {
    id: 'backdoor',
    version: 1,
    pattern: String.raw`\bback\s?doors?\b`,
    severity: 'critical',
    category: 'malware',
    description: 'Backdoor installation',
  },

  // Destructive operations
  {
    id: 'recursive-delete',
    version: 2,
    pattern: String.raw`\brm\s?(?:rf|fr|r\s?f|f\s?r)\b`,
    severity: 'critical',
    category: 'destructive-fs',
    description: 'Recursive deletion (rm -rf)',
  },
  {
    id: 'format-drive',
    version: 1,
    pattern: String.raw`\bformat(?:s|ting)?\s?(?:the\s?|a\s?|all\s?)?(?:hard\s?)?(?:drives?|disks?)\b`,
    severity: 'critical',
    category: 'destructive-fs',
    description: 'Drive formatting',
  },
  {
    id: 'delete-all',
    version: 1,
    pattern: String.raw`\bdelete\s?(?:all|everything)\b`,
    severity: 'critical',
    category: 'destructive-fs',
    description: 'Mass deletion',
  },
  {
    id: 'drop-database',
    version: 1,
    pattern: String.raw`\bdrop\s?(?:the\s?)?(?:database|db|schema)s?\b`,
    severity: 'critical',
    category: 'destructive-db',
    description: 'Database deletion',
  },
  {
    id: 'truncate-table',
    version: 1,
    pattern: String.raw`\btruncate\s?(?:the\s?)?tables?\b`,
    severity: 'critical',
    category: 'destructive-db',
    description: 'Table truncation',
  },

  // Obfuscation primitives
  {
    id: 'base64-decode',
    version: 2,
    pattern: String.raw`\bb[a4]se\s?6[4a]\b.{0,40}decod|\bdecod(?:e|es|ed|ing)\b.{0,40}\bb[a4]se\s?6[4a]\b`,
    severity: 'critical',
    category: 'obfuscation',
    description: 'Base64 decoding (potential obfuscation)',
  },
  {
    id: 'eval-call',
    version: 1,
    pattern: String.raw`\beval\s?\(`,
    severity: 'critical',
    category: 'obfuscation',
    description: 'Dynamic code evaluation',
  },
  {
    id: 'exec-call',
    version: 1,
    pattern: String.raw`\bexec\s?\(`,
    severity: 'critical',
    category: 'obfuscation',
    description: 'Dynamic code execution',
  },
  {
    id: 'dynamic-import',
    version: 1,
    pattern: String.raw`\bimport\s?\(`,
    severity: 'critical',
    category: 'obfuscation',
    description: 'Dynamic import (potential obfuscation)',
  },
  {
    id: 'compile-call',
    version: 1,
    pattern: String.raw`\bcompile\s?\(`,
    severity: 'critical',
    category: 'obfuscation',
    description: 'Dynamic compilation',
  },
];

// =============================================================================
// CONFIRM RULES
// =============================================================================

const CONFIRM_RULE_DEFINITIONS: RuleDefinition[] = [
  {
    id: 'delete-file',
    version: 1,
    pattern: String.raw`\b(?:delet|remov)(?:e|es|ed|ing)\s?(?:\w+\s?){0,2}files?\b`,
    severity: 'confirm',
    category: 'file-deletion',
    description: 'File deletion',
    prompt: 'This will delete files. Confirm before proceeding.',
  },
  {
    id: 'send-email',
    version: 2,
    pattern: String.raw`\bsend(?:s|ing)?(?:\s\w+){0,3}?\s?e\s?mails?\b|\bemail(?:s|ing)?\s(?:the\s)?(?:users?|customers?|team|admins?)\b`,
    severity: 'confirm',
    category: 'outbound-network',
    description: 'Email sending',
    prompt: 'This will send email. Confirm before proceeding.',
  },
  {
    id: 'network-call',
    version: 1,
    pattern: String.raw`\bnetwork\s?calls?\b|\bhttp\s?requests?\b`,
    severity: 'confirm',
    category: 'outbound-network',
    description: 'Network communication',
    prompt: 'This will make network calls. Confirm before proceeding.',
  },
  {
    id: 'api-request',
    version: 1,
    pattern: String.raw`\bapi\s?(?:requests?|calls?)\b`,
    severity: 'confirm',
    category: 'outbound-network',
    description: 'API request',
    prompt: 'This will call external APIs. Confirm before proceeding.',
  },
  {
    id: 'modify-database',
    version: 1,
    pattern: String.raw`\bmodif(?:y|ies|ied|ying)\s?(?:the\s?)?(?:database|db)\b|\bwrit(?:e|es|ing)\s?to\s?(?:the\s?)?(?:database|db)\b`,
    severity: 'confirm',
    category: 'data-modification',
    description: 'Database modification',
    prompt: 'This will modify a database. Confirm before proceeding.',
  },
  {
    id: 'sudo',
    version: 1,
    pattern: String.raw`\bsudo\b`,
    severity: 'confirm',
    category: 'privilege',
    description: 'Elevated privileges',
    prompt: 'This will run with elevated privileges (sudo). Confirm before proceeding.',
  },
  {
    id: 'admin-privilege',
    version: 1,
    pattern: String.raw`\badmin(?:istrator|istrative)?\s?(?:privileges?|rights|access)\b|\broot\s?(?:access|privileges?)\b`,
    severity: 'confirm',
    category: 'privilege',
    description: 'Admin privileges',
    prompt: 'This needs administrator or root privileges. Confirm before proceeding.',
  },
  {
    id: 'system-call',
    version: 1,
    pattern: String.raw`\bsys(?:tem)?\s?calls?\b`,
    severity: 'confirm',
    category: 'system-call',
    description: 'System call',
    prompt: 'This will invoke raw system calls. Confirm before proceeding.',
  },
  {
    id: 'subprocess',
    version: 1,
    pattern: String.raw`\bsubprocess(?:es)?\b|\bshell\s?commands?\b|\bspawn(?:s|ing)?\s?(?:a\s?)?process(?:es)?\b`,
    severity: 'confirm',
    category: 'system-call',
    description: 'Subprocess execution',
    prompt: 'This will execute subprocesses or shell commands. Confirm before proceeding.',
  },
];

// =============================================================================
// COMPILATION
// =============================================================================

/**
 * Compile a rule table. Throws RuleTableError on an invalid pattern,
 * a duplicate ID, or a confirm rule without a prompt.
 */
export function compileRuleTable(definitions: RuleDefinition[]): readonly CompiledRule[] {
  const seen = new Set<string>();

  const compiled = definitions.map((definition) => {
    if (seen.has(definition.id)) {
      throw new RuleTableError(definition.id, 'duplicate rule ID');
    }
    seen.add(definition.id);

    if (definition.severity === 'confirm' && !definition.prompt) {
      throw new RuleTableError(definition.id, 'confirm rules need a prompt');
    }

    let regex: RegExp;
    try {
      regex = new RegExp(definition.pattern, 'u');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new RuleTableError(definition.id, reason);
    }

    return Object.freeze({ ...definition, regex });
  });

  return Object.freeze(compiled);
}

/**
 * Critical rules: any match blocks the request
 */
export const CRITICAL_RULES = compileRuleTable(CRITICAL_RULE_DEFINITIONS);

/**
 * Confirm rules: a match requires explicit user confirmation
 */
export const CONFIRM_RULES = compileRuleTable(CONFIRM_RULE_DEFINITIONS);

const RULES_BY_ID: ReadonlyMap<string, CompiledRule> = new Map(
  [...CRITICAL_RULES, ...CONFIRM_RULES].map((rule) => [rule.id, rule])
);

/**
 * Get all rules, critical first
 */
export function getAllRules(): CompiledRule[] {
  return [...CRITICAL_RULES, ...CONFIRM_RULES];
}

/**
 * Get rule by ID
 */
export function getRuleById(id: string): CompiledRule | undefined {
  return RULES_BY_ID.get(id);
}

/**
 * Rule count by category
 */
export function getRuleCountByCategory(): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const rule of getAllRules()) {
    counts[rule.category] = (counts[rule.category] ?? 0) + 1;
  }
  return counts;
}

/**
 * Problems with the loaded tables, for startup validation. Empty when healthy.
 */
export function checkRuleTables(): string[] {
  const problems: string[] = [];

  if (CRITICAL_RULES.length === 0) problems.push('critical rule table is empty');
  if (CONFIRM_RULES.length === 0) problems.push('confirm rule table is empty');

  for (const rule of CRITICAL_RULES) {
    if (rule.severity !== 'critical') problems.push(`rule '${rule.id}' is in the critical table with severity ${rule.severity}`);
  }
  for (const rule of CONFIRM_RULES) {
    if (rule.severity !== 'confirm') problems.push(`rule '${rule.id}' is in the confirm table with severity ${rule.severity}`);
    if (RULES_BY_ID.get(rule.id) !== rule) problems.push(`rule ID '${rule.id}' appears in both tables`);
  }

  return problems;
}
