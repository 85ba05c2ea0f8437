/**
 * @module whitelist.test
 * @description Unit tests for the approved-operation validator
 */

import { describe, it, expect } from 'vitest';
import { WhitelistValidator, findHeadVerb } from '../src/whitelist.js';
import { inflect, tokenize } from '../src/stems.js';

describe('inflect', () => {
  it('should add regular suffixes', () => {
    expect(inflect('track')).toEqual(['track', 'tracks', 'tracked', 'tracking', 'tracker', 'trackers']);
  });

  it('should drop a final e', () => {
    expect(inflect('parse')).toEqual(['parse', 'parses', 'parsed', 'parser', 'parsers', 'parsing']);
  });

  it('should turn a final consonant-y into i', () => {
    expect(inflect('query')).toEqual(['query', 'queries', 'queried', 'querier', 'queriers', 'querying']);
  });

  it('should double a final consonant after a short vowel', () => {
    expect(inflect('log')).toContain('logging');
    expect(inflect('log')).toContain('logged');
  });

  it('should add irregular forms', () => {
    expect(inflect('break')).toContain('broken');
  });
});

describe('findHeadVerb', () => {
  it.each([
    ['parse alarm logs', 'parse'],
    ['i want to build a dashboard', 'build'],
    ['please help me', 'help'],
    ['a tool that can track ships', 'track'],
    ['a simple web app to show prices', 'show'],
    ['write a tool to hack into systems', 'write'],
  ])('should find the head verb of %j', (text, expected) => {
    expect(findHeadVerb(tokenize(text))).toBe(expected);
  });

  it('should find nothing in a bare noun phrase', () => {
    expect(findHeadVerb(tokenize('a simple web app'))).toBeUndefined();
  });

  it('should find nothing in empty text', () => {
    expect(findHeadVerb([])).toBeUndefined();
  });
});

describe('WhitelistValidator', () => {
  const validator = new WhitelistValidator();

  it('should accept a request led by an approved verb', () => {
    const result = validator.validate('parse alarm logs and identify patterns in critical events');
    expect([...result.matchedCategories]).toEqual(['calculate', 'monitor']);
    expect(result.violations).toEqual([]);
  });

  it('should report a head verb outside every category', () => {
    const result = validator.validate('send alert emails when critical alarms are detected');
    expect([...result.matchedCategories]).toEqual([]);
    expect(result.violations).toEqual(["Action 'send' is not a recognized safe operation"]);
  });

  it('should accept inflected approved verbs after a noun phrase', () => {
    const result = validator.validate('a tool that tracks vessel positions');
    expect([...result.matchedCategories]).toEqual(['monitor']);
    expect(result.violations).toEqual([]);
  });

  it('should report at most one violation', () => {
    const result = validator.validate('write and deploy and launch the thing');
    expect(result.violations).toHaveLength(1);
  });

  it('should not report a numeric head token', () => {
    expect(validator.validate('42').violations).toEqual([]);
  });

  it('should accept empty text without violations', () => {
    const result = validator.validate('');
    expect(result.matchedCategories.size).toBe(0);
    expect(result.violations).toEqual([]);
  });
});
