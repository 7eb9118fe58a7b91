import { describe, it, expect } from 'vitest';
import { parseGroupSpec, parseGroupThreshold } from './spec-parser.js';
import { SskrError } from '../errors.js';

function messageOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof SskrError) return `${err.code}: ${err.message}`;
    throw err;
  }
  return undefined;
}

describe('parseGroupSpec', () => {
  it('should parse a list of groups', () => {
    expect(parseGroupSpec('2of3,4of9,3of5', 2)).toEqual({
      groupThreshold: 2,
      groups: [
        { memberThreshold: 2, memberCount: 3 },
        { memberThreshold: 4, memberCount: 9 },
        { memberThreshold: 3, memberCount: 5 },
      ],
    });
  });

  it('should allow 1of1', () => {
    expect(parseGroupSpec('1of1', 1).groups).toEqual([{ memberThreshold: 1, memberCount: 1 }]);
  });

  it('should reject malformed syntax', () => {
    expect(messageOf(() => parseGroupSpec('2of3;3of5', 1))).toBe('INVALID_PARAMETERS: Invalid group spec "2of3;3of5"');
    expect(messageOf(() => parseGroupSpec('2 of 3', 1))).toBe('INVALID_PARAMETERS: Invalid group spec "2 of 3"');
    expect(messageOf(() => parseGroupSpec('2of3,', 1))).toBe('INVALID_PARAMETERS: Invalid group spec "2of3,"');
    expect(messageOf(() => parseGroupSpec('', 1))).toBe('INVALID_PARAMETERS: Invalid group spec ""');
  });

  it('should reject a threshold above the count', () => {
    expect(messageOf(() => parseGroupSpec('2of3,4of3', 1))).toBe(
      'INVALID_PARAMETERS: Invalid group "4of3" in spec (4 is greater than 3)'
    );
  });

  it('should reject 1ofN groups', () => {
    expect(messageOf(() => parseGroupSpec('1of3', 1))).toBe(
      'INVALID_PARAMETERS: Invalid group "1of3" in spec: 1 of N groups (where N > 1) not supported'
    );
  });

  it('should apply the split spec limits', () => {
    expect(messageOf(() => parseGroupSpec('2of17', 1))).toMatch(/^INVALID_PARAMETERS: Invalid split spec: /);
    expect(messageOf(() => parseGroupSpec('2of3,2of3', 3))).toBe(
      'INVALID_PARAMETERS: Invalid split spec: Group threshold cannot exceed number of groups'
    );
  });
});

describe('parseGroupThreshold', () => {
  it('should parse a whole number', () => {
    expect(parseGroupThreshold('2')).toBe(2);
  });

  it('should reject anything else', () => {
    expect(messageOf(() => parseGroupThreshold('two'))).toBe('INVALID_PARAMETERS: Invalid group threshold "two"');
    expect(messageOf(() => parseGroupThreshold('1.5'))).toBe('INVALID_PARAMETERS: Invalid group threshold "1.5"');
  });
});
