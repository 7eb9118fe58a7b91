/**
 * Tests for configuration and logging
 */

import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { SskrError } from './errors.js';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    expect(loadConfig({})).toEqual({
      logLevel: 'warn',
      bytewordsStyle: 'standard',
      strictDecoding: true,
      mnemonicWords: 12,
    });
  });

  it('should read every variable', () => {
    const config = loadConfig({
      SSKR_LOG_LEVEL: 'debug',
      SSKR_BYTEWORDS_STYLE: 'Minimal',
      SSKR_STRICT_DECODING: 'false',
      SSKR_MNEMONIC_WORDS: '24',
    });

    expect(config).toEqual({
      logLevel: 'debug',
      bytewordsStyle: 'minimal',
      strictDecoding: false,
      mnemonicWords: 24,
    });
  });

  it('should treat blank variables as unset', () => {
    expect(loadConfig({ SSKR_LOG_LEVEL: '  ' }).logLevel).toBe('warn');
  });

  it('should name each invalid variable', () => {
    let error: unknown;
    try {
      loadConfig({ SSKR_LOG_LEVEL: 'loud', SSKR_MNEMONIC_WORDS: '18' });
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(SskrError);
    if (error instanceof SskrError) {
      expect(error.code).toBe('INVALID_PARAMETERS');
      const issues = error.details?.issues;
      expect(Array.isArray(issues) && issues.length).toBe(2);
      expect(error.message).toMatch(/^Invalid configuration: SSKR_LOG_LEVEL: .*; SSKR_MNEMONIC_WORDS: /);
    }
  });
});

describe('createLogger', () => {
  it('should write named JSON lines at the chosen level', () => {
    const lines: string[] = [];
    const logger = createLogger('info', { write: (line: string) => lines.push(line) });

    logger.debug('hidden');
    logger.info({ groups: 2 }, 'shown');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({ name: 'sskr', msg: 'shown', groups: 2, level: 30 });
  });
});
