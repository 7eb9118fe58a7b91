/**
 * Environment configuration
 *
 * SSKR_LOG_LEVEL        pino level (default: warn)
 * SSKR_BYTEWORDS_STYLE  standard | uri | minimal (default: standard)
 * SSKR_STRICT_DECODING  true | false (default: true)
 * SSKR_MNEMONIC_WORDS   12 | 24 (default: 12)
 */

import { z } from 'zod';
import { invalidParameters } from './errors.js';
import type { MnemonicWordCount } from './mnemonic/index.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const ConfigSchema = z.object({
  logLevel: z.enum(LOG_LEVELS).default('warn'),
  bytewordsStyle: z.enum(['standard', 'uri', 'minimal']).default('standard'),
  strictDecoding: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
  mnemonicWords: z
    .enum(['12', '24'])
    .default('12')
    .transform((value): MnemonicWordCount => (value === '24' ? 24 : 12)),
});

export type SskrConfig = z.infer<typeof ConfigSchema>;

const ENV_KEYS = {
  logLevel: 'SSKR_LOG_LEVEL',
  bytewordsStyle: 'SSKR_BYTEWORDS_STYLE',
  strictDecoding: 'SSKR_STRICT_DECODING',
  mnemonicWords: 'SSKR_MNEMONIC_WORDS',
} as const;

function isConfigKey(key: unknown): key is keyof typeof ENV_KEYS {
  return typeof key === 'string' && Object.hasOwn(ENV_KEYS, key);
}

function read(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim().toLowerCase();
  return value ? value : undefined;
}

/**
 * Read configuration from the environment, applying defaults.
 *
 * @throws {SskrError} INVALID_PARAMETERS naming every bad variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SskrConfig {
  const result = ConfigSchema.safeParse({
    logLevel: read(env, ENV_KEYS.logLevel),
    bytewordsStyle: read(env, ENV_KEYS.bytewordsStyle),
    strictDecoding: read(env, ENV_KEYS.strictDecoding),
    mnemonicWords: read(env, ENV_KEYS.mnemonicWords),
  });

  if (!result.success) {
    const issues = result.error.errors.map((issue) => {
      const field = issue.path[0];
      const name = isConfigKey(field) ? ENV_KEYS[field] : String(field);
      return `${name}: ${issue.message}`;
    });
    throw invalidParameters(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }

  return result.data;
}
