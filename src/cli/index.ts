#!/usr/bin/env node

import { readFile } from 'node:fs/promises';
import { pathToFileURL } from 'node:url';
import type { Logger } from 'pino';
import { BYTEWORDS_STYLES, type BytewordsStyle } from '../bytewords/index.js';
import { loadConfig, type SskrConfig } from '../config.js';
import { invalidParameters } from '../errors.js';
import { createLogger } from '../logger.js';
import type { MnemonicWordCount } from '../mnemonic/index.js';
import type { RandomSource } from '../random/index.js';
import { Sskr, type MnemonicSplit } from '../sskr.js';
import { parseGroupSpec, parseGroupThreshold } from './spec-parser.js';

/**
 * Where output goes and what the process looks like. Tests swap these out.
 */
export interface CliContext {
  stdout?: { write(chunk: string): unknown };
  stderr?: { write(chunk: string): unknown };
  env?: NodeJS.ProcessEnv;
  random?: RandomSource;
  logger?: Logger;
}

interface SplitArgs {
  spec: string;
  groupThreshold: string;
  mnemonic?: string;
  style?: BytewordsStyle;
  words?: MnemonicWordCount;
}

interface RecoverArgs {
  filename: string;
  lenient: boolean;
}

const HELP = `sskr - split and recover BIP-39 mnemonics with SSKR

ONLY USE THIS TOOL ON A SECURE, OFFLINE COMPUTER!

Usage:
  sskr split <spec> <group-threshold> [mnemonic] [options]
  sskr recover <file> [options]

Split:
  <spec>               Comma-separated M-of-N groups, e.g. "2of3,4of9,3of5".
                       At most 16 groups and 16 shares per group.
  <group-threshold>    Number of groups needed to recover the mnemonic
  [mnemonic]           A 12 or 24 word BIP-39 phrase; random if omitted
  -m, --minimal        Write shares as minimal Bytewords
  --style <style>      standard | uri | minimal
  --words <12|24>      Length of a generated phrase

Recover:
  <file>               File with one share per line
  --lenient            Ignore reserved header bits
  -m, --minimal        Accepted for symmetry with split; the style is detected

Environment:
  SSKR_LOG_LEVEL, SSKR_BYTEWORDS_STYLE, SSKR_STRICT_DECODING, SSKR_MNEMONIC_WORDS
`;

function isStyle(value: string | undefined): value is BytewordsStyle {
  return BYTEWORDS_STYLES.some(style => style === value);
}

function parseSplitArgs(rawArgs: string[]): SplitArgs {
  const positional: string[] = [];
  let style: BytewordsStyle | undefined;
  let words: MnemonicWordCount | undefined;

  for (let i = 0; i < rawArgs.length; i++) {
    const arg = rawArgs[i];
    switch (arg) {
      case '-m':
      case '--minimal':
        style = 'minimal';
        break;
      case '--style': {
        const value = rawArgs[++i];
        if (!isStyle(value)) {
          throw invalidParameters(`Invalid --style: ${value ?? ''}`);
        }
        style = value;
        break;
      }
      case '--words': {
        const value = rawArgs[++i];
        if (value !== '12' && value !== '24') {
          throw invalidParameters(`Invalid --words: ${value ?? ''}`);
        }
        words = value === '24' ? 24 : 12;
        break;
      }
      default:
        if (arg.startsWith('-')) {
          throw invalidParameters(`Unknown option: ${arg}`);
        }
        positional.push(arg);
    }
  }

  const [spec, groupThreshold, ...phrase] = positional;
  if (spec === undefined || groupThreshold === undefined) {
    throw invalidParameters('split needs <spec> and <group-threshold>');
  }

  return {
    spec,
    groupThreshold,
    mnemonic: phrase.length > 0 ? phrase.join(' ') : undefined,
    style,
    words,
  };
}

function parseRecoverArgs(rawArgs: string[]): RecoverArgs {
  let filename: string | undefined;
  let lenient = false;

  for (const arg of rawArgs) {
    if (arg === '--lenient') {
      lenient = true;
    } else if (arg === '-m' || arg === '--minimal') {
      // style is detected per line
    } else if (arg.startsWith('-')) {
      throw invalidParameters(`Unknown option: ${arg}`);
    } else if (filename === undefined) {
      filename = arg;
    } else {
      throw invalidParameters(`Unexpected argument: ${arg}`);
    }
  }

  if (filename === undefined) {
    throw invalidParameters('recover needs <file>');
  }
  return { filename, lenient };
}

function formatSplit(result: MnemonicSplit): string {
  const lines = [
    `Entropy:  0x${result.entropy}`,
    `Mnemonic: ${result.mnemonic}`,
    '',
    `SSKR shares - need to recover at least ${result.spec.groupThreshold} group(s) to recover mnemonic`,
    '',
  ];

  result.groups.forEach((shares, groupIndex) => {
    const { memberThreshold, memberCount } = result.spec.groups[groupIndex];
    lines.push(`Group ${groupIndex + 1} - need ${memberThreshold} of ${memberCount} shares to recover group`);
    shares.forEach((share, i) => {
      const pad = shares.length > 9 && i < 9 ? ' ' : '';
      lines.push(`  ${pad}${i + 1}: ${share}`);
    });
    lines.push('');
  });

  return lines.join('\n') + '\n';
}

export function runSplit(rawArgs: string[], config: SskrConfig, context: CliContext, logger: Logger): string {
  const args = parseSplitArgs(rawArgs);
  const spec = parseGroupSpec(args.spec, parseGroupThreshold(args.groupThreshold));
  const options = {
    style: args.style ?? config.bytewordsStyle,
    random: context.random,
    logger,
  };

  const result = args.mnemonic === undefined
    ? Sskr.splitRandomMnemonic(spec, { ...options, words: args.words ?? config.mnemonicWords })
    : Sskr.splitMnemonic(args.mnemonic, spec, options);

  return formatSplit(result);
}

export async function runRecover(rawArgs: string[], config: SskrConfig, logger: Logger): Promise<string> {
  const args = parseRecoverArgs(rawArgs);

  let contents: string;
  try {
    contents = await readFile(args.filename, 'utf8');
  } catch (err) {
    throw new Error(`Cannot read file "${args.filename}": ${err instanceof Error ? err.message : String(err)}`);
  }

  const result = Sskr.recoverMnemonic(contents.split(/\r?\n/), {
    strict: args.lenient ? false : config.strictDecoding,
    logger,
  });

  return `Entropy:  0x${result.entropy}\nMnemonic: ${result.mnemonic}\n`;
}

/**
 * Run the CLI and return the exit code
 */
export async function main(argv: string[] = process.argv.slice(2), context: CliContext = {}): Promise<number> {
  const stdout = context.stdout ?? process.stdout;
  const stderr = context.stderr ?? process.stderr;

  const command = argv[0];
  if (command === undefined || argv.includes('--help') || argv.includes('-h') || command === 'help') {
    stdout.write(HELP);
    return command === undefined ? 1 : 0;
  }

  let config: SskrConfig;
  try {
    config = loadConfig(context.env ?? process.env);
  } catch (err) {
    stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
    return 1;
  }
  const logger = context.logger ?? createLogger(config.logLevel);

  if (command === 'split') {
    try {
      stdout.write(runSplit(argv.slice(1), config, context, logger));
      return 0;
    } catch (err) {
      stderr.write(`Error splitting mnemonic: ${err instanceof Error ? err.message : String(err)}\n`);
      return 1;
    }
  }

  if (command === 'recover') {
    try {
      stdout.write(await runRecover(argv.slice(1), config, logger));
      return 0;
    } catch (err) {
      stderr.write(`Error recovering mnemonic: ${err instanceof Error ? err.message : String(err)}\n`);
      return 1;
    }
  }

  stderr.write(`Unknown command: ${command}\n\n${HELP}`);
  return 1;
}

const entrypoint = process.argv[1] ? pathToFileURL(process.argv[1]).href : '';
if (entrypoint && import.meta.url === entrypoint) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error('fatal error:', error);
      process.exitCode = 1;
    }
  );
}
