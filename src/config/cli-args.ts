import type { CliOverrides } from './app-config';
import { ConfigurationError } from '../utils/errors';

const VALUE_FLAGS = {
  '--provider': 'provider',
  '--job': 'jobName',
  '--srt': 'srtPath',
  '--out': 'out',
  '--model': 'model',
  '--voice': 'voice',
  '--format': 'format',
  '--instructions': 'instructions',
  '--force-language': 'forceLanguage',
  '--cache-dir': 'cacheDir',
} as const;

const NUMBER_FLAGS = {
  '--pad-start': 'padStart',
  '--pad-end': 'padEnd',
  '--max-chars': 'maxChars',
  '--max-speedup': 'maxSpeedup',
  '--concurrency': 'concurrency',
} as const;

function isValueFlag(flag: string): flag is keyof typeof VALUE_FLAGS {
  return Object.prototype.hasOwnProperty.call(VALUE_FLAGS, flag);
}

function isNumberFlag(flag: string): flag is keyof typeof NUMBER_FLAGS {
  return Object.prototype.hasOwnProperty.call(NUMBER_FLAGS, flag);
}

export interface ParsedArgs {
  overrides: CliOverrides;
  help: boolean;
}

/**
 * Parse `--flag value` / `--flag=value` arguments. Unknown flags and
 * missing or non-numeric values raise ConfigurationError.
 */
export function parseCliArgs(argv: readonly string[]): ParsedArgs {
  const overrides: CliOverrides = {};
  const issues: string[] = [];
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.indexOf('=');
    const flag = arg.startsWith('--') && eq > 0 ? arg.slice(0, eq) : arg;
    const inline = flag !== arg ? arg.slice(eq + 1) : undefined;

    const takeValue = (): string | undefined => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('--')) {
        issues.push(`${flag}: missing value`);
        return undefined;
      }
      i++;
      return next;
    };

    if (flag === '--help' || flag === '-h') {
      help = true;
    } else if (flag === '--no-fill') {
      overrides.noFill = true;
    } else if (flag === '--hard-cut') {
      overrides.hardCut = true;
    } else if (flag === '--no-transliterate') {
      overrides.noTransliterate = true;
    } else if (isValueFlag(flag)) {
      const value = takeValue();
      if (value !== undefined) overrides[VALUE_FLAGS[flag]] = value;
    } else if (isNumberFlag(flag)) {
      const value = takeValue();
      if (value === undefined) continue;
      const parsed = Number(value);
      if (value.trim() === '' || !Number.isFinite(parsed)) {
        issues.push(`${flag}: expected a number, got "${value}"`);
        continue;
      }
      overrides[NUMBER_FLAGS[flag]] = parsed;
    } else {
      issues.push(`unknown argument "${arg}"`);
    }
  }

  if (issues.length > 0) {
    throw new ConfigurationError('Invalid arguments', issues);
  }
  return { overrides, help };
}
