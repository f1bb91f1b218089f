import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';

/**
 * Load .env from the working directory or its parent so env vars are
 * available whether the CLI runs from the project root or a subdirectory.
 * Variables already set in the process environment win.
 */
export function loadEnv(cwd: string = process.cwd()): string | null {
  const candidates = [
    path.join(cwd, '.env'),
    path.join(cwd, '..', '.env'),
  ];

  for (const envPath of candidates) {
    if (fs.existsSync(envPath)) {
      const result = dotenv.config({ path: envPath });
      if (result.error && process.env.NODE_ENV === 'development') {
        console.warn(`[env] Warning loading ${envPath}:`, result.error.message);
      }
      return envPath;
    }
  }
  return null;
}

/** Lookup helpers over an env map; invalid values are collected into `issues`. */
export class EnvReader {
  readonly issues: string[] = [];

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  string(name: string): string | undefined {
    const raw = this.env[name];
    if (raw === undefined) return undefined;
    const trimmed = raw.trim();
    return trimmed === '' ? undefined : trimmed;
  }

  bool(name: string): boolean | undefined {
    const raw = this.string(name);
    if (raw === undefined) return undefined;
    return ['1', 'true', 'yes', 'on'].includes(raw.toLowerCase());
  }

  int(name: string): number | undefined {
    const raw = this.string(name);
    if (raw === undefined) return undefined;
    if (!/^[-+]?\d+$/.test(raw)) {
      this.issues.push(`${name}: expected an integer, got "${raw}"`);
      return undefined;
    }
    return Number(raw);
  }

  float(name: string): number | undefined {
    const raw = this.string(name);
    if (raw === undefined) return undefined;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      this.issues.push(`${name}: expected a number, got "${raw}"`);
      return undefined;
    }
    return value;
  }

  list(name: string): string[] {
    const raw = this.string(name);
    if (raw === undefined) return [];
    return raw.split(',').map((item) => item.trim()).filter(Boolean);
  }
}
