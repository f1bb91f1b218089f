import { describe, it, expect, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { EnvReader, loadEnv } from './env';

describe('EnvReader', () => {
  it('treats blank values as unset', () => {
    const env = new EnvReader({ NAME: '  ', OTHER: ' value ' });
    expect(env.string('NAME')).toBeUndefined();
    expect(env.string('OTHER')).toBe('value');
    expect(env.string('MISSING')).toBeUndefined();
  });

  it('parses booleans', () => {
    const env = new EnvReader({ A: 'true', B: 'ON', C: '1', D: 'no', E: 'false' });
    expect([env.bool('A'), env.bool('B'), env.bool('C'), env.bool('D'), env.bool('E'), env.bool('F')])
      .toEqual([true, true, true, false, false, undefined]);
  });

  it('parses numbers and records invalid ones', () => {
    const env = new EnvReader({ INT: '42', BAD_INT: '4.2', FLOAT: '1.15', BAD_FLOAT: 'fast' });

    expect(env.int('INT')).toBe(42);
    expect(env.int('BAD_INT')).toBeUndefined();
    expect(env.float('FLOAT')).toBe(1.15);
    expect(env.float('BAD_FLOAT')).toBeUndefined();
    expect(env.issues).toEqual([
      'BAD_INT: expected an integer, got "4.2"',
      'BAD_FLOAT: expected a number, got "fast"',
    ]);
  });

  it('splits comma-separated lists', () => {
    const env = new EnvReader({ LIST: 'a, b,,c ' });
    expect(env.list('LIST')).toEqual(['a', 'b', 'c']);
    expect(env.list('MISSING')).toEqual([]);
  });
});

describe('loadEnv', () => {
  let tmpDir: string | undefined;

  afterEach(async () => {
    delete process.env.SUBTITLE_VOICEOVER_TEST_VALUE;
    if (tmpDir) await fs.promises.rm(tmpDir, { recursive: true, force: true });
  });

  it('loads .env from the given directory', async () => {
    tmpDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'env-'));
    const envFile = path.join(tmpDir, '.env');
    await fs.promises.writeFile(envFile, 'SUBTITLE_VOICEOVER_TEST_VALUE=from-file\n');

    expect(loadEnv(tmpDir)).toBe(envFile);
    expect(process.env.SUBTITLE_VOICEOVER_TEST_VALUE).toBe('from-file');
  });
});
