import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../../config/logger';
import { CacheIOError } from '../../utils/errors';

/**
 * Everything that determines what the backend returns for a request.
 * Playback speed is deliberately absent: it is applied after decoding.
 */
export interface SynthesisFingerprint {
  provider: string;
  providerConfig: readonly string[];
  text: string;
  /** Extension of the stored bytes; part of the file name, not of the key */
  fileExtension: string;
}

export interface SynthesisCacheOptions {
  /** Root directory; entries live under <root>/<provider>/<jobName>/ */
  rootDir: string;
  jobName: string;
}

/** Keep namespace segments to a safe single path component. */
export function sanitizeSegment(value: string): string {
  const cleaned = value.trim().replace(/[^A-Za-z0-9._-]+/g, '_').replace(/^\.+/, '');
  return cleaned || 'default';
}

/** Stable SHA-1 over the canonical JSON of (provider config..., text). */
export function fingerprintKey(fingerprint: SynthesisFingerprint): string {
  const canonical = JSON.stringify([fingerprint.provider, ...fingerprint.providerConfig, fingerprint.text]);
  return crypto.createHash('sha1').update(canonical, 'utf8').digest('hex');
}

// ===========================================================================
// Synthesis Cache
//
// Content-addressed store of raw provider audio. Writes go to a unique temp
// file and are renamed into place, so readers only ever see complete entries
// and two workers writing the same key simply race to an identical file.
// Read failures are reported and treated as misses.
// ===========================================================================

export class SynthesisCache {
  private readonly rootDir: string;
  private readonly jobName: string;

  constructor(options: SynthesisCacheOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.jobName = sanitizeSegment(options.jobName);
  }

  keyFor(fingerprint: SynthesisFingerprint): string {
    return fingerprintKey(fingerprint);
  }

  namespaceDir(provider: string): string {
    return path.join(this.rootDir, sanitizeSegment(provider), this.jobName);
  }

  pathFor(fingerprint: SynthesisFingerprint): string {
    const extension = sanitizeSegment(fingerprint.fileExtension);
    return path.join(this.namespaceDir(fingerprint.provider), `${this.keyFor(fingerprint)}.${extension}`);
  }

  /** Cached bytes, or null on a miss. Never throws. */
  async get(fingerprint: SynthesisFingerprint): Promise<Buffer | null> {
    const filePath = this.pathFor(fingerprint);
    try {
      const bytes = await fs.promises.readFile(filePath);
      if (bytes.length === 0) {
        logger.warn(`Ignoring empty cache entry ${path.basename(filePath)}`);
        return null;
      }
      return bytes;
    } catch (error: unknown) {
      if (isNotFound(error)) {
        return null;
      }
      const cacheError = new CacheIOError(this.keyFor(fingerprint), 'read', error);
      logger.warn(cacheError.message);
      return null;
    }
  }

  async has(fingerprint: SynthesisFingerprint): Promise<boolean> {
    try {
      const stats = await fs.promises.stat(this.pathFor(fingerprint));
      return stats.isFile() && stats.size > 0;
    } catch {
      return false;
    }
  }

  /**
   * Store bytes for a fingerprint. Idempotent. A failed write is logged and
   * reported through the return value; it never throws.
   */
  async put(fingerprint: SynthesisFingerprint, bytes: Buffer): Promise<boolean> {
    const filePath = this.pathFor(fingerprint);
    const tempPath = `${filePath}.${uuidv4()}.tmp`;

    try {
      await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
      await fs.promises.writeFile(tempPath, bytes);
      await fs.promises.rename(tempPath, filePath);
      return true;
    } catch (error: unknown) {
      const cacheError = new CacheIOError(this.keyFor(fingerprint), 'write', error);
      logger.warn(cacheError.message);
      await fs.promises.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        logger.debug(`Could not remove temp cache file ${tempPath}`, { error: String(cleanupError) });
      });
      return false;
    }
  }

  /** Drop one entry, e.g. after it failed to decode. */
  async invalidate(fingerprint: SynthesisFingerprint): Promise<void> {
    try {
      await fs.promises.rm(this.pathFor(fingerprint), { force: true });
    } catch (error: unknown) {
      logger.warn(new CacheIOError(this.keyFor(fingerprint), 'write', error).message);
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}
