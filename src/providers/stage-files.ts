/**
 * Stage artifact files
 *
 * Helpers to write, list and load the JSON artifacts each stage leaves in its
 * folder. Artifacts are validated with zod when read back by the next stage.
 */

import { readdir, readFile, stat } from 'fs/promises';
import { join } from 'path';
import type { z } from 'zod';
import { writeJsonAtomic } from './json-store.js';
import { errorMessage } from '../utils/errors.js';
import { timestampFromFilename } from '../utils/time-parser.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('stage-files');

export async function writeArtifact(dir: string, filename: string, data: unknown): Promise<string> {
  const path = join(dir, filename);
  await writeJsonAtomic(path, data);
  log.debug(`Wrote artifact ${path}`);
  return path;
}

/**
 * Load and validate an artifact. Throws with the file path in the message on
 * unreadable files, invalid JSON or schema mismatches.
 */
export async function readArtifact<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    throw new Error(`Failed to read artifact ${path}: ${errorMessage(error)}`, { cause: error });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Artifact ${path} is not valid JSON: ${errorMessage(error)}`, { cause: error });
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first ? `${first.path.join('.') || '<root>'}: ${first.message}` : 'schema mismatch';
    throw new Error(`Artifact ${path} has an unexpected shape (${where})`, { cause: parsed.error });
  }
  return parsed.data;
}

/**
 * File names in `dir` matching `pattern`, sorted by name. A missing directory is empty.
 */
export async function listArtifacts(dir: string, pattern: RegExp): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter(entry => entry.isFile() && pattern.test(entry.name))
      .map(entry => entry.name)
      .sort();
  } catch (error) {
    if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }
}

/**
 * Newest artifact in `dir` matching `pattern`: by the YYYYMMDD_HHMMSS stamp in the
 * file name, falling back to modification time for names without one.
 */
export async function latestArtifact(dir: string, pattern: RegExp): Promise<string | null> {
  const names = await listArtifacts(dir, pattern);
  if (names.length === 0) {
    return null;
  }

  const ranked = await Promise.all(
    names.map(async name => {
      const path = join(dir, name);
      const stamp = timestampFromFilename(name);
      const mtime = (await stat(path)).mtimeMs;
      return { path, stamp, mtime };
    })
  );

  ranked.sort((a, b) => {
    if (a.stamp !== null && b.stamp !== null && a.stamp !== b.stamp) {
      return a.stamp < b.stamp ? 1 : -1;
    }
    if (a.stamp !== null && b.stamp === null) return -1;
    if (a.stamp === null && b.stamp !== null) return 1;
    return b.mtime - a.mtime;
  });

  return ranked[0].path;
}
