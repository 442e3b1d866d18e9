/**
 * Scratch-file lifecycle. Every operation that needs intermediates acquires
 * its own uniquely named directory beside the output and releases it on
 * every exit path, so concurrent calls for different outputs never share a
 * file name.
 */
import { randomUUID } from 'node:crypto';
import * as fs from 'fs';
import * as path from 'path';
import { logger } from './logger.js';
import type { CleanupWarning } from './errors.js';

const log = logger.child('Scratch');

/** Remove a file or directory; failure is reported, never thrown. */
export function removeQuietly(target: string): CleanupWarning | null {
  try {
    fs.rmSync(target, { recursive: true, force: true });
    return null;
  } catch (err) {
    const warning: CleanupWarning = {
      kind: 'cleanup_warning',
      path: target,
      reason: err instanceof Error ? err.message : String(err),
    };
    log.warn('could not remove scratch path', { ...warning });
    return warning;
  }
}

/**
 * Run `fn` with a fresh `.scratch-<label>-<uuid>` directory created next to
 * `nearPath`. The directory and everything in it is removed when `fn`
 * settles.
 */
export async function withScratchDir<T>(
  nearPath: string,
  label: string,
  fn: (dir: string) => Promise<T>,
): Promise<T> {
  const parent = path.dirname(path.resolve(nearPath));
  fs.mkdirSync(parent, { recursive: true });
  const dir = path.join(parent, `.scratch-${label}-${randomUUID()}`);
  fs.mkdirSync(dir);
  log.debug('acquired', { dir });
  try {
    return await fn(dir);
  } finally {
    if (removeQuietly(dir) === null) log.debug('released', { dir });
  }
}

/** Sibling path the transcoder writes to before the result is renamed into place. */
export function tempSiblingPath(finalPath: string): string {
  const resolved = path.resolve(finalPath);
  return path.join(path.dirname(resolved), `.tmp-${randomUUID()}-${path.basename(resolved)}`);
}

/**
 * Produce `finalPath` through a temporary sibling. Nothing appears at
 * `finalPath` unless `write` returns normally.
 */
export function writeAtomically(finalPath: string, write: (tempPath: string) => void): string {
  const resolved = path.resolve(finalPath);
  fs.mkdirSync(path.dirname(resolved), { recursive: true });
  const tempPath = tempSiblingPath(resolved);
  try {
    write(tempPath);
    fs.renameSync(tempPath, resolved);
  } catch (err) {
    removeQuietly(tempPath);
    throw err;
  }
  return resolved;
}
