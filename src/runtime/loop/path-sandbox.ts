/**
 * Path Sandbox
 *
 * Resolves tool path arguments against the working directory and rejects any
 * path whose canonical form leaves it. Symlinks are followed through the deepest
 * existing ancestor, so a link pointing outside the root is caught even when the
 * target file does not exist yet.
 */

import { realpath } from 'node:fs/promises';
import { basename, dirname, join, relative, resolve, sep, isAbsolute } from 'node:path';
import { PathEscapeError, isMissingPathError } from './loop-errors.js';

/**
 * Canonicalize a path that may not exist yet.
 *
 * Walks up to the deepest existing ancestor, resolves it with realpath, then
 * re-appends the missing tail.
 */
export async function canonicalizePath(absolutePath: string): Promise<string> {
  const tail: string[] = [];
  let current = resolve(absolutePath);

  for (;;) {
    try {
      const real = await realpath(current);
      return tail.length > 0 ? join(real, ...tail.reverse()) : real;
    } catch (error) {
      if (!isMissingPathError(error)) throw error;
      const parent = dirname(current);
      if (parent === current) {
        return resolve(absolutePath);
      }
      tail.push(basename(current));
      current = parent;
    }
  }
}

/**
 * Component-wise containment check: `/work-evil` is not inside `/work`.
 */
export function isWithinRoot(root: string, target: string): boolean {
  const rel = relative(root, target);
  if (rel === '') return true;
  if (isAbsolute(rel)) return false;
  return rel !== '..' && !rel.startsWith(`..${sep}`);
}

/**
 * Resolve a tool path argument inside the working directory.
 *
 * Absolute paths are taken as-is, relative ones are joined to the root.
 * Returns the canonical absolute path.
 *
 * @throws PathEscapeError when the canonical path is outside the canonical root
 */
export async function resolveInWorkdir(rawPath: string, workdirRoot: string): Promise<string> {
  const root = await canonicalizePath(workdirRoot);
  const candidate = resolve(root, rawPath);
  const canonical = await canonicalizePath(candidate);

  if (!isWithinRoot(root, canonical)) {
    throw new PathEscapeError(rawPath, root);
  }
  return canonical;
}
