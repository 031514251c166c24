import { realpath } from 'node:fs/promises';
import { homedir } from 'node:os';
import { basename, dirname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import type { SandboxMode } from '@toolpilot/core';
import { PathEscapeError } from './errors.js';

/** True when `target` is `base` itself or lies underneath it. */
export function isWithin(base: string, target: string): boolean {
  const rel = relative(base, target);
  if (rel === '') return true;
  return rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

/**
 * Resolve symlinks along the longest existing prefix of `absPath`.
 * The non-existent tail (a file about to be created) is appended as-is.
 */
export async function realpathLenient(absPath: string): Promise<string> {
  const tail: string[] = [];
  let current = absPath;
  for (;;) {
    try {
      const real = await realpath(current);
      return tail.length > 0 ? join(real, ...tail.reverse()) : real;
    } catch (err) {
      const parent = dirname(current);
      if (parent === current || !isMissing(err)) throw err;
      tail.push(basename(current));
      current = parent;
    }
  }
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

function expandHome(rawPath: string): string {
  if (rawPath === '~') return homedir();
  if (rawPath.startsWith('~/')) return join(homedir(), rawPath.slice(2));
  return rawPath;
}

/**
 * Resolve a user-supplied path against the workspace root, normalizing `..`
 * and following symlinks. Throws PathEscapeError when the result leaves
 * the root, unless the sandbox mode is `danger-full-access`.
 */
export async function resolveWorkspacePath(
  workspaceRoot: string,
  rawPath: string,
  sandboxMode: SandboxMode,
): Promise<string> {
  const expanded = expandHome(rawPath);
  const candidate = resolve(workspaceRoot, expanded);
  const resolved = await realpathLenient(candidate);
  if (sandboxMode !== 'danger-full-access') {
    const root = await realpathLenient(resolve(workspaceRoot));
    if (!isWithin(root, resolved)) {
      throw new PathEscapeError(rawPath);
    }
  }
  return resolved;
}
