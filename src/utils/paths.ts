import { InvalidPathError } from '../core/errors.js';

/**
 * Repo-relative POSIX form of `raw`. Absolute paths, `..` segments and
 * `__proto__` (which a plain-object file set cannot hold) are rejected.
 */
export function normalizeRelativePath(raw: string): string {
  const path = raw.trim().replaceAll('\\', '/').replace(/^(\.\/)+/, '');
  if (!path) throw new InvalidPathError(raw, 'empty path');
  if (path.startsWith('/') || /^[a-zA-Z]:\//.test(path)) {
    throw new InvalidPathError(raw, 'absolute path not allowed');
  }
  if (path.split('/').some((seg) => seg === '..')) {
    throw new InvalidPathError(raw, 'path escapes the workspace');
  }
  if (path === '__proto__') throw new InvalidPathError(raw, 'reserved path');
  return path;
}
