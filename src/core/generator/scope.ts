import picomatch from 'picomatch';

import type { FileSet } from '../candidate/types.js';

export const PROTECTED_PATH_PATTERNS = ['.git/**', '.beamforge/**'] as const;

export interface ScopeViolation {
  file: string;
  reason: 'protected_path' | 'out_of_scope';
}

/**
 * Checks generated paths against the phase's writable patterns.
 * An empty `allowedPaths` list allows everything except protected paths.
 */
export function verifyScope(files: FileSet, allowedPaths: readonly string[]): ScopeViolation[] {
  const isProtected = picomatch([...PROTECTED_PATH_PATTERNS], { dot: true });
  const inScope = allowedPaths.length > 0 ? picomatch([...allowedPaths], { dot: true }) : null;

  const violations: ScopeViolation[] = [];
  for (const file of Object.keys(files).sort()) {
    if (isProtected(file)) {
      violations.push({ file, reason: 'protected_path' });
    } else if (inScope && !inScope(file)) {
      violations.push({ file, reason: 'out_of_scope' });
    }
  }
  return violations;
}
