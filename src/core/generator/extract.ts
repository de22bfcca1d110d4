import { GenerationError, InvalidPathError } from '../errors.js';
import { normalizeRelativePath } from '../../utils/paths.js';
import type { FileSet } from '../candidate/types.js';

const OPEN_TAG = /<file\s+path="([^"]*)"\s*>/g;
const CLOSE_TAG = '</file>';

/**
 * Default extractor for `<file path="...">content</file>` blocks.
 *
 * Content is trimmed of the blank lines around it, matching how models usually
 * format the blocks. A later block for the same path replaces an earlier one.
 */
export function extractFileBlocks(rawText: string): FileSet {
  const files: Record<string, string> = {};
  let count = 0;

  OPEN_TAG.lastIndex = 0;
  let m: RegExpExecArray | null;
  while ((m = OPEN_TAG.exec(rawText)) !== null) {
    const path = normalizeGeneratedPath(m[1] ?? '');
    const start = m.index + m[0].length;
    const end = rawText.indexOf(CLOSE_TAG, start);
    if (end < 0) {
      throw new GenerationError(`unterminated file block for '${path}'`);
    }
    files[path] = stripBlockPadding(rawText.slice(start, end));
    count += 1;
    OPEN_TAG.lastIndex = end + CLOSE_TAG.length;
  }

  if (count === 0) {
    throw new GenerationError('response contains no file blocks');
  }
  return files;
}

/** Validates a model-supplied path and returns it in repo-relative POSIX form. */
export function normalizeGeneratedPath(raw: string): string {
  try {
    return normalizeRelativePath(raw);
  } catch (err) {
    if (err instanceof InvalidPathError) throw new GenerationError(err.message, 1, { cause: err });
    throw err;
  }
}

function stripBlockPadding(content: string): string {
  return content.replace(/^\s*\n/, '').replace(/\n\s*$/, '');
}
