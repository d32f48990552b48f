import { TargetShapeError, VersionLineNotFoundError } from './syncErrors';
import { stripTerminator } from '../utils/lineBuffer';

export const DEFAULT_SCAN_LIMIT = 20;

// `version = "..."`; excludes `rust-version`, `version.workspace` and friends.
// TOML whitespace is space and tab only; a leading byte order mark is allowed on the first line.
const VERSION_KEY_RE = /^\uFEFF?[ \t]*version[ \t]*=[ \t]*(.*)$/;

export interface LocateOptions {
  /** Pinned zero-based index; skips key matching when set */
  line?: number;
  scanLimit?: number;
}

/**
 * Returns true when the line declares a plain `version` key.
 * Inline tables such as `version = { workspace = true }` do not count.
 */
export function isVersionDeclaration(line: string): boolean {
  const match = VERSION_KEY_RE.exec(stripTerminator(line));
  if (!match) {
    return false;
  }
  return !match[1].trimStart().startsWith('{');
}

/**
 * Finds the index of the version declaration line in `lines`.
 */
export function locateVersionLine(
  targetPath: string,
  lines: readonly string[],
  options: LocateOptions = {}
): number {
  if (options.line !== undefined) {
    if (options.line >= lines.length) {
      throw new TargetShapeError(targetPath, options.line, lines.length);
    }
    return options.line;
  }

  const scanLimit = options.scanLimit ?? DEFAULT_SCAN_LIMIT;
  const bound = Math.min(scanLimit, lines.length);
  for (let i = 0; i < bound; i++) {
    if (isVersionDeclaration(lines[i])) {
      return i;
    }
  }

  throw new VersionLineNotFoundError(targetPath, scanLimit);
}
