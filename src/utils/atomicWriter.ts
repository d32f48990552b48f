import * as fs from 'fs';
import * as path from 'path';
import { randomBytes } from 'crypto';
import { Logger } from './logger';

/**
 * Writes `content` to `filePath` through a temporary file in the same directory
 * that is renamed over the target once fully written. The target is never
 * truncated in place, so a failed write leaves its previous content intact.
 */
export function writeFileAtomic(filePath: string, content: string | Uint8Array, logger?: Logger): void {
  // Write through symlinks: the link stays, the file it points at is replaced
  const realPath = resolveRealPath(filePath);
  const dir = path.dirname(realPath);
  const tempPath = path.join(
    dir,
    `.${path.basename(realPath)}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`
  );

  try {
    const mode = existingMode(realPath);
    fs.writeFileSync(tempPath, content, { mode });
    if (mode !== undefined) {
      // writeFileSync's mode is filtered through the umask
      fs.chmodSync(tempPath, mode);
    }
    fs.renameSync(tempPath, realPath);
  } catch (error) {
    removeTempFile(tempPath, logger);
    throw error;
  }
}

function resolveRealPath(filePath: string): string {
  try {
    return fs.realpathSync(filePath);
  } catch (error) {
    if (isNotFound(error)) {
      return path.resolve(filePath);
    }
    throw error;
  }
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

function existingMode(filePath: string): number | undefined {
  try {
    return fs.statSync(filePath).mode & 0o7777;
  } catch {
    return undefined;
  }
}

function removeTempFile(tempPath: string, logger?: Logger): void {
  if (!fs.existsSync(tempPath)) {
    return;
  }
  try {
    fs.unlinkSync(tempPath);
  } catch (cleanupError) {
    logger?.warn(
      `Failed to remove temporary file ${tempPath}: ${cleanupError instanceof Error ? cleanupError.message : String(cleanupError)}`
    );
  }
}
