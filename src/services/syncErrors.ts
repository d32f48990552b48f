export class SyncError extends Error {
  public readonly targetPath: string;

  constructor(message: string, targetPath: string) {
    super(message);
    this.name = 'SyncError';
    this.targetPath = targetPath;
  }
}

/**
 * The target could not be read or written.
 */
export class TargetAccessError extends SyncError {
  public readonly code?: string;

  constructor(targetPath: string, operation: 'read' | 'write', cause: unknown) {
    const code = errorCode(cause);
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot ${operation} ${targetPath}: ${detail}`, targetPath);
    this.name = 'TargetAccessError';
    this.code = code;
  }
}

/**
 * A pinned line index lies beyond the end of the target.
 */
export class TargetShapeError extends SyncError {
  constructor(targetPath: string, lineIndex: number, lineCount: number) {
    super(
      `${targetPath} has ${lineCount} line(s); version line ${lineIndex} is out of range`,
      targetPath
    );
    this.name = 'TargetShapeError';
  }
}

/**
 * The target is not valid UTF-8; rewriting it would alter bytes outside the version line.
 */
export class TargetEncodingError extends SyncError {
  constructor(targetPath: string) {
    super(`${targetPath} is not valid UTF-8`, targetPath);
    this.name = 'TargetEncodingError';
  }
}

export class VersionLineNotFoundError extends SyncError {
  constructor(targetPath: string, scanLimit: number) {
    super(`No version declaration found in the first ${scanLimit} line(s) of ${targetPath}`, targetPath);
    this.name = 'VersionLineNotFoundError';
  }
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
