import * as fs from 'fs';
import { TextDecoder } from 'util';
import { SyncConfig, TargetConfig } from '../types/config';
import { Logger } from '../utils/logger';
import { joinLines, splitLines, stripTerminator } from '../utils/lineBuffer';
import { writeFileAtomic } from '../utils/atomicWriter';
import { locateVersionLine } from './versionLocator';
import { TargetAccessError, TargetEncodingError } from './syncErrors';

const BYTE_ORDER_MARK = '\uFEFF';

export interface SyncResult {
  path: string;
  resolvedPath: string;
  lineIndex: number;
  previousLine: string;
  updatedLine: string;
  changed: boolean;
}

/**
 * Writes one version string into the version declaration of every configured target.
 *
 * Targets are processed one after another: read, locate, replace, write, confirm.
 * The first failure aborts the run; targets already written stay written.
 */
export class VersionSynchronizer {
  private config: SyncConfig;
  private logger: Logger;

  constructor(config: SyncConfig, logger: Logger) {
    this.config = config;
    this.logger = logger;
  }

  /**
   * The declaration written into every target. Always ends in a bare `\n`.
   */
  public renderVersionLine(): string {
    return `version = "${this.config.version}"\n`;
  }

  public synchronize(): SyncResult[] {
    this.logger.info(`Synchronizing version ${this.config.version} across ${this.config.targets.length} file(s)`);

    const results: SyncResult[] = [];
    for (const target of this.config.targets) {
      const result = this.synchronizeTarget(target);
      console.log(`${target.path} version updated`);
      results.push(result);
    }

    this.logger.info(`Version ${this.config.version} written to ${results.length} file(s)`);
    return results;
  }

  private synchronizeTarget(target: TargetConfig): SyncResult {
    const original = this.readTarget(target);
    const lines = splitLines(original);

    const lineIndex = locateVersionLine(target.path, lines, {
      line: target.line,
      scanLimit: this.config.scanLimit,
    });
    const previousLine = lines[lineIndex];
    const bom = lineIndex === 0 && previousLine.startsWith(BYTE_ORDER_MARK) ? BYTE_ORDER_MARK : '';
    const updatedLine = bom + this.renderVersionLine();
    lines[lineIndex] = updatedLine;

    const updated = joinLines(lines);
    const changed = updated !== original;
    if (this.logger.isDebugEnabled()) {
      this.logger.debug(
        changed
          ? `${target.path}:${lineIndex + 1}: ${stripTerminator(previousLine)} -> ${stripTerminator(updatedLine)}`
          : `${target.path}:${lineIndex + 1}: already at ${this.config.version}`
      );
    }

    try {
      writeFileAtomic(target.resolvedPath, Buffer.from(updated, 'utf8'), this.logger);
    } catch (error) {
      throw new TargetAccessError(target.path, 'write', error);
    }

    return {
      path: target.path,
      resolvedPath: target.resolvedPath,
      lineIndex,
      previousLine,
      updatedLine,
      changed,
    };
  }

  /**
   * Decodes strictly so that re-encoding gives back the same bytes; the BOM is kept in the text.
   */
  private readTarget(target: TargetConfig): string {
    let bytes: Buffer;
    try {
      bytes = fs.readFileSync(target.resolvedPath);
    } catch (error) {
      throw new TargetAccessError(target.path, 'read', error);
    }

    try {
      return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes);
    } catch (error) {
      if (error instanceof TypeError) {
        throw new TargetEncodingError(target.path);
      }
      throw error;
    }
  }
}
