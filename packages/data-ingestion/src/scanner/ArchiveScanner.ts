/**
 * Archive Scanner - discovers tabular source files under the input roots
 *
 * Walks directories in sorted order and expands zip/gzip containers in memory,
 * one entry at a time. Every call to scan() starts a fresh walk with fresh
 * depth and size accounting, so the sequence is restartable.
 *
 * Failures are scoped: a bad file or container becomes an error event and
 * the walk moves on to its siblings.
 */
import { promises as fs } from 'fs';
import path from 'path';
import { gunzipSync } from 'zlib';
import { constants as bufferConstants } from 'buffer';
import AdmZip from 'adm-zip';
import { compareKeys, formatFileSize } from '@incident-atlas/shared';
import { FileFormat, type ScannedFile } from '../types';
import { FileDetectionService } from '../utils/fileDetection';
import {
  FormatError,
  ResourceLimitError,
  ScanError,
  type FileLevelError
} from '../utils/errors';
import { getErrorCode, getErrorMessage } from '../utils/errorUtils';
import logger from '../utils/logger';

export type ScanEvent =
  | { kind: 'file'; scanned: ScannedFile }
  | { kind: 'error'; error: FileLevelError };

export interface ScannerLimits {
  maxArchiveDepth: number;
  maxExtractedBytes: number;
}

interface ScanState {
  sequence: number;
  extractedBytes: number;
}

// Separates a container path from the entry path inside it
export const ENTRY_SEPARATOR = '!/';

export class ArchiveScanner {
  private readonly roots: string[];
  private readonly limits: ScannerLimits;

  constructor(roots: string[], limits: ScannerLimits) {
    this.roots = [...roots];
    this.limits = limits;
  }

  async *scan(): AsyncGenerator<ScanEvent> {
    const state: ScanState = { sequence: 0, extractedBytes: 0 };

    for (const root of this.roots) {
      yield* this.walkPath(root, state);
    }

    logger.debug('Scan completed', {
      roots: this.roots.length,
      files: state.sequence,
      extracted: formatFileSize(state.extractedBytes)
    });
  }

  private async *walkPath(target: string, state: ScanState): AsyncGenerator<ScanEvent> {
    let stats;
    try {
      stats = await fs.stat(target);
    } catch (error) {
      yield this.scanError(`Cannot access ${target} (${getErrorCode(error) ?? getErrorMessage(error)})`, target, error);
      return;
    }

    if (stats.isDirectory()) {
      let names: string[];
      try {
        names = (await fs.readdir(target)).sort(compareKeys);
      } catch (error) {
        yield this.scanError(`Cannot list directory ${target}`, target, error);
        return;
      }

      for (const name of names) {
        yield* this.walkPath(path.join(target, name), state);
      }
      return;
    }

    if (!stats.isFile()) {
      return;
    }

    let content: Buffer;
    try {
      content = await fs.readFile(target);
    } catch (error) {
      yield this.scanError(`Cannot read ${target}`, target, error);
      return;
    }

    yield* this.classify(target, content, 0, state);
  }

  private async *classify(
    filePath: string,
    content: Buffer,
    depth: number,
    state: ScanState
  ): AsyncGenerator<ScanEvent> {
    let format: FileFormat;
    try {
      format = FileDetectionService.detectFileFormat(filePath, content);
    } catch (error) {
      if (error instanceof FormatError) {
        yield { kind: 'error', error };
        return;
      }
      throw error;
    }

    switch (format) {
      case FileFormat.ZIP:
        yield* this.expandZip(filePath, content, depth, state);
        return;
      case FileFormat.GZIP:
        yield* this.expandGzip(filePath, content, depth, state);
        return;
      case FileFormat.CSV:
      case FileFormat.JSON:
        yield {
          kind: 'file',
          scanned: {
            file: {
              path: filePath,
              detectedFormat: format,
              byteSize: content.length,
              archiveDepth: depth,
              sequence: state.sequence++
            },
            content
          }
        };
        return;
      default:
        yield { kind: 'error', error: new FormatError(`Unsupported file format: ${filePath}`, { path: filePath }) };
    }
  }

  private async *expandZip(
    containerPath: string,
    content: Buffer,
    depth: number,
    state: ScanState
  ): AsyncGenerator<ScanEvent> {
    const depthError = this.checkDepth(containerPath, depth);
    if (depthError) {
      yield depthError;
      return;
    }

    let entries: AdmZip.IZipEntry[];
    try {
      entries = new AdmZip(content).getEntries();
    } catch (error) {
      yield this.scanError(`Corrupt zip container ${containerPath}`, containerPath, error);
      return;
    }

    entries.sort((a, b) => compareKeys(a.entryName, b.entryName));

    for (const entry of entries) {
      if (entry.isDirectory) continue;

      const entryPath = `${containerPath}${ENTRY_SEPARATOR}${entry.entryName}`;

      // Declared size first, so an oversized entry is never inflated
      if (state.extractedBytes + entry.header.size > this.limits.maxExtractedBytes) {
        yield this.sizeError(containerPath, entryPath);
        return;
      }

      let data: Buffer;
      try {
        data = entry.getData();
      } catch (error) {
        yield this.scanError(`Corrupt zip entry ${entryPath}`, entryPath, error);
        continue;
      }

      if (state.extractedBytes + data.length > this.limits.maxExtractedBytes) {
        yield this.sizeError(containerPath, entryPath);
        return;
      }
      state.extractedBytes += data.length;

      yield* this.classify(entryPath, data, depth + 1, state);
    }
  }

  private async *expandGzip(
    containerPath: string,
    content: Buffer,
    depth: number,
    state: ScanState
  ): AsyncGenerator<ScanEvent> {
    const depthError = this.checkDepth(containerPath, depth);
    if (depthError) {
      yield depthError;
      return;
    }

    const innerName = this.entryName(containerPath).replace(/\.(gz|gzip)$/i, '') || 'data';
    const entryPath = `${containerPath}${ENTRY_SEPARATOR}${innerName}`;
    const remaining = this.limits.maxExtractedBytes - state.extractedBytes;

    let data: Buffer;
    try {
      data = gunzipSync(content, {
        maxOutputLength: Math.max(1, Math.min(remaining, bufferConstants.MAX_LENGTH))
      });
    } catch (error) {
      if (error instanceof RangeError || getErrorCode(error) === 'ERR_BUFFER_TOO_LARGE') {
        yield this.sizeError(containerPath, entryPath);
      } else {
        yield this.scanError(`Corrupt gzip container ${containerPath}`, containerPath, error);
      }
      return;
    }

    if (data.length > remaining) {
      yield this.sizeError(containerPath, entryPath);
      return;
    }
    state.extractedBytes += data.length;

    yield* this.classify(entryPath, data, depth + 1, state);
  }

  private checkDepth(containerPath: string, depth: number): ScanEvent | null {
    if (depth + 1 <= this.limits.maxArchiveDepth) {
      return null;
    }
    logger.warn('Archive nesting limit reached, skipping container', {
      path: containerPath,
      depth,
      maxArchiveDepth: this.limits.maxArchiveDepth
    });
    return {
      kind: 'error',
      error: new ResourceLimitError(
        `Container ${containerPath} at depth ${depth} exceeds max archive depth ${this.limits.maxArchiveDepth}`,
        'depth',
        { path: containerPath }
      )
    };
  }

  private sizeError(containerPath: string, entryPath: string): ScanEvent {
    logger.warn('Extracted size limit reached, skipping rest of container', {
      path: containerPath,
      entry: entryPath,
      maxExtractedBytes: formatFileSize(this.limits.maxExtractedBytes)
    });
    return {
      kind: 'error',
      error: new ResourceLimitError(
        `Extracting ${entryPath} would exceed max extracted size of ${this.limits.maxExtractedBytes} bytes`,
        'size',
        { path: containerPath }
      )
    };
  }

  private scanError(message: string, filePath: string, cause: unknown): ScanEvent {
    logger.warn('Scan failed for path', { path: filePath, error: getErrorMessage(cause) });
    return { kind: 'error', error: new ScanError(message, { path: filePath, cause }) };
  }

  private entryName(filePath: string): string {
    const inner = filePath.split(ENTRY_SEPARATOR).pop() ?? filePath;
    return path.posix.basename(inner.replace(/\\/g, '/'));
  }
}
