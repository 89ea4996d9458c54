import type { RawFile, RawRow } from '../types';
import { FormatError } from '../utils/errors';
import { getErrorMessage } from '../utils/errorUtils';

export abstract class BaseParser {
  protected readonly file: RawFile;

  constructor(file: RawFile) {
    this.file = file;
  }

  /**
   * Yield source rows one at a time
   */
  abstract parse(content: Buffer): AsyncGenerator<RawRow>;

  /**
   * Convert a decoded source object into a RawRow.
   * Strings are kept, other scalars stringified, nested values JSON-encoded,
   * null/undefined/empty dropped. Returns null for non-objects.
   */
  protected toRawRow(value: unknown): RawRow | null {
    if (value === null || typeof value !== 'object' || Array.isArray(value)) {
      return null;
    }

    const row: RawRow = {};
    for (const [key, raw] of Object.entries(value)) {
      const name = key.trim();
      if (!name || raw === null || raw === undefined) continue;

      let text: string;
      if (typeof raw === 'string') {
        text = raw;
      } else if (typeof raw === 'number' || typeof raw === 'boolean' || typeof raw === 'bigint') {
        text = String(raw);
      } else {
        text = JSON.stringify(raw);
      }

      if (text.trim() !== '') {
        row[name] = text;
      }
    }
    return row;
  }

  /**
   * Wrap a parsing failure as a FormatError scoped to this file
   */
  protected formatError(message: string, cause?: unknown): FormatError {
    const detail = cause === undefined ? '' : `: ${getErrorMessage(cause)}`;
    return new FormatError(`${message}${detail}`, { path: this.file.path, cause });
  }
}
