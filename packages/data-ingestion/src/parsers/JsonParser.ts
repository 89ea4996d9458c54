import { BaseParser } from './BaseParser';
import type { RawRow } from '../types';
import { FileDetectionService } from '../utils/fileDetection';
import logger from '../utils/logger';

/**
 * Accepts an array of objects, an object wrapping one array of objects
 * (e.g. {"records": [...]}), a single object, or newline-delimited JSON.
 */
export class JsonParser extends BaseParser {
  async *parse(content: Buffer): AsyncGenerator<RawRow> {
    const text = FileDetectionService.stripBom(content.toString('utf8')).trim();
    if (text === '') return;

    const items = this.decode(text);
    let nonObjects = 0;

    for (const item of items) {
      const row = this.toRawRow(item);
      if (!row) nonObjects++;
      // Non-object entries still occupy a row so they are counted downstream
      yield row ?? {};
    }

    if (nonObjects > 0) {
      logger.warn('JSON entries that are not objects read as empty rows', { path: this.file.path, count: nonObjects });
    }
  }

  private decode(text: string): unknown[] {
    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch (error) {
      const ndjson = this.decodeLines(text);
      if (ndjson) return ndjson;
      throw this.formatError('JSON parsing failed', error);
    }

    if (Array.isArray(document)) {
      return document;
    }

    if (document !== null && typeof document === 'object') {
      const arrays = Object.values(document).filter(
        (value): value is unknown[] => Array.isArray(value) && value.some(isRecordLike)
      );
      if (arrays.length === 1) {
        return arrays[0];
      }
      return [document];
    }

    throw this.formatError('JSON document does not contain records');
  }

  private decodeLines(text: string): unknown[] | null {
    const lines = text.split(/\r?\n/).map(line => line.trim()).filter(Boolean);
    if (lines.length < 2) return null;

    const items: unknown[] = [];
    for (const line of lines) {
      try {
        items.push(JSON.parse(line));
      } catch {
        return null;
      }
    }
    return items;
  }
}

function isRecordLike(value: unknown): boolean {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
