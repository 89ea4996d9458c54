import csv from 'csv-parser';
import { Readable } from 'stream';
import { BaseParser } from './BaseParser';
import type { RawRow } from '../types';
import { FileDetectionService } from '../utils/fileDetection';
import { FormatError } from '../utils/errors';

export class CsvParser extends BaseParser {
  /**
   * Parse CSV content into rows keyed by the header line
   */
  async *parse(content: Buffer): AsyncGenerator<RawRow> {
    const text = FileDetectionService.stripBom(content.toString('utf8'));
    const separator = FileDetectionService.detectDelimiter(text.slice(0, 4096));

    const stream = Readable.from([text]).pipe(
      csv({
        separator,
        strict: false,
        mapHeaders: ({ header }) => header.trim()
      })
    );

    try {
      for await (const record of stream) {
        const row = this.toRawRow(record);
        if (row) yield row;
      }
    } catch (error) {
      if (error instanceof FormatError) throw error;
      throw this.formatError('CSV parsing failed', error);
    }
  }
}
