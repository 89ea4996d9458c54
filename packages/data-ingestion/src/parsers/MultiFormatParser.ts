import { BaseParser } from './BaseParser';
import { CsvParser } from './CsvParser';
import { JsonParser } from './JsonParser';
import { FileFormat, type RawRow, type ScannedFile } from '../types';

/**
 * Picks the parser for a scanned file's detected format
 */
export class MultiFormatParser {
  static createParser(scanned: ScannedFile): BaseParser {
    if (scanned.file.detectedFormat === FileFormat.CSV) {
      return new CsvParser(scanned.file);
    }
    return new JsonParser(scanned.file);
  }

  static parseRows(scanned: ScannedFile): AsyncGenerator<RawRow> {
    return this.createParser(scanned).parse(scanned.content);
  }
}
