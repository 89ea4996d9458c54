import mimeTypes from 'mime-types';
import { FileFormat } from '../types';
import { FormatError } from './errors';

const SNIFF_BYTES = 4096;
const DELIMITERS = [',', ';', '\t', '|'] as const;

type SniffResult = FileFormat | 'binary' | null;

// File type detection utilities
export class FileDetectionService {
  /**
   * Detect file format from content, falling back to the filename extension.
   * Throws FormatError when neither identifies a supported format.
   */
  static detectFileFormat(filename: string, content: Buffer): FileFormat {
    const sniffed = this.sniffContent(content);

    if (sniffed === 'binary') {
      throw new FormatError(`Unrecognized binary content in ${filename}`, { path: filename });
    }
    if (sniffed) {
      return sniffed;
    }

    const fromExtension = this.detectFromExtension(filename);
    if (fromExtension !== FileFormat.UNKNOWN) {
      return fromExtension;
    }

    throw new FormatError(`Unsupported file format: ${filename}`, { path: filename });
  }

  /**
   * Inspect the leading bytes. Returns null when the content is inconclusive.
   */
  static sniffContent(content: Buffer): SniffResult {
    if (content.length === 0) return null;

    // ZIP local file header or empty-archive end record
    if (content.length >= 4 && content[0] === 0x50 && content[1] === 0x4b &&
        ((content[2] === 0x03 && content[3] === 0x04) || (content[2] === 0x05 && content[3] === 0x06))) {
      return FileFormat.ZIP;
    }

    if (content.length >= 2 && content[0] === 0x1f && content[1] === 0x8b) {
      return FileFormat.GZIP;
    }

    const head = content.subarray(0, Math.min(SNIFF_BYTES, content.length));
    if (head.includes(0x00)) {
      return 'binary';
    }

    const sample = this.stripBom(head.toString('utf8')).trimStart();
    if (sample.startsWith('{') || sample.startsWith('[')) {
      return FileFormat.JSON;
    }

    const firstLine = sample.split(/\r?\n/)[0] ?? '';
    if (DELIMITERS.some(delimiter => firstLine.includes(delimiter))) {
      return FileFormat.CSV;
    }

    return null;
  }

  /**
   * Map the filename extension to a format through its MIME type
   */
  static detectFromExtension(filename: string): FileFormat {
    const mimetype = mimeTypes.lookup(filename);

    switch (mimetype) {
      case 'text/csv':
      case 'application/csv':
      case 'text/tab-separated-values':
      case 'text/plain':
        return FileFormat.CSV;
      case 'application/json':
      case 'application/ld+json':
        return FileFormat.JSON;
      case 'application/zip':
      case 'application/x-zip-compressed':
        return FileFormat.ZIP;
      case 'application/gzip':
      case 'application/x-gzip':
        return FileFormat.GZIP;
      default:
        return filename.toLowerCase().endsWith('.ndjson') ? FileFormat.JSON : FileFormat.UNKNOWN;
    }
  }

  /**
   * Pick the most frequent delimiter on the header line
   */
  static detectDelimiter(sample: string): string {
    const headerLine = sample.split(/\r?\n/)[0] ?? '';
    const counts = DELIMITERS.map(delimiter => ({
      delimiter,
      count: headerLine.split(delimiter).length - 1
    }));

    const best = counts.reduce((max, current) =>
      current.count > max.count ? current : max
    );

    return best.count > 0 ? best.delimiter : ',';
  }

  static stripBom(text: string): string {
    return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  }
}
