import { promises as fs } from 'fs';
import { foldText } from '@incident-atlas/shared';
import { CsvParser } from '../parsers/CsvParser';
import { FileFormat, type RawFile } from '../types';
import { DataNormalizer } from './DataNormalizer';
import { ConfigError } from '../utils/errors';
import { getErrorMessage } from '../utils/errorUtils';
import logger from '../utils/logger';

export interface Coordinates {
  latitude: number;
  longitude: number;
}

/**
 * Location name -> coordinates lookup, read from a `location,latitude,longitude` CSV.
 * Names match case-insensitively with whitespace collapsed.
 */
export class GeocodeCache {
  private readonly entries = new Map<string, Coordinates>();

  constructor(entries: Iterable<[string, Coordinates]> = []) {
    for (const [location, coordinates] of entries) {
      const key = foldText(location);
      // First entry for a location wins
      if (key && !this.entries.has(key)) {
        this.entries.set(key, coordinates);
      }
    }
  }

  static async load(filePath: string): Promise<GeocodeCache> {
    let content: Buffer;
    try {
      content = await fs.readFile(filePath);
    } catch (error) {
      throw new ConfigError(`Cannot read geocode cache ${filePath}: ${getErrorMessage(error)}`, {
        path: filePath,
        cause: error
      });
    }

    const file: RawFile = {
      path: filePath,
      detectedFormat: FileFormat.CSV,
      byteSize: content.length,
      archiveDepth: 0,
      sequence: 0
    };
    const normalizer = new DataNormalizer();
    const entries: Array<[string, Coordinates]> = [];
    let rejected = 0;

    try {
      for await (const row of new CsvParser(file).parse(content)) {
        const location = row.location ?? '';
        const latitude = normalizer.normalizeCoordinate(row.latitude ?? '', 'latitude').normalized;
        const longitude = normalizer.normalizeCoordinate(row.longitude ?? '', 'longitude').normalized;

        if (!location.trim() || latitude === null || longitude === null ||
            Math.abs(latitude) > 90 || Math.abs(longitude) > 180) {
          rejected++;
          continue;
        }
        entries.push([location, { latitude, longitude }]);
      }
    } catch (error) {
      throw new ConfigError(`Invalid geocode cache ${filePath}: ${getErrorMessage(error)}`, {
        path: filePath,
        cause: error
      });
    }

    if (rejected > 0) {
      logger.warn('Ignored unusable geocode cache rows', { path: filePath, rejected });
    }

    const cache = new GeocodeCache(entries);
    logger.info('Geocode cache loaded', { path: filePath, locations: cache.size });
    return cache;
  }

  lookup(location: string | null): Coordinates | null {
    if (location === null) return null;
    return this.entries.get(foldText(location)) ?? null;
  }

  get size(): number {
    return this.entries.size;
  }
}
