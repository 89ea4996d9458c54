import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { DamageLevel, type CanonicalRecord } from '@incident-atlas/types';
import { FileFormat, type ScannedFile, type TabularFormat } from '../../types';

export async function makeTempDir(prefix: string = 'incident-atlas-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

export async function* fromArray<T>(items: readonly T[]): AsyncGenerator<T> {
  for (const item of items) {
    yield item;
  }
}

export function makeScanned(
  filePath: string,
  text: string,
  format: TabularFormat = FileFormat.CSV,
  sequence: number = 0
): ScannedFile {
  const content = Buffer.from(text, 'utf8');
  return {
    file: { path: filePath, detectedFormat: format, byteSize: content.length, archiveDepth: 0, sequence },
    content
  };
}

export function makeRecord(overrides: Partial<CanonicalRecord> = {}): CanonicalRecord {
  return {
    date: '2020-01-05',
    year: 2020,
    operator: 'Acme Air',
    aircraft_type: 'B737',
    fatalities: 0,
    damage_level: DamageLevel.MINOR,
    latitude: null,
    longitude: null,
    location: 'Springfield',
    source_id: { path: 'incidents.csv', row: 1 },
    ...overrides
  };
}

/**
 * Deterministic PRNG (mulberry32) for property-style tests
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function pick<T>(random: () => number, items: readonly T[]): T {
  return items[Math.floor(random() * items.length)];
}

export function shuffle<T>(random: () => number, items: readonly T[]): T[] {
  const copy = [...items];
  for (let i = copy.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy;
}
