import { foldText } from '@incident-atlas/shared';
import type { CanonicalRecord, CanonicalField } from '@incident-atlas/types';
import type { DuplicateRef, MergeConflict, ValidationOutcome } from '../types';
import logger from '../utils/logger';

// Fields compared when a duplicate is found; the key fields agree by construction
const CONFLICT_FIELDS: readonly CanonicalField[] = [
  'fatalities',
  'damage_level',
  'latitude',
  'longitude'
];

export interface DeduplicationResult {
  unique: CanonicalRecord[];
  duplicates: DuplicateRef[];
  metrics: {
    totalRecords: number;
    uniqueRecords: number;
    duplicatesRemoved: number;
    conflictsCount: number;
  };
}

/**
 * Composite-key deduplication for canonical records.
 * The first record seen for a key is kept; later ones are reported as duplicates.
 * Callers feed records in scanner order so "first" is stable across runs.
 */
export class DeduplicationEngine {
  private readonly seen = new Map<string, CanonicalRecord>();
  private readonly duplicateRefs: DuplicateRef[] = [];
  private totalRecords = 0;
  private conflictsCount = 0;

  /**
   * Key components: date, operator, aircraft_type, location, each case-folded
   * and whitespace-collapsed
   */
  static generateCompositeKey(record: Pick<CanonicalRecord, 'date' | 'operator' | 'aircraft_type' | 'location'>): string {
    return [
      record.date,
      foldText(record.operator),
      foldText(record.aircraft_type),
      foldText(record.location)
    ].join('\u001f');
  }

  /**
   * Admit one record. Returns `valid` for the first of its key, `duplicate` otherwise.
   */
  admit(record: CanonicalRecord): Exclude<ValidationOutcome, { status: 'invalid' }> {
    this.totalRecords++;
    const key = DeduplicationEngine.generateCompositeKey(record);
    const first = this.seen.get(key);

    if (!first) {
      this.seen.set(key, record);
      return { status: 'valid', record };
    }

    const conflicts = this.findConflicts(first, record);
    if (conflicts.length > 0) {
      this.conflictsCount += conflicts.length;
      logger.info('Duplicate record differs from kept record', {
        kept: first.source_id,
        duplicate: record.source_id,
        fields: conflicts.map(conflict => conflict.field)
      });
    }

    this.duplicateRefs.push({ source_id: record.source_id, duplicateOf: first.source_id, conflicts });
    return { status: 'duplicate', record, duplicateOf: first.source_id };
  }

  deduplicate(records: Iterable<CanonicalRecord>): DeduplicationResult {
    for (const record of records) {
      this.admit(record);
    }
    return this.getResult();
  }

  getResult(): DeduplicationResult {
    const unique = [...this.seen.values()];
    return {
      unique,
      duplicates: [...this.duplicateRefs],
      metrics: {
        totalRecords: this.totalRecords,
        uniqueRecords: unique.length,
        duplicatesRemoved: this.duplicateRefs.length,
        conflictsCount: this.conflictsCount
      }
    };
  }

  private findConflicts(kept: CanonicalRecord, duplicate: CanonicalRecord): MergeConflict[] {
    const conflicts: MergeConflict[] = [];
    for (const field of CONFLICT_FIELDS) {
      if (kept[field] !== duplicate[field]) {
        conflicts.push({ field, values: [kept[field], duplicate[field]], resolution: 'keep_first' });
      }
    }
    // Key text fields can still differ in case or spacing
    for (const field of ['operator', 'aircraft_type', 'location'] as const) {
      if (kept[field] !== duplicate[field]) {
        conflicts.push({ field, values: [kept[field], duplicate[field]], resolution: 'keep_first' });
      }
    }
    return conflicts;
  }
}
