// Core dataset types

// Damage level const enum - for use as both type and value
export const DamageLevel = {
  NONE: 'none' as const,
  MINOR: 'minor' as const,
  SUBSTANTIAL: 'substantial' as const,
  DESTROYED: 'destroyed' as const,
  UNKNOWN: 'unknown' as const
} as const;

export type DamageLevel = typeof DamageLevel[keyof typeof DamageLevel];

export const DAMAGE_LEVELS: readonly DamageLevel[] = [
  DamageLevel.NONE,
  DamageLevel.MINOR,
  DamageLevel.SUBSTANTIAL,
  DamageLevel.DESTROYED,
  DamageLevel.UNKNOWN
];

/**
 * Points back at the file and the 1-based data row a record came from.
 */
export interface SourceRef {
  path: string;
  row: number;
}

export interface CanonicalRecord {
  date: string; // YYYY-MM-DD
  year: number;
  operator: string | null;
  aircraft_type: string | null;
  fatalities: number;
  damage_level: DamageLevel;
  latitude: number | null;
  longitude: number | null;
  location: string | null;
  source_id: SourceRef;
}

export type CanonicalField = Exclude<keyof CanonicalRecord, 'source_id'>;

export function formatSourceRef(ref: SourceRef): string {
  return `${ref.path}#${ref.row}`;
}
