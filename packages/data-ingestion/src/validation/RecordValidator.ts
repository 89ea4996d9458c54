import type { CanonicalRecord } from '@incident-atlas/types';
import {
  ReasonCode,
  type CandidateRecord,
  type CoercionWarning,
  type ValidationOutcome
} from '../types';
import { DamageClassifier } from './DamageClassifier';
import { ValidationError } from '../utils/errors';

export type RecordCheckOutcome = Exclude<ValidationOutcome, { status: 'duplicate' }>;

export interface RecordValidation {
  outcome: RecordCheckOutcome;
  warnings: CoercionWarning[];
}

/**
 * Per-record checks. Runs them in a fixed order and stops at the first failure;
 * deduplication happens later, across all records.
 */
export class RecordValidator {
  private readonly damageClassifier: DamageClassifier;

  constructor(damageClassifier: DamageClassifier = new DamageClassifier()) {
    this.damageClassifier = damageClassifier;
  }

  validate(candidate: CandidateRecord): RecordValidation {
    const warnings: CoercionWarning[] = [];
    try {
      const record = this.check(candidate, warnings);
      return { outcome: { status: 'valid', record }, warnings };
    } catch (error) {
      if (error instanceof ValidationError) {
        return {
          outcome: {
            status: 'invalid',
            reason: error.reason,
            message: error.message,
            source_id: candidate.source_id
          },
          warnings
        };
      }
      throw error;
    }
  }

  private check(candidate: CandidateRecord, warnings: CoercionWarning[]): CanonicalRecord {
    // Required fields
    if (candidate.date === null || candidate.missingFields.length > 0) {
      const missing = candidate.missingFields.length > 0 ? candidate.missingFields : ['date'];
      throw new ValidationError(
        ReasonCode.MISSING_REQUIRED_FIELD,
        `Missing required field(s): ${missing.join(', ')}`
      );
    }

    const year = Number(candidate.date.slice(0, 4));
    if (candidate.sourceYear !== null && candidate.sourceYear !== year) {
      throw new ValidationError(
        ReasonCode.YEAR_MISMATCH,
        `Year column ${candidate.sourceYear} disagrees with date ${candidate.date}`
      );
    }

    let fatalities = candidate.fatalities;
    if (fatalities === null) {
      warnings.push({ field: 'fatalities', value: '', message: 'Fatalities missing, defaulted to 0' });
      fatalities = 0;
    } else if (fatalities < 0) {
      throw new ValidationError(ReasonCode.NEGATIVE_FATALITIES, `Negative fatalities: ${fatalities}`);
    } else if (!Number.isInteger(fatalities)) {
      throw new ValidationError(ReasonCode.INVALID_FATALITIES, `Fatalities is not a whole number: ${fatalities}`);
    }

    const damageLevel = this.damageClassifier.classify(candidate.damageText);

    const { latitude, longitude } = candidate;
    if ((latitude === null) !== (longitude === null)) {
      throw new ValidationError(
        ReasonCode.PARTIAL_COORDINATES,
        `Only one coordinate present (latitude ${latitude}, longitude ${longitude})`
      );
    }
    if (latitude !== null && longitude !== null &&
        (latitude < -90 || latitude > 90 || longitude < -180 || longitude > 180)) {
      throw new ValidationError(
        ReasonCode.COORDINATES_OUT_OF_RANGE,
        `Coordinates out of range: ${latitude}, ${longitude}`
      );
    }

    return Object.freeze({
      date: candidate.date,
      year,
      operator: candidate.operator,
      aircraft_type: candidate.aircraft_type,
      fatalities,
      damage_level: damageLevel,
      latitude,
      longitude,
      location: candidate.location,
      source_id: Object.freeze({ ...candidate.source_id })
    });
  }
}
