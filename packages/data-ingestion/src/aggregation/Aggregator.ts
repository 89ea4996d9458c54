import { compareKeys, foldText, UNKNOWN_KEY } from '@incident-atlas/shared';
import type { CanonicalRecord } from '@incident-atlas/types';
import { Dimension, type AggregationBucket, type AggregationTables } from '../types';

export interface AggregationOptions {
  dimensions: readonly Dimension[];
  gridResolution: number;
}

export interface BucketTotals {
  count: number;
  fatalitySum: number;
}

/**
 * Per-dimension bucket totals. Values are never mutated once built, so partials
 * can be shared between combine calls.
 */
export type PartialAggregate = ReadonlyMap<Dimension, ReadonlyMap<string, BucketTotals>>;

export const FATALITY_BINS: ReadonlyArray<{ key: string; max: number }> = [
  { key: '0', max: 0 },
  { key: '1-5', max: 5 },
  { key: '6-10', max: 10 },
  { key: '11-20', max: 20 },
  { key: '21-50', max: 50 },
  { key: '51-100', max: 100 },
  { key: '101+', max: Number.POSITIVE_INFINITY }
];

export const CROSS_KEY_SEPARATOR = '|';

// Absorbs float error such as 0.3 / 0.1 = 2.9999999999999996
const CELL_EPSILON = 1e-9;

function resolutionDecimals(resolution: number): number {
  const match = /\.(\d+)$/.exec(String(resolution));
  return Math.max(1, match ? match[1].length : 0);
}

/**
 * Grid cell of a coordinate pair, as "lat,lon" of the cell's south-west corner
 */
export function geographyKey(latitude: number, longitude: number, resolution: number): string {
  const decimals = resolutionDecimals(resolution);
  const snap = (value: number): string => {
    const cell = Math.floor(value / resolution + CELL_EPSILON) * resolution;
    return cell.toFixed(decimals);
  };
  return `${snap(latitude)},${snap(longitude)}`;
}

export function fatalityRangeKey(fatalities: number): string {
  const bin = FATALITY_BINS.find(candidate => fatalities <= candidate.max);
  return bin ? bin.key : UNKNOWN_KEY;
}

function foldedOrUnknown(value: string | null): string {
  return foldText(value) || UNKNOWN_KEY;
}

// Cross-tab key, e.g. "2020|minor"
function crossKey(row: string, column: string): string {
  return `${row}${CROSS_KEY_SEPARATOR}${column}`;
}

export function dimensionKey(record: CanonicalRecord, dimension: Dimension, gridResolution: number): string {
  switch (dimension) {
    case Dimension.YEAR:
      return String(record.year);
    case Dimension.OPERATOR:
      return foldedOrUnknown(record.operator);
    case Dimension.DAMAGE_LEVEL:
      return record.damage_level;
    case Dimension.GEOGRAPHY:
      return record.latitude === null || record.longitude === null
        ? UNKNOWN_KEY
        : geographyKey(record.latitude, record.longitude, gridResolution);
    case Dimension.AIRCRAFT_TYPE:
      return foldedOrUnknown(record.aircraft_type);
    case Dimension.LOCATION:
      return foldedOrUnknown(record.location);
    case Dimension.FATALITY_RANGE:
      return fatalityRangeKey(record.fatalities);
    case Dimension.YEAR_DAMAGE_LEVEL:
      return crossKey(String(record.year), record.damage_level);
    case Dimension.OPERATOR_DAMAGE_LEVEL:
      return crossKey(foldedOrUnknown(record.operator), record.damage_level);
  }
}

export function emptyAggregate(dimensions: readonly Dimension[]): PartialAggregate {
  return aggregate([], { dimensions, gridResolution: 1 });
}

/**
 * Fold a batch of records into a fresh partial aggregate
 */
export function aggregate(records: Iterable<CanonicalRecord>, options: AggregationOptions): PartialAggregate {
  const tables = new Map<Dimension, Map<string, BucketTotals>>();
  for (const dimension of options.dimensions) {
    tables.set(dimension, new Map());
  }

  for (const record of records) {
    for (const [dimension, buckets] of tables) {
      const key = dimensionKey(record, dimension, options.gridResolution);
      const current = buckets.get(key);
      buckets.set(key, {
        count: (current?.count ?? 0) + 1,
        fatalitySum: (current?.fatalitySum ?? 0) + record.fatalities
      });
    }
  }

  return tables;
}

/**
 * Associative, commutative merge with emptyAggregate as identity
 */
export function combineAggregates(left: PartialAggregate, right: PartialAggregate): PartialAggregate {
  const combined = new Map<Dimension, Map<string, BucketTotals>>();

  for (const source of [left, right]) {
    for (const [dimension, buckets] of source) {
      let target = combined.get(dimension);
      if (!target) {
        target = new Map();
        combined.set(dimension, target);
      }
      for (const [key, totals] of buckets) {
        const current = target.get(key);
        target.set(key, {
          count: (current?.count ?? 0) + totals.count,
          fatalitySum: (current?.fatalitySum ?? 0) + totals.fatalitySum
        });
      }
    }
  }

  return combined;
}

function compareBucketKeys(dimension: Dimension, a: string, b: string): number {
  if (a === b) return 0;
  if (a === UNKNOWN_KEY) return 1;
  if (b === UNKNOWN_KEY) return -1;

  if (dimension === Dimension.FATALITY_RANGE) {
    const order = (key: string): number => FATALITY_BINS.findIndex(bin => bin.key === key);
    return order(a) - order(b);
  }
  return compareKeys(a, b);
}

/**
 * Sorted bucket lists per dimension. Fatality ranges keep bin order; every other
 * dimension sorts by key. `unknown` always comes last.
 */
export function finalize(partial: PartialAggregate): AggregationTables {
  const tables: AggregationTables = {};

  for (const [dimension, buckets] of partial) {
    tables[dimension] = [...buckets.entries()]
      .sort(([a], [b]) => compareBucketKeys(dimension, a, b))
      .map(([key, totals]) => ({
        dimension,
        key,
        count: totals.count,
        fatalitySum: totals.fatalitySum
      }));
  }

  return tables;
}

export interface RankOptions {
  by: 'count' | 'fatalitySum';
  limit?: number;
  includeUnknown?: boolean;
}

/**
 * Top-N view of a finalized table, highest first, ties broken by key
 */
export function rankBuckets(buckets: readonly AggregationBucket[], options: RankOptions): AggregationBucket[] {
  const ranked = buckets
    .filter(bucket => options.includeUnknown || bucket.key !== UNKNOWN_KEY)
    .sort((a, b) => b[options.by] - a[options.by] || compareKeys(a.key, b.key));

  return options.limit === undefined ? ranked : ranked.slice(0, options.limit);
}
