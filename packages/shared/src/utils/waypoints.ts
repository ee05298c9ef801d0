import type { PathDistances, PathLeg, PathSegment, Point, RawPath } from '../types/map';
import { PointSchema } from '../schema/mapFile';
import { distance } from './geometry';

export interface FlattenResult {
  flatPath: Point[];
  rallyPoints: Point[];
  warnings: string[];
}

export function parsePoint(value: unknown): Point | null {
  const parsed = PointSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSegmentEntry(value: unknown): value is Record<string, unknown> {
  return isRecord(value) && parsePoint(value) === null;
}

/**
 * A raw path is segmented when it is a non-empty list made only of
 * segment objects. Anything else is treated as a flat point list.
 */
export function isSegmentedPath(raw: unknown): raw is Record<string, unknown>[] {
  return Array.isArray(raw) && raw.length > 0 && raw.every(isSegmentEntry);
}

function collectPoints(values: unknown[], label: string, warnings: string[]): Point[] {
  const points: Point[] = [];
  values.forEach((value, j) => {
    const p = parsePoint(value);
    if (p) {
      points.push(p);
    } else {
      warnings.push(`${label} waypoint ${j + 1} is not a point; skipped`);
    }
  });
  return points;
}

function segmentPoints(segment: Record<string, unknown>, index: number, warnings: string[]): Point[] {
  const path = segment.path;
  if (!Array.isArray(path)) {
    warnings.push(`Segment ${index + 1} has no usable "path" list; contributes no waypoints`);
    return [];
  }
  return collectPoints(path, `Segment ${index + 1}`, warnings);
}

/**
 * Merge authored path data into one traversal order plus its rally points.
 * Malformed entries are reported in `warnings` and dropped; the merge never throws.
 */
export function flattenPath(raw: unknown): FlattenResult {
  const warnings: string[] = [];

  if (!Array.isArray(raw)) {
    warnings.push('Path data is not a list; no waypoints loaded');
    return { flatPath: [], rallyPoints: [], warnings };
  }

  if (!isSegmentedPath(raw)) {
    return { flatPath: collectPoints(raw, 'Path', warnings), rallyPoints: [], warnings };
  }

  const flatPath: Point[] = [];
  const rallyPoints: Point[] = [];
  raw.forEach((segment, i) => {
    flatPath.push(...segmentPoints(segment, i, warnings));

    if (segment.rally === undefined || segment.rally === null) return;
    const rally = parsePoint(segment.rally);
    if (rally) {
      rallyPoints.push(rally);
    } else {
      warnings.push(`Segment ${i + 1} rally point is not a point; ignored`);
    }
  });

  return { flatPath, rallyPoints, warnings };
}

/** Typed copy of authored path data with malformed entries dropped. */
export function normalizePath(raw: unknown): RawPath {
  if (!isSegmentedPath(raw)) return flattenPath(raw).flatPath;
  return raw.map((segment, i): PathSegment => ({
    path: segmentPoints(segment, i, []),
    rally: parsePoint(segment.rally),
  }));
}

/** Waypoints per segment, as they end up in the flattened path. */
export function segmentPointCounts(raw: unknown): number[] {
  if (!isSegmentedPath(raw)) {
    const { flatPath } = flattenPath(raw);
    return flatPath.length > 0 ? [flatPath.length] : [];
  }
  return raw.map((segment, i) => segmentPoints(segment, i, []).length);
}

/** Flat-path index of the first waypoint of `segmentIdx`; 0 for unsegmented paths. */
export function segmentBaseIndex(raw: unknown, segmentIdx: number): number {
  if (!isSegmentedPath(raw)) return 0;
  const counts = segmentPointCounts(raw);
  let total = 0;
  for (let k = 0; k < Math.min(segmentIdx, counts.length); k++) {
    total += counts[k];
  }
  return total;
}

export function computePathDistances(points: readonly Point[]): PathDistances {
  const legs: PathLeg[] = [];
  for (let i = 0; i < points.length - 1; i++) {
    legs.push({ index: i, from: points[i], to: points[i + 1], distance: distance(points[i], points[i + 1]) });
  }

  let minLeg: PathLeg | null = null;
  let maxLeg: PathLeg | null = null;
  let totalDistance = 0;
  for (const leg of legs) {
    totalDistance += leg.distance;
    if (!minLeg || leg.distance < minLeg.distance) minLeg = leg;
    if (!maxLeg || leg.distance > maxLeg.distance) maxLeg = leg;
  }

  return {
    legs,
    totalDistance,
    minLeg,
    maxLeg,
    averageLeg: legs.length > 0 ? totalDistance / legs.length : 0,
  };
}
