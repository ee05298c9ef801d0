import fs from 'fs';
import path from 'path';
import type { Point } from '@waymark/shared';
import { computePathDistances } from '@waymark/shared';
import { MapLibrary, MapLoadError } from '../game/maps/MapLibrary';

const DEFAULT_MAPS_DIR = path.join(__dirname, '../../maps');

interface ReportLeg {
  index: number;
  from: Point;
  to: Point;
  distance: number;
}

export interface PathStats {
  waypoints: number;
  legs: ReportLeg[];
  totalDistance: number;
  minLeg: number | null;
  maxLeg: number | null;
  averageLeg: number;
}

// Top-level path figures describe the explorable path
export interface MapReport extends PathStats {
  region: string;
  map: string;
  rallyPoints: number;
  outpost: PathStats;
  warnings: string[];
  error?: string;
}

export interface ReportOptions {
  mapsDir: string;
  output: string | null;
}

const round2 = (n: number) => Math.round(n * 100) / 100;

export function summarizePath(points: readonly Point[]): PathStats {
  const dist = computePathDistances(points);
  return {
    waypoints: points.length,
    legs: dist.legs.map((leg) => ({ ...leg, distance: round2(leg.distance) })),
    totalDistance: round2(dist.totalDistance),
    minLeg: dist.minLeg ? round2(dist.minLeg.distance) : null,
    maxLeg: dist.maxLeg ? round2(dist.maxLeg.distance) : null,
    averageLeg: round2(dist.averageLeg),
  };
}

export function parseArgs(argv: string[]): ReportOptions {
  const options: ReportOptions = { mapsDir: DEFAULT_MAPS_DIR, output: null };
  const args = argv.slice(2);
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const value = args[i + 1];
    if ((arg === '--maps' || arg === '--output') && (value === undefined || value.startsWith('--'))) {
      throw new Error(`Missing value for ${arg}. Usage: pathReport [--maps DIR] [--output FILE]`);
    }
    if (arg === '--maps') {
      options.mapsDir = path.resolve(value);
      i++;
    } else if (arg === '--output') {
      options.output = path.resolve(value);
      i++;
    } else {
      throw new Error(`Unknown argument ${arg}. Usage: pathReport [--maps DIR] [--output FILE]`);
    }
  }
  return options;
}

export async function buildPathReport(library: MapLibrary): Promise<MapReport[]> {
  const reports: MapReport[] = [];

  for (const region of await library.listRegions()) {
    for (const map of await library.listMaps(region)) {
      try {
        const loaded = await library.load(region, map);
        reports.push({
          region,
          map,
          ...summarizePath(loaded.flatPath),
          rallyPoints: loaded.rallyPoints.length,
          outpost: summarizePath(loaded.definition.outpostPath),
          warnings: loaded.warnings,
        });
      } catch (err) {
        if (!(err instanceof MapLoadError)) throw err;
        reports.push({
          region,
          map,
          ...summarizePath([]),
          rallyPoints: 0,
          outpost: summarizePath([]),
          warnings: [],
          error: err.message,
        });
      }
    }
  }

  return reports;
}

export function formatSummary(report: MapReport): string {
  const name = `${report.region}/${report.map}`;
  if (report.error) return `❌ ${name}: ${report.error}`;
  const range = report.minLeg === null || report.maxLeg === null ? 'n/a' : `${report.minLeg}..${report.maxLeg}`;
  const warn = report.warnings.length ? `, ${report.warnings.length} warning(s)` : '';
  const { outpost } = report;
  const outpostPart = outpost.waypoints ? `; outpost ${outpost.waypoints} waypoints, total ${outpost.totalDistance}` : '';
  return `🗺️ ${name}: ${report.waypoints} waypoints, total ${report.totalDistance}, legs ${range}, avg ${report.averageLeg}${warn}${outpostPart}`;
}

async function runReport() {
  const options = parseArgs(process.argv);
  console.log(`Scanning maps in ${options.mapsDir}...`);

  const reports = await buildPathReport(new MapLibrary(options.mapsDir));
  for (const report of reports) {
    console.log(formatSummary(report));
  }

  if (options.output) {
    fs.mkdirSync(path.dirname(options.output), { recursive: true });
    fs.writeFileSync(options.output, JSON.stringify(reports, null, 2));
    console.log(`✓ Saved report for ${reports.length} maps to ${options.output}`);
  }
}

if (require.main === module) {
  runReport().catch((err) => {
    console.error('Error:', err);
    process.exit(1);
  });
}
