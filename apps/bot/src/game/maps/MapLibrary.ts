import fs from 'fs/promises';
import path from 'path';
import type { MapDefinition, Point } from '@waymark/shared';
import { MapFileSchema, flattenPath, isSegmentedPath, normalizePath, roundPoint, segmentPointCounts } from '@waymark/shared';

const MAP_EXTENSION = '.json';
const RALLY_PREVIEW_COUNT = 5;

export class MapLoadError extends Error {
	constructor(
		message: string,
		readonly filePath: string
	) {
		super(message);
		this.name = 'MapLoadError';
	}
}

export interface LoadedMap {
	definition: MapDefinition;
	flatPath: Point[];
	rallyPoints: Point[];
	warnings: string[];
}

export interface MapStats {
	region: string;
	mapName: string;
	startLocationId: number;
	destinationZoneId: number;
	segments: number;
	segmentWaypointCounts: number[];
	explorableWaypointTotal: number;
	outpostWaypointTotal: number;
	rallyCount: number;
	rallyPreview: Point[];
}

/** Map files live at `<root>/<region>/<map>.json`. */
export class MapLibrary {
	readonly rootDir: string;

	constructor(rootDir: string) {
		this.rootDir = path.resolve(rootDir);
	}

	async listRegions(): Promise<string[]> {
		const entries = await this.readDir(this.rootDir);
		return entries
			.filter((e) => e.isDirectory())
			.map((e) => e.name)
			.sort();
	}

	async listMaps(region: string): Promise<string[]> {
		const entries = await this.readDir(path.join(this.rootDir, region));
		return entries
			.filter((e) => e.isFile() && e.name.endsWith(MAP_EXTENSION))
			.map((e) => path.basename(e.name, MAP_EXTENSION))
			.sort();
	}

	mapPath(region: string, name: string): string {
		return path.join(this.rootDir, region, `${name}${MAP_EXTENSION}`);
	}

	async load(region: string, name: string): Promise<LoadedMap> {
		const filePath = this.mapPath(region, name);

		let text: string;
		try {
			text = await fs.readFile(filePath, 'utf-8');
		} catch (err) {
			throw new MapLoadError(`Map file not readable: ${describe(err)}`, filePath);
		}

		let json: unknown;
		try {
			json = JSON.parse(text);
		} catch (err) {
			throw new MapLoadError(`Map file is not valid JSON: ${describe(err)}`, filePath);
		}

		const parsed = MapFileSchema.safeParse(json);
		if (!parsed.success) {
			const issue = parsed.error.issues[0];
			const where = issue && issue.path.length ? ` at ${issue.path.join('.')}` : '';
			throw new MapLoadError(`Map file failed validation${where}: ${issue?.message ?? 'invalid'}`, filePath);
		}

		const file = parsed.data;
		const { flatPath, rallyPoints, warnings } = flattenPath(file.path);
		for (const warning of warnings) {
			console.warn(`⚠️ [${region}/${name}] ${warning}`);
		}

		return {
			definition: {
				name: file.name ?? name,
				region,
				ids: file.ids,
				outpostPath: file.outpostPath,
				path: normalizePath(file.path),
			},
			flatPath,
			rallyPoints,
			warnings,
		};
	}

	private async readDir(dir: string) {
		try {
			return await fs.readdir(dir, { withFileTypes: true });
		} catch (err) {
			throw new MapLoadError(`Map directory not readable: ${describe(err)}`, dir);
		}
	}
}

export function computeMapStats(loaded: LoadedMap): MapStats {
	const { definition } = loaded;
	const counts = segmentPointCounts(definition.path);

	return {
		region: definition.region,
		mapName: definition.name,
		startLocationId: definition.ids.startLocationId,
		destinationZoneId: definition.ids.destinationZoneId,
		segments: isSegmentedPath(definition.path) ? definition.path.length : counts.length,
		segmentWaypointCounts: counts,
		explorableWaypointTotal: loaded.flatPath.length,
		outpostWaypointTotal: definition.outpostPath.length,
		rallyCount: loaded.rallyPoints.length,
		rallyPreview: loaded.rallyPoints.slice(0, RALLY_PREVIEW_COUNT).map(roundPoint),
	};
}

function describe(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
