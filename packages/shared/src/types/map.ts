export interface Point {
	readonly x: number;
	readonly y: number;
}

export interface PathSegment {
	path: Point[];
	rally?: Point | null; // one-time buff/assist spot for this stretch
}

// Flat lists are a single implicit segment without a rally point
export type RawPath = Point[] | PathSegment[];

export interface MapIds {
	startLocationId: number; // where the run begins (town/outpost)
	destinationZoneId: number; // explorable zone the path belongs to
}

export interface MapDefinition {
	name: string;
	region: string;
	ids: MapIds;
	outpostPath: Point[];
	path: RawPath;
}

export interface PathLeg {
	index: number;
	from: Point;
	to: Point;
	distance: number;
}

export interface PathDistances {
	legs: PathLeg[];
	totalDistance: number;
	minLeg: PathLeg | null;
	maxLeg: PathLeg | null;
	averageLeg: number;
}
