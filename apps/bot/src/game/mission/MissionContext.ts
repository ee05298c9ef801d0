import type { ActionPort, MovementPort, SensingPort, WorldPort } from '@waymark/shared';
import type { LoadedMap } from '../maps/MapLibrary';
import { PathCursor } from '../path/PathCursor';
import { RunStats } from '../state/RunStats';
import { PathAndCombatController, type ControllerOptions } from '../systems/PathAndCombatController';
import { ProximityTrigger } from '../systems/ProximityTrigger';

export interface MissionPorts {
	movement: MovementPort;
	sensing: SensingPort;
	actions: ActionPort;
	world: WorldPort;
}

/** Everything one mission run reads or mutates, built once per loaded map. */
export interface MissionContext {
	readonly ports: MissionPorts;
	readonly map: LoadedMap;
	readonly outpostCursor: PathCursor;
	readonly explorableCursor: PathCursor;
	readonly controller: PathAndCombatController;
	readonly rallyTrigger: ProximityTrigger;
	readonly stats: RunStats;
	combatStarted: boolean;
}

export interface MissionContextOptions {
	controller?: ControllerOptions;
	rallyDebounceMs?: number;
	stats?: RunStats; // carry totals over from a previous session
}

export function createMissionContext(
	ports: MissionPorts,
	map: LoadedMap,
	options: MissionContextOptions = {}
): MissionContext {
	const explorableCursor = new PathCursor(map.flatPath);
	const controller = new PathAndCombatController(
		explorableCursor,
		{ movement: ports.movement, sensing: ports.sensing, actions: ports.actions },
		options.controller
	);

	const rallyTrigger = new ProximityTrigger((point) => {
		console.log(`✨ Rally point (${Math.round(point.x)}, ${Math.round(point.y)}) reached, requesting buff`);
		ports.world.requestBuff();
	}, options.rallyDebounceMs);

	return {
		ports,
		map,
		outpostCursor: new PathCursor(map.definition.outpostPath),
		explorableCursor,
		controller,
		rallyTrigger,
		stats: options.stats ?? new RunStats(),
		combatStarted: false,
	};
}
