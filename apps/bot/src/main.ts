import path from 'path';
import { BotLoop } from './game/BotLoop';
import { MapLibrary, MapLoadError, computeMapStats } from './game/maps/MapLibrary';
import { createMissionContext } from './game/mission/MissionContext';
import { MissionOrchestrator } from './game/mission/MissionOrchestrator';
import { RunStatsStore } from './game/state/RunStatsStore';
import { SimulatedWorld } from './sim/SimulatedWorld';

const MAPS_DIR = process.env.WAYMARK_MAPS_DIR ?? path.join(__dirname, '../maps');
const REGION = process.env.WAYMARK_REGION ?? 'frontier';
const MAP = process.env.WAYMARK_MAP ?? 'ashen_ridge';

async function main() {
	const library = new MapLibrary(MAPS_DIR);
	const loaded = await library.load(REGION, MAP);
	const mapStats = computeMapStats(loaded);
	console.log(
		`🗺️ Loaded ${mapStats.region}/${mapStats.mapName}: ${mapStats.segments} segments, ` +
			`${mapStats.explorableWaypointTotal} waypoints, ${mapStats.rallyCount} rally points`
	);

	const { outpostPath, ids } = loaded.definition;
	const portalAt = outpostPath[outpostPath.length - 1] ?? { x: 0, y: 0 };
	const world = new SimulatedWorld({
		start: { x: 0, y: 0 },
		portal: { position: portalAt, zoneId: ids.destinationZoneId, spawn: loaded.flatPath[0] },
	});

	// Scatter a few hostiles near the middle of each leg
	for (let i = 1; i < loaded.flatPath.length; i += 3) {
		const a = loaded.flatPath[i - 1];
		const b = loaded.flatPath[i];
		world.addHostile({ x: (a.x + b.x) / 2 + 150, y: (a.y + b.y) / 2 + 150 });
	}

	const store = new RunStatsStore();
	const stats = (await store.load()) ?? undefined;
	const ctx = createMissionContext(
		{ movement: world, sensing: world, actions: world, world },
		loaded,
		{ controller: { logActions: true }, stats }
	);
	const orchestrator = new MissionOrchestrator(ctx, { logTransitions: true });

	const loop = new BotLoop(orchestrator, {
		host: world,
		onStopped: () => {
			store.save(ctx.stats).catch((err) => console.error('❌ Failed to save run stats:', err));
		},
	});

	process.on('SIGINT', () => {
		orchestrator.stop();
		loop.stop();
	});

	loop.start();
}

main().catch((err) => {
	if (err instanceof MapLoadError) {
		console.error(`❌ ${err.message} (${err.filePath})`);
	} else {
		console.error('Error:', err);
	}
	process.exit(1);
});
