export const TICK_RATE = 100; // ms per bot tick
export const ARRIVAL_TOLERANCE = 250; // units; waypoint counts as reached inside this radius
export const DEFAULT_AGGRO_RANGE = 2500; // units; hostiles closer than this are engaged

// Enemy scan throttling
export const SCAN_INTERVAL_MS = 500;
export const SCAN_MOVE_RATIO = 0.75; // re-scan after moving this fraction of the aggro range

// Fluid pathing: flow through a waypoint this far out when the area is clear
export const EARLY_ADVANCE_RATIO = 1.5;
// While fighting, treat the waypoint as reached inside this radius
export const COMBAT_REACH_RATIO = 1.25;

// Rally points (one-time buff/assist spots between segments)
export const RALLY_RADIUS = 2500;
export const RALLY_DEBOUNCE_MS = 5000;

export const STATS_INTERVAL_MS = 30000; // command counters are logged and reset this often

// Mission dwell times before a state may exit
export const LOAD_DWELL_MS = 1000;
export const BUFF_DWELL_MS = 5000;
