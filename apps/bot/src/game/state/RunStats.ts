export interface RunStatsSnapshot {
	runsAttempted: number;
	runsCompleted: number;
	successRate: number; // percent, 0 when nothing was attempted
	lapCount: number;
	minLapMs: number | null;
	maxLapMs: number | null;
	averageLapMs: number | null;
	lastLapMs: number | null;
}

export interface PersistedRunStats {
	runsAttempted: number;
	runsCompleted: number;
	laps: number[];
}

/** Attempt/completion counters and lap times across bot runs. */
export class RunStats {
	private attempted = 0;
	private completed = 0;
	private readonly laps: number[] = [];
	private runStartedAt: number | null = null;

	beginRun(now: number): void {
		this.attempted++;
		this.runStartedAt = now;
	}

	/** Returns the lap time, or null when no run was in progress. */
	completeRun(now: number): number | null {
		if (this.runStartedAt === null) return null;
		const lap = Math.max(0, now - this.runStartedAt);
		this.laps.push(lap);
		this.completed++;
		this.runStartedAt = null;
		return lap;
	}

	// An abandoned run stays counted as attempted
	abandonRun(): void {
		this.runStartedAt = null;
	}

	get inProgress(): boolean {
		return this.runStartedAt !== null;
	}

	get runsAttempted(): number {
		return this.attempted;
	}

	get runsCompleted(): number {
		return this.completed;
	}

	get successRate(): number {
		if (this.attempted === 0) return 0;
		return (this.completed / this.attempted) * 100;
	}

	get lapHistory(): readonly number[] {
		return [...this.laps];
	}

	// Lap history is unbounded across sessions
	get minLapMs(): number | null {
		if (!this.laps.length) return null;
		return this.laps.reduce((min, lap) => (lap < min ? lap : min), this.laps[0]);
	}

	get maxLapMs(): number | null {
		if (!this.laps.length) return null;
		return this.laps.reduce((max, lap) => (lap > max ? lap : max), this.laps[0]);
	}

	get averageLapMs(): number | null {
		if (!this.laps.length) return null;
		return this.laps.reduce((sum, lap) => sum + lap, 0) / this.laps.length;
	}

	snapshot(): RunStatsSnapshot {
		return {
			runsAttempted: this.attempted,
			runsCompleted: this.completed,
			successRate: this.successRate,
			lapCount: this.laps.length,
			minLapMs: this.minLapMs,
			maxLapMs: this.maxLapMs,
			averageLapMs: this.averageLapMs,
			lastLapMs: this.laps.length ? this.laps[this.laps.length - 1] : null,
		};
	}

	toPersisted(): PersistedRunStats {
		return { runsAttempted: this.attempted, runsCompleted: this.completed, laps: [...this.laps] };
	}

	static fromPersisted(data: PersistedRunStats): RunStats {
		const stats = new RunStats();
		stats.attempted = data.runsAttempted;
		stats.completed = Math.min(data.runsCompleted, data.runsAttempted);
		for (const lap of data.laps) stats.laps.push(lap);
		return stats;
	}
}
