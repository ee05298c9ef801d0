export interface StateOptions {
	execute?: (now: number) => void;
	exitCondition?: () => boolean;
	runOnce?: boolean; // body runs at most once per entry
	transitionDelayMs?: number; // minimum dwell before an exit is honored
}

export interface FsmState {
	kind: 'state';
	name: string;
	execute: ((now: number) => void) | null;
	exitCondition: () => boolean;
	runOnce: boolean;
	transitionDelayMs: number;
}

export interface FsmSubroutine {
	kind: 'subroutine';
	name: string;
	condition: () => boolean;
	subFsm: StateMachine;
}

export type FsmEntry = FsmState | FsmSubroutine;

/**
 * Named-state sequencer. States run in list order and advance only when
 * their exit condition holds; subroutine entries hand ticks to a nested
 * machine. Everything is driven by `update(now)`, nothing blocks.
 */
export class StateMachine {
	readonly name: string;
	private readonly entries: FsmEntry[] = [];
	private cursor = 0;
	private paused = false;
	private started = false;
	private enteredAt: number | null = null;
	private executedThisEntry = false;
	private logTransitions = false;

	constructor(name: string) {
		this.name = name;
	}

	setLogBehavior(enabled: boolean): this {
		this.logTransitions = enabled;
		return this;
	}

	addState(name: string, options: StateOptions = {}): this {
		this.entries.push({
			kind: 'state',
			name,
			execute: options.execute ?? null,
			exitCondition: options.exitCondition ?? (() => true),
			runOnce: options.runOnce ?? true,
			transitionDelayMs: options.transitionDelayMs ?? 0,
		});
		return this;
	}

	addSubroutine(name: string, condition: () => boolean, subFsm: StateMachine): this {
		this.entries.push({ kind: 'subroutine', name, condition, subFsm });
		return this;
	}

	getStateCount(): number {
		return this.entries.length;
	}

	getStateNames(): string[] {
		return this.entries.map((e) => e.name);
	}

	getCursor(): number {
		return this.cursor;
	}

	getCurrentStateName(): string | null {
		if (!this.started || this.isFinished()) return null;
		return this.entries[this.cursor].name;
	}

	isStarted(): boolean {
		return this.started;
	}

	isPaused(): boolean {
		return this.paused;
	}

	isFinished(): boolean {
		return this.cursor >= this.entries.length;
	}

	start(): void {
		this.cursor = 0;
		this.paused = false;
		this.started = true;
		this.clearEntry();
		this.log(`▶️ started`);
	}

	stop(): void {
		if (!this.started) return;
		this.started = false;
		this.paused = false;
		this.clearEntry();
		this.resetSubroutines();
		this.log(`⏹️ stopped`);
	}

	reset(): void {
		this.cursor = 0;
		this.started = false;
		this.paused = false;
		this.clearEntry();
		this.resetSubroutines();
	}

	// Both are no-ops when already in the requested state
	pause(): void {
		if (this.paused) return;
		this.paused = true;
		this.log(`⏸️ paused`);
	}

	resume(): void {
		if (!this.paused) return;
		this.paused = false;
		this.log(`⏯️ resumed`);
	}

	update(now: number): void {
		if (!this.started || this.paused || this.isFinished()) return;

		const entry = this.entries[this.cursor];
		switch (entry.kind) {
			case 'state':
				this.runState(entry, now);
				break;
			case 'subroutine':
				this.runSubroutine(entry, now);
				break;
		}
	}

	private runState(state: FsmState, now: number): void {
		if (this.enteredAt === null) {
			this.enteredAt = now;
			this.executedThisEntry = false;
		}

		if (state.execute && !(state.runOnce && this.executedThisEntry)) {
			state.execute(now);
			this.executedThisEntry = true;
		}

		if (now - this.enteredAt < state.transitionDelayMs) return;
		if (state.exitCondition()) {
			this.advance();
		}
	}

	private runSubroutine(sub: FsmSubroutine, now: number): void {
		const child = sub.subFsm;
		const midRun = child.isStarted() && !child.isFinished();

		if (sub.condition() || midRun) {
			if (!child.isStarted()) child.start();
			child.update(now);
			return;
		}

		child.reset();
		this.advance();
	}

	private advance(): void {
		const from = this.entries[this.cursor].name;
		this.cursor++;
		this.clearEntry();
		const to = this.isFinished() ? '(finished)' : this.entries[this.cursor].name;
		this.log(`➡️ ${from} -> ${to}`);
	}

	private clearEntry(): void {
		this.enteredAt = null;
		this.executedThisEntry = false;
	}

	private resetSubroutines(): void {
		for (const entry of this.entries) {
			if (entry.kind === 'subroutine') entry.subFsm.reset();
		}
	}

	private log(message: string): void {
		if (this.logTransitions) console.log(`[FSM ${this.name}] ${message}`);
	}
}
