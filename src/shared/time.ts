/**
 * Time utilities: injectable clock for deterministic testing.
 *
 * Ledger code uses Clock.now() instead of Date.now() directly, so tests can
 * age price proofs and accrue funding without monkey-patching globals.
 */

/** Injectable time source -- all ledger code depends on this instead of `Date.now()`. */
export interface Clock {
	now(): number;
}

/** Production clock backed by `Date.now()`. */
export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Controllable clock for deterministic testing -- advance time manually with `advance()`. */
export class FakeClock implements Clock {
	private time: number;

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	advance(ms: number): void {
		this.time += ms;
	}

	set(ms: number): void {
		this.time = ms;
	}
}

/** Whole seconds since the epoch, the unit proofs and trades are stamped in. */
export function nowSeconds(clock: Clock): number {
	return Math.floor(clock.now() / 1_000);
}
