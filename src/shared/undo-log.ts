/**
 * UndoLog: inverse-mutation journal for all-or-nothing operations.
 *
 * Stateful components record an undo closure before every write and defer
 * their side effects (event emission) until commit. A failing operation rolls
 * the log back; a batch rewinds a skipped item to the mark taken before it,
 * dropping that item's deferred effects with its writes.
 */

import type { Result } from "./result.js";

type Undo = () => void;
type Effect = () => void;

type Entry = { readonly kind: "undo"; readonly fn: Undo } | { readonly kind: "effect"; readonly fn: Effect };

/** Opaque savepoint returned by `mark()`. */
export type UndoMark = number & { readonly __undoMark: true };

export class UndoLog {
	private readonly entries: Entry[] = [];

	/** Record the inverse of a write that is about to happen. */
	record(undo: Undo): void {
		this.entries.push({ kind: "undo", fn: undo });
	}

	/** Queue a side effect to run only if the enclosing operation commits. */
	defer(effect: Effect): void {
		this.entries.push({ kind: "effect", fn: effect });
	}

	mark(): UndoMark {
		return this.entries.length as UndoMark;
	}

	/** Undo every write recorded after `mark`, newest first, and drop its effects. */
	rollbackTo(mark: UndoMark): void {
		while (this.entries.length > mark) {
			const entry = this.entries.pop();
			if (entry?.kind === "undo") entry.fn();
		}
	}

	rollback(): void {
		this.rollbackTo(0 as UndoMark);
	}

	/** Run deferred effects in order and clear the log. */
	commit(): void {
		const effects = this.entries.filter((e) => e.kind === "effect");
		this.entries.length = 0;
		for (const effect of effects) effect.fn();
	}

	get size(): number {
		return this.entries.length;
	}
}

/** A component whose writes can be journaled into an UndoLog. */
export interface Journaled {
	attachJournal(log: UndoLog | null): void;
}

/** Holder for the log of the operation currently in flight, shared by one engine. */
export interface ActiveLog {
	current: UndoLog | null;
}

/**
 * Runs `fn` with every participant journaling into one log. If `fn` returns an
 * error or throws, all writes are undone and deferred effects dropped;
 * otherwise effects run after the participants are detached. Nested calls
 * join the outer log and leave commit or rollback to it.
 */
export function runAtomic<T, E>(
	participants: readonly Journaled[],
	active: ActiveLog,
	fn: (log: UndoLog) => Result<T, E>,
): Result<T, E> {
	if (active.current) {
		return fn(active.current);
	}

	const log = new UndoLog();
	active.current = log;
	for (const p of participants) p.attachJournal(log);
	let result: Result<T, E>;
	try {
		result = fn(log);
		if (!result.ok) log.rollback();
	} catch (error: unknown) {
		log.rollback();
		throw error;
	} finally {
		for (const p of participants) p.attachJournal(null);
		active.current = null;
	}
	log.commit();
	return result;
}
