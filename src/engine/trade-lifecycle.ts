/**
 * Trade lifecycle: the allowed state transitions.
 *
 *   ORDER ──execute──▶ OPEN ──close──▶ CLOSED
 *     │
 *     └──cancel──▶ CANCELLED
 *
 * A market open creates the trade directly in OPEN.
 */

import { InvalidStateError } from "../shared/errors.js";
import type { TradeId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { TradeState } from "./types.js";

export type TradeTransition = "execute" | "close" | "cancel" | "update_stops";

const ALLOWED: Readonly<Record<TradeTransition, readonly TradeState[]>> = {
	execute: [TradeState.Order],
	close: [TradeState.Open],
	cancel: [TradeState.Order],
	update_stops: [TradeState.Order, TradeState.Open],
};

const TARGET: Readonly<Record<TradeTransition, TradeState | null>> = {
	execute: TradeState.Open,
	close: TradeState.Closed,
	cancel: TradeState.Cancelled,
	update_stops: null,
};

export function isTerminal(state: TradeState): boolean {
	return state === TradeState.Closed || state === TradeState.Cancelled;
}

/**
 * Checks `transition` against the trade's current state.
 * @returns Ok with the state after the transition (unchanged for stop updates)
 */
export function checkTransition(
	id: TradeId,
	from: TradeState,
	transition: TradeTransition,
): Result<TradeState, InvalidStateError> {
	if (!ALLOWED[transition].includes(from)) {
		return err(
			new InvalidStateError(`Trade ${id} cannot ${transition.replace("_", " ")} from ${from}`, {
				tradeId: id,
				from,
				transition,
			}),
		);
	}
	return ok(TARGET[transition] ?? from);
}
