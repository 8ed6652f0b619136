import { EventEmitter } from "eventemitter3";

/**
 * Typed event map -- keys are event names, values are single-payload handlers.
 * Example: { tradeClosed: (e: TradeClosedEvent) => void }
 */
export type EventMap = { [event: string]: (payload: never) => void };

/**
 * Type-safe event emitter over eventemitter3. Handlers run synchronously in
 * registration order, after the state change they describe has been applied.
 *
 * @example
 * ```ts
 * const events = new TypedEmitter<LedgerEvents>();
 * const off = events.on("settled", (e) => console.log(e.pnl));
 * off();
 * ```
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly ee = new EventEmitter();

	/**
	 * Registers an event handler.
	 * @returns Function that removes the handler
	 */
	on<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): () => void {
		const fn = handler as (...args: unknown[]) => void;
		this.ee.on(event, fn);
		return () => {
			this.ee.off(event, fn);
		};
	}

	emit<K extends keyof TEvents & string>(event: K, payload: Parameters<TEvents[K]>[0]): boolean {
		return this.ee.emit(event, payload);
	}
}
