/**
 * Relayer: submits traders' signed calls to the position engine.
 *
 * A call is accepted once: before its deadline, with the trader's next
 * nonce, and with a signature that recovers to the trader. Signature
 * recovery is the only asynchronous step, so the nonce is checked again
 * after it; the nonce then advances in the same synchronous step as a
 * successful dispatch.
 */

import type { PositionEngine } from "../engine/position-engine.js";
import type { Trade } from "../engine/types.js";
import { type TypedDataDomain, verifyTypedSignature } from "../lib/ethereum/index.js";
import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import type { PriceProof } from "../oracle/types.js";
import {
	AuthorizationError,
	ErrorCode,
	type LedgerError,
	ParameterError,
} from "../shared/errors.js";
import { type AccountId, accountId } from "../shared/identifiers.js";
import { type Result, err } from "../shared/result.js";
import { type Clock, SystemClock, nowSeconds } from "../shared/time.js";
import {
	DEFAULT_RELAY_DOMAIN,
	DelegatedAction,
	type DelegatedCall,
	type DelegatedRequest,
	decodeRequest,
	delegatedCallTypedData,
} from "./delegated-call.js";

export interface RelayerOptions {
	readonly engine: PositionEngine;
	/** Account holding the relayer role on the engine's access table */
	readonly identity: AccountId;
	readonly domain?: TypedDataDomain;
	readonly clock?: Clock;
	readonly logger?: Logger;
}

export class Relayer {
	private readonly nonces = new Map<AccountId, bigint>();
	private readonly engine: PositionEngine;
	private readonly identity: AccountId;
	private readonly domain: TypedDataDomain;
	private readonly clock: Clock;
	private readonly logger: Logger;

	constructor(options: RelayerOptions) {
		this.engine = options.engine;
		this.identity = options.identity;
		this.domain = options.domain ?? DEFAULT_RELAY_DOMAIN;
		this.clock = options.clock ?? SystemClock;
		this.logger = (options.logger ?? silentLogger()).child({ component: "relayer" });
	}

	/** Nonce the trader's next call must carry; starts at 0. */
	nextNonce(trader: string): bigint {
		return this.nonces.get(accountId(trader)) ?? 0n;
	}

	/**
	 * Verifies and dispatches a signed call. `proof` is required for
	 * `openMarket` and `closeMarket`.
	 */
	async relay(
		call: DelegatedCall,
		signature: string,
		proof?: PriceProof,
	): Promise<Result<Trade, LedgerError>> {
		const trader = accountId(call.trader);

		const pre = this.precheck(call, trader);
		if (pre) return this.reject(call, pre);
		const request = decodeRequest(call);
		if (!request.ok) return this.reject(call, request.error);

		const valid = await verifyTypedSignature(call.trader, delegatedCallTypedData(this.domain, call), signature);
		if (!valid) {
			return this.reject(
				call,
				new AuthorizationError("Signature does not match trader", ErrorCode.BadSignature, {
					trader,
				}),
			);
		}

		// Another call may have used this nonce while the signature was checked.
		const post = this.precheck(call, trader);
		if (post) return this.reject(call, post);

		const result = this.dispatch(trader, request.value, proof);
		if (!result.ok) return this.reject(call, result.error);

		this.nonces.set(trader, call.nonce + 1n);
		this.logger.info({ trader, action: call.action, nonce: call.nonce, tradeId: result.value.id }, "Call relayed");
		return result;
	}

	// ── Internal ───────────────────────────────────────────────────

	private precheck(call: DelegatedCall, trader: AccountId): LedgerError | null {
		const nowSec = BigInt(nowSeconds(this.clock));
		if (call.deadline < nowSec) {
			return new AuthorizationError("Delegated call has expired", ErrorCode.CallExpired, {
				trader,
				deadline: call.deadline.toString(),
				nowSec: nowSec.toString(),
			});
		}
		const expected = this.nextNonce(trader);
		if (call.nonce !== expected) {
			return new AuthorizationError("Delegated call nonce is not the next one", ErrorCode.BadNonce, {
				trader,
				nonce: call.nonce.toString(),
				expected: expected.toString(),
			});
		}
		return null;
	}

	private dispatch(
		trader: AccountId,
		request: DelegatedRequest,
		proof: PriceProof | undefined,
	): Result<Trade, LedgerError> {
		const session = this.engine.onBehalfOf(this.identity, trader);
		if (!session.ok) return session;
		const s = session.value;

		switch (request.action) {
			case DelegatedAction.OpenLimit:
				return s.openLimit(request.params);
			case DelegatedAction.Cancel:
				return s.cancel(request.params.id);
			case DelegatedAction.UpdateStops:
				return s.updateStops(request.params.id, request.params);
			case DelegatedAction.OpenMarket:
				if (!proof) return err(missingProof(request.action));
				return s.openMarket(request.params, proof);
			case DelegatedAction.CloseMarket:
				if (!proof) return err(missingProof(request.action));
				return s.closeMarket(request.params.id, proof);
		}
	}

	private reject(call: DelegatedCall, error: LedgerError): Result<Trade, LedgerError> {
		this.logger.warn(
			{ trader: call.trader, action: call.action, nonce: call.nonce, code: error.code },
			"Relay rejected",
		);
		return err(error);
	}
}

function missingProof(action: DelegatedAction): ParameterError {
	return new ParameterError(`${action} needs a price proof`, ErrorCode.ProofMalformed, { action });
}
