/**
 * Delegated calls: EIP-712 messages a trader signs so a relayer can act
 * for them.
 *
 * The signed message carries the action name, its parameters as a JSON
 * string, a per-trader nonce and a deadline. Price proofs are not part of
 * the signed message: the relayer attaches a fresh one at submission.
 */

import type { OpenLimitParams, OpenMarketParams, StopsUpdate } from "../engine/types.js";
import type {
	EthAddress,
	EthSigner,
	SignTypedDataParams,
	TypedDataDomain,
} from "../lib/ethereum/index.js";
import { bigintLike, validate, z } from "../lib/validation/index.js";
import { ErrorCode, type LedgerError, ParameterError } from "../shared/errors.js";
import { type TradeId, assetId, tradeId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { TradeSide } from "../shared/trade-side.js";

export const DelegatedAction = {
	OpenLimit: "openLimit",
	OpenMarket: "openMarket",
	Cancel: "cancel",
	UpdateStops: "updateStops",
	CloseMarket: "closeMarket",
} as const;

export type DelegatedAction = (typeof DelegatedAction)[keyof typeof DelegatedAction];

/** The signed message, as it travels from the trader to the relayer. */
export interface DelegatedCall {
	readonly trader: EthAddress;
	readonly action: DelegatedAction;
	/** JSON-encoded parameters; bigints are decimal strings */
	readonly params: string;
	readonly nonce: bigint;
	/** Seconds since the epoch after which the call is refused */
	readonly deadline: bigint;
}

export interface SignedDelegatedCall {
	readonly call: DelegatedCall;
	readonly signature: string;
}

/** Decoded parameters, discriminated by action. */
export type DelegatedRequest =
	| { readonly action: typeof DelegatedAction.OpenLimit; readonly params: OpenLimitParams }
	| { readonly action: typeof DelegatedAction.OpenMarket; readonly params: OpenMarketParams }
	| { readonly action: typeof DelegatedAction.Cancel; readonly params: { readonly id: TradeId } }
	| {
			readonly action: typeof DelegatedAction.UpdateStops;
			readonly params: { readonly id: TradeId } & StopsUpdate;
	  }
	| { readonly action: typeof DelegatedAction.CloseMarket; readonly params: { readonly id: TradeId } };

export const DEFAULT_RELAY_DOMAIN: TypedDataDomain = {
	name: "LeverageLedger",
	version: "1",
	chainId: 1,
};

export const DELEGATED_CALL_TYPES = {
	DelegatedCall: [
		{ name: "trader", type: "address" },
		{ name: "action", type: "string" },
		{ name: "params", type: "string" },
		{ name: "nonce", type: "uint256" },
		{ name: "deadline", type: "uint256" },
	],
} as const;

/** Typed-data envelope signed by the trader and checked by the relayer. */
export function delegatedCallTypedData(
	domain: TypedDataDomain,
	call: DelegatedCall,
): SignTypedDataParams {
	return {
		domain,
		types: DELEGATED_CALL_TYPES,
		primaryType: "DelegatedCall",
		message: {
			trader: call.trader,
			action: call.action,
			params: call.params,
			nonce: call.nonce,
			deadline: call.deadline,
		},
	};
}

// ── Parameters ──────────────────────────────────────────────────────

const tradeIdSchema = z
	.number()
	.int()
	.positive()
	.refine((n) => Number.isSafeInteger(n), "must be a safe integer")
	.transform((n) => tradeId(n));

const openMarketSchema = z
	.object({
		asset: z.string().trim().min(1).transform((s) => assetId(s)),
		side: z.enum([TradeSide.Long, TradeSide.Short]),
		lots: bigintLike,
		leverage: z.number().int(),
		stopLoss: bigintLike.optional(),
		takeProfit: bigintLike.optional(),
	})
	.strict();

const openLimitSchema = openMarketSchema.extend({ targetPrice: bigintLike }).strict();
const byIdSchema = z.object({ id: tradeIdSchema }).strict();
const updateStopsSchema = byIdSchema.extend({ stopLoss: bigintLike, takeProfit: bigintLike }).strict();

/** Encodes parameters for signing; bigints become decimal strings. */
export function encodeParams(params: object): string {
	return JSON.stringify(params, (_key, value: unknown) =>
		typeof value === "bigint" ? value.toString() : value,
	);
}

/**
 * Parses a call's JSON parameters against its action's schema.
 * @returns Err(VALIDATION_FAILED) for bad JSON or a shape mismatch
 */
export function decodeRequest(call: DelegatedCall): Result<DelegatedRequest, LedgerError> {
	let raw: unknown;
	try {
		raw = JSON.parse(call.params);
	} catch (e: unknown) {
		return err(
			new ParameterError("Delegated call parameters are not valid JSON", ErrorCode.ValidationFailed, {
				action: call.action,
				cause: e instanceof Error ? e.message : String(e),
			}),
		);
	}

	switch (call.action) {
		case DelegatedAction.OpenLimit: {
			const params = validate(openLimitSchema, raw);
			return params.ok ? ok({ action: call.action, params: params.value }) : params;
		}
		case DelegatedAction.OpenMarket: {
			const params = validate(openMarketSchema, raw);
			return params.ok ? ok({ action: call.action, params: params.value }) : params;
		}
		case DelegatedAction.Cancel: {
			const params = validate(byIdSchema, raw);
			return params.ok ? ok({ action: call.action, params: params.value }) : params;
		}
		case DelegatedAction.UpdateStops: {
			const params = validate(updateStopsSchema, raw);
			return params.ok ? ok({ action: call.action, params: params.value }) : params;
		}
		case DelegatedAction.CloseMarket: {
			const params = validate(byIdSchema, raw);
			return params.ok ? ok({ action: call.action, params: params.value }) : params;
		}
	}
}

// ── Signing ─────────────────────────────────────────────────────────

export interface DelegatedCallDraft {
	readonly request: DelegatedRequest;
	readonly nonce: bigint;
	readonly deadline: bigint;
}

/**
 * Builds and signs a delegated call for the signer's own address.
 * @example
 * const signed = await signDelegatedCall(signer, DEFAULT_RELAY_DOMAIN, {
 *   request: { action: "cancel", params: { id } },
 *   nonce: relayer.nextNonce(trader),
 *   deadline: BigInt(nowSec + 300),
 * });
 */
export async function signDelegatedCall(
	signer: EthSigner,
	domain: TypedDataDomain,
	draft: DelegatedCallDraft,
): Promise<SignedDelegatedCall> {
	const call: DelegatedCall = {
		trader: signer.address,
		action: draft.request.action,
		params: encodeParams(draft.request.params),
		nonce: draft.nonce,
		deadline: draft.deadline,
	};
	const signature = await signer.signTypedData(delegatedCallTypedData(domain, call));
	return { call, signature };
}
