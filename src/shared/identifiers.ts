/**
 * Domain primitive identifiers: branded types for compile-time safety.
 *
 * Each identifier wraps a primitive with a unique brand, preventing accidental
 * mixing (e.g., passing an AssetId where an AccountId is expected).
 */

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ── Identifier types ─────────────────────────────────────────────────

/** Account holding collateral, owning trades, or acting in a role. */
export type AccountId = Brand<string, "AccountId">;
/** Tradable asset / price pair as listed in the asset registry. */
export type AssetId = Brand<string, "AssetId">;
/** Sequential trade identifier assigned by the trade book (starts at 1). */
export type TradeId = Brand<number, "TradeId">;

// ── Factory functions with validation ────────────────────────────────

function createBrandedId<B extends string>(value: string, label: B): Brand<string, B> {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new Error(`${label} cannot be empty`);
	}
	return trimmed as Brand<string, B>;
}

/**
 * Create a validated AccountId. Hex addresses are lowercased so that the same
 * wallet maps to one account regardless of checksum casing.
 */
export function accountId(value: string): AccountId {
	const id = createBrandedId(value, "AccountId");
	return (id.startsWith("0x") ? id.toLowerCase() : id) as AccountId;
}

/** Create a validated AssetId from a raw string. Throws if empty. */
export function assetId(value: string): AssetId {
	return createBrandedId(value, "AssetId");
}

/** Create a validated TradeId. Throws unless a positive safe integer. */
export function tradeId(value: number): TradeId {
	if (!Number.isSafeInteger(value) || value <= 0) {
		throw new Error(`TradeId must be a positive integer, got: ${value}`);
	}
	return value as TradeId;
}

/** Extract the raw string from a branded string identifier. */
export function idToString(id: AccountId | AssetId): string {
	return id as string;
}
