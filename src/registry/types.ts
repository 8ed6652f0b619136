/**
 * Asset registry types: the engine's view of listed assets.
 */

import type { LedgerError } from "../shared/errors.js";
import type { AssetId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";

/** Converts lots into base quantity: `lots × numerator / denominator`. */
export interface LotRatio {
	readonly numerator: bigint;
	readonly denominator: bigint;
}

/**
 * Asset configuration lookup consumed by the position engine.
 * Every method fails UNKNOWN_ASSET for an asset that is not listed.
 */
export interface AssetRegistry {
	getLot(asset: AssetId): Result<LotRatio, LedgerError>;
	isMarketOpen(asset: AssetId): Result<boolean, LedgerError>;
	/** Half-spread in ×1e6 price units paid on entry and exit; 0 when the asset has none. */
	halfSpread(asset: AssetId): Result<bigint, LedgerError>;
	/** Signed funding per interval in ×1e6 price units; positive is a cost to the holder. */
	fundingRate(asset: AssetId): Result<bigint, LedgerError>;
}

/** Listing record accepted by InMemoryAssetRegistry. */
export interface AssetListing {
	readonly asset: AssetId;
	readonly lot: LotRatio;
	readonly marketOpen: boolean;
	readonly halfSpread: bigint;
	readonly fundingRate: bigint;
}
