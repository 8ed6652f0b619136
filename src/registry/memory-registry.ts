/**
 * InMemoryAssetRegistry: listed assets held in a map.
 *
 * Listings are validated on entry; the owner-facing setters cover the
 * market-hours and funding updates an operator makes between listings.
 */

import { bigintLike, validate, z } from "../lib/validation/index.js";
import { ErrorCode, type LedgerError, NotFoundError } from "../shared/errors.js";
import { type AssetId, assetId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { AssetListing, AssetRegistry, LotRatio } from "./types.js";

const listingSchema = z
	.object({
		asset: z.string().trim().min(1).transform((s) => assetId(s)),
		lot: z.object({
			numerator: bigintLike.refine((v) => v >= 0n, "numerator must be >= 0"),
			denominator: bigintLike.refine((v) => v > 0n, "denominator must be > 0"),
		}),
		marketOpen: z.boolean().default(true),
		halfSpread: bigintLike.refine((v) => v >= 0n, "halfSpread must be >= 0").default(0n),
		fundingRate: bigintLike.default(0n),
	})
	.strict();

/** Raw listing input before validation (amounts may be strings or numbers). */
export type AssetListingInput = z.input<typeof listingSchema>;

export class InMemoryAssetRegistry implements AssetRegistry {
	private readonly assets = new Map<AssetId, AssetListing>();

	/**
	 * Builds a registry from raw listings.
	 * @returns Err with the first invalid listing
	 * @example
	 * InMemoryAssetRegistry.fromListings([{ asset: "BTC-USD", lot: { numerator: 1, denominator: 100 } }]);
	 */
	static fromListings(
		listings: readonly AssetListingInput[],
	): Result<InMemoryAssetRegistry, LedgerError> {
		const registry = new InMemoryAssetRegistry();
		for (const raw of listings) {
			const listed = registry.list(raw);
			if (!listed.ok) return listed;
		}
		return ok(registry);
	}

	/** Adds or replaces a listing. */
	list(raw: AssetListingInput): Result<AssetListing, LedgerError> {
		const parsed = validate(listingSchema, raw);
		if (!parsed.ok) return parsed;
		const listing: AssetListing = parsed.value;
		this.assets.set(listing.asset, listing);
		return ok(listing);
	}

	setMarketOpen(asset: AssetId, open: boolean): Result<void, LedgerError> {
		return this.update(asset, (l) => ({ ...l, marketOpen: open }));
	}

	setFundingRate(asset: AssetId, rate: bigint): Result<void, LedgerError> {
		return this.update(asset, (l) => ({ ...l, fundingRate: rate }));
	}

	// ── AssetRegistry ─────────────────────────────────────────────

	getLot(asset: AssetId): Result<LotRatio, LedgerError> {
		const listing = this.lookup(asset);
		return listing.ok ? ok(listing.value.lot) : listing;
	}

	isMarketOpen(asset: AssetId): Result<boolean, LedgerError> {
		const listing = this.lookup(asset);
		return listing.ok ? ok(listing.value.marketOpen) : listing;
	}

	halfSpread(asset: AssetId): Result<bigint, LedgerError> {
		const listing = this.lookup(asset);
		return listing.ok ? ok(listing.value.halfSpread) : listing;
	}

	fundingRate(asset: AssetId): Result<bigint, LedgerError> {
		const listing = this.lookup(asset);
		return listing.ok ? ok(listing.value.fundingRate) : listing;
	}

	// ── Internal ──────────────────────────────────────────────────

	private lookup(asset: AssetId): Result<AssetListing, LedgerError> {
		const listing = this.assets.get(asset);
		if (!listing) {
			return err(
				new NotFoundError(`Asset ${asset} is not listed`, ErrorCode.UnknownAsset, { asset }),
			);
		}
		return ok(listing);
	}

	private update(
		asset: AssetId,
		fn: (listing: AssetListing) => AssetListing,
	): Result<void, LedgerError> {
		const listing = this.lookup(asset);
		if (!listing.ok) return listing;
		this.assets.set(asset, fn(listing.value));
		return ok(undefined);
	}
}
