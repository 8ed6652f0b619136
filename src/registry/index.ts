export type { AssetListing, AssetRegistry, LotRatio } from "./types.js";
export { InMemoryAssetRegistry, type AssetListingInput } from "./memory-registry.js";
