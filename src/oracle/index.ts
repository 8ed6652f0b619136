export type {
	FreshnessPolicy,
	PriceEntry,
	PriceOracle,
	PricePoint,
	PriceProof,
} from "./types.js";
export {
	normalizeTimestamp,
	readPrice,
	readPriceFromProof,
	rescalePrice,
} from "./price-proof.js";
export { JsonPriceOracle, encodeJsonProof, type JsonProofEntry } from "./json-oracle.js";
