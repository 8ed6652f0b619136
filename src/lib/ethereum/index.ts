export type { EthAddress, EthSigner, SignTypedDataParams, TypedDataDomain } from "./types.js";
export { createSigner } from "./signer.js";
export { verifyTypedSignature } from "./verifier.js";
