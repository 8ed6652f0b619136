/**
 * Ethereum library wrapper: type definitions.
 *
 * Signing and signature recovery sit behind these interfaces; only the files
 * in this directory import viem.
 */

import type { TypedDataDomain } from "viem";

export type { TypedDataDomain };

/** Lowercased 0x-prefixed 20-byte address. */
export type EthAddress = `0x${string}`;

/**
 * Parameters for signing or verifying typed data (EIP-712).
 */
export interface SignTypedDataParams {
	readonly domain: TypedDataDomain;
	readonly types: Record<string, readonly { readonly name: string; readonly type: string }[]>;
	readonly primaryType: string;
	readonly message: Record<string, unknown>;
}

/**
 * Ethereum signer: signs typed data on behalf of one address.
 */
export interface EthSigner {
	readonly address: EthAddress;
	signTypedData(params: SignTypedDataParams): Promise<string>;
}
