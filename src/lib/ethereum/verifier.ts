/**
 * Typed-data signature verification over viem.
 */

import { isAddress, isHex, verifyTypedData } from "viem";
import type { SignTypedDataParams } from "./types.js";

/**
 * Checks that `signature` over `params` was produced by `address`.
 * Malformed addresses or signatures verify as false rather than throwing.
 */
export async function verifyTypedSignature(
	address: string,
	params: SignTypedDataParams,
	signature: string,
): Promise<boolean> {
	if (!isAddress(address, { strict: false }) || !isHex(signature)) {
		return false;
	}
	try {
		return await verifyTypedData({
			address,
			domain: params.domain,
			types: params.types as Record<string, { name: string; type: string }[]>,
			primaryType: params.primaryType,
			message: params.message,
			signature,
		});
	} catch {
		return false;
	}
}
