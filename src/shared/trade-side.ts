/**
 * TradeSide: direction of a leveraged position.
 *
 * A long profits when the price rises, a short when it falls. The side is
 * fixed when the trade is created.
 */

/** Position directions. */
export const TradeSide = {
	Long: "long",
	Short: "short",
} as const;

export type TradeSide = (typeof TradeSide)[keyof typeof TradeSide];

/** +1 for long, -1 for short: the sign applied to `exit - entry`. */
export function sideSign(side: TradeSide): bigint {
	return side === TradeSide.Long ? 1n : -1n;
}

export function isLong(side: TradeSide): boolean {
	return side === TradeSide.Long;
}
