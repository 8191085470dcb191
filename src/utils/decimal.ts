/**
 * Fixed-scale helpers for price and valuation arithmetic.
 *
 * Prices are stored with 4 fractional digits. Valuations and rebased amounts
 * are kept at 8 fractional digits so that summing many positions does not
 * accumulate float noise (0.1 + 0.2 style errors).
 *
 *   Dec.roundPrice(n)       // → 4 dp, the storage scale of price_history.price
 *   Dec.mul(qty, price)     // → 8 dp
 *   Dec.div(value, rate)    // → 8 dp, 0 when rate is 0
 *   Dec.sum(values)         // → 8 dp
 */

/** Fractional digits persisted for a price */
const PRICE_SCALE_DP = 4

/** Fractional digits kept for derived amounts */
const AMOUNT_SCALE_DP = 8

/**
 * Round half away from zero. Math.round alone rounds -2.5 to -2.
 */
function roundHalfUp(value: number, dp: number): number {
    const factor = Math.pow(10, dp)
    return Math.sign(value) * Math.round(Math.abs(value) * factor) / factor
}

export const Dec = {
    add(a: number, b: number): number {
        return roundHalfUp(a + b, AMOUNT_SCALE_DP)
    },

    mul(a: number, b: number): number {
        return roundHalfUp(a * b, AMOUNT_SCALE_DP)
    },

    /** Divide a by b. Returns 0 if b is 0. */
    div(a: number, b: number): number {
        if (b === 0) return 0
        return roundHalfUp(a / b, AMOUNT_SCALE_DP)
    },

    sum(values: Iterable<number>): number {
        let total = 0
        for (const v of values) total += v
        return roundHalfUp(total, AMOUNT_SCALE_DP)
    },

    roundPrice(price: number): number {
        return roundHalfUp(price, PRICE_SCALE_DP)
    }
}
