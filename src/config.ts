import Decimal from "decimal.js";


/**
 * Configure Decimal for consistent behaviour across the library.
 * - precision high enough for financial calculations
 * - rounding uses ROUND_HALF_EVEN (bankers rounding)
 */
Decimal.set({
    precision: 40,
    rounding: Decimal.ROUND_HALF_EVEN,
    toExpNeg: -20,
    toExpPos: 50,
});


export const BOND_MATH = {
    /** Decimal places of every rounded public result */
    displayDecimals: 4,

    /** Distance from an integer below which a period count snaps to it */
    periodTolerance: 1e-9,

    solver: {
        iterations: 100,
        tolerance: 1e-12,
    },

    curve: {
        points: 20,
        smoothing: 0.8,
        /** Upper yield for curves of zero-coupon bonds */
        fallbackMaxYield: 0.1,
    },
} as const;


export const LOG_LEVEL = process.env.LOG_LEVEL ?? "warn";


/**
 * Rounds a full-precision value for output.
 */
export function toDisplay(value: Decimal): number {
    return value.toDecimalPlaces(BOND_MATH.displayDecimals, Decimal.ROUND_HALF_EVEN).toNumber();
}

export { Decimal };
