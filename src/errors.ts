export type BondValuationErrorCode =
    | "DOMAIN_ERROR"
    | "LENGTH_MISMATCH"
    | "INVALID_BOND";


/**
 * Base class for every error raised by the valuation model.
 */
export class BondValuationError extends Error {
    readonly code: BondValuationErrorCode;

    constructor(code: BondValuationErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}


/**
 * Input outside the mathematical domain of a formula, such as a zero
 * discount denominator or a negative base under a fractional power.
 */
export class DomainError extends BondValuationError {
    constructor(message: string) {
        super("DOMAIN_ERROR", message);
    }
}


/**
 * Zero curve whose length differs from the bond's payment count.
 */
export class LengthMismatchError extends BondValuationError {
    readonly expected: number;
    readonly actual: number;

    constructor(expected: number, actual: number) {
        super(
            "LENGTH_MISMATCH",
            `Zero curve has ${actual} rate(s) but the bond pays ${expected} cash flow(s)`
        );
        this.expected = expected;
        this.actual = actual;
    }
}


/**
 * Bond terms that cannot produce a cash-flow schedule.
 */
export class InvalidBondError extends BondValuationError {
    readonly issues: string[];

    constructor(issues: string[]) {
        super("INVALID_BOND", `Invalid bond: ${issues.join("; ")}`);
        this.issues = issues;
    }
}


export function isBondValuationError(e: unknown): e is BondValuationError {
    return e instanceof BondValuationError;
}
