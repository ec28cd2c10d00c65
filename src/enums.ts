/**
 * Interest accrual conventions a quoted rate can be expressed in.
 */
export enum RateConvention {
    /** Accrual proportional to elapsed time, no reinvestment */
    SIMPLE = "Simple",

    /** Periodic reinvestment at the coupon frequency */
    COMPOUNDED = "Compounded",
}


/**
 * How `tenorYears * frequency` is turned into a whole number of payments.
 */
export enum PeriodCountMode {
    /**
     * Truncate toward zero. Products within the period tolerance of an
     * integer snap to it first, so `9.999999999` still counts 10 periods.
     */
    TRUNCATE = "Truncate",

    /** Reject any tenor that does not span a whole number of periods */
    STRICT = "Strict",
}


/**
 * Discounting applied to the time weights of Macaulay duration.
 */
export enum DurationWeighting {
    /**
     * `exp(-y * t)` decay over a periodically compounded price.
     * Mixed convention; PERIODIC is the self-consistent form.
     */
    EXPONENTIAL = "Exponential",

    /** `(1 + y/f)^-(f*t)`, consistent with the price */
    PERIODIC = "Periodic",
}
