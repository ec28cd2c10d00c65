import { Decimal, toDisplay } from "./config";
import { BondCashflow, type DecimalSchedule } from "./cashflow";
import { DurationWeighting } from "./enums";
import { DomainError } from "./errors";
import { logger } from "./logger";
import { BondPricing, curveTrace, yieldGrid } from "./pricing";
import { DiscountCalculator } from "./rates";
import type { BondStatistics, BondTerms, CurveOptions, CurvePlot } from "./types";

const log = logger.child({ module: "duration" });


/**
 * BondDuration derives Macaulay and modified duration from the same
 * schedule and yield price the pricing engine uses.
 */
export class BondDuration {

    /**
     * Full-precision Macaulay duration.
     *
     * The default EXPONENTIAL weighting discounts each time weight with
     * `exp(-y * t)` while the price in the denominator is periodically
     * compounded. The two conventions disagree for any non-zero yield;
     * PERIODIC weighting uses the price's own discount factors.
     */
    static macaulayDecimal(
        terms: BondTerms,
        yieldRate: number,
        weighting: DurationWeighting = DurationWeighting.EXPONENTIAL
    ): Decimal {
        const schedule = BondCashflow.buildScheduleDecimal(terms);
        return this.macaulayFromSchedule(schedule, yieldRate, BondPricing.discountAtYield(schedule, yieldRate), weighting);
    }

    private static macaulayFromSchedule(
        schedule: DecimalSchedule,
        yieldRate: number,
        price: Decimal,
        weighting: DurationWeighting
    ): Decimal {
        if (price.isZero()) {
            throw new DomainError("Bond price is zero, duration is undefined");
        }

        const { times, amounts, frequency } = schedule;
        const y = new Decimal(yieldRate);

        const weights = amounts.reduce((sum, amount, i) => {
            const t = times[i];
            const decay = weighting === DurationWeighting.PERIODIC
                ? DiscountCalculator.compoundedDiscountDecimal(y, frequency, i + 1)
                : Decimal.exp(y.neg().mul(t));
            return sum.add(t.mul(decay).mul(amount));
        }, new Decimal(0));

        return weights.div(price);
    }

    /**
     * Macaulay Duration in years, rounded to 4 decimals.
     */
    static macaulayDuration(
        terms: BondTerms,
        yieldRate: number,
        weighting: DurationWeighting = DurationWeighting.EXPONENTIAL
    ): number {
        const duration = this.macaulayDecimal(terms, yieldRate, weighting);
        log.debug({ terms, yieldRate, weighting, duration: duration.toNumber() }, "macaulay duration");
        return toDisplay(duration);
    }

    /**
     * Modified Duration: Macaulay / (1 + y/f), rounded to 4 decimals.
     * Uses the unrounded Macaulay figure.
     */
    static modifiedDuration(
        terms: BondTerms,
        yieldRate: number,
        weighting: DurationWeighting = DurationWeighting.EXPONENTIAL
    ): number {
        const macaulay = this.macaulayDecimal(terms, yieldRate, weighting);
        return toDisplay(this.modifiedFromMacaulay(macaulay, yieldRate, terms.frequency));
    }

    private static modifiedFromMacaulay(macaulay: Decimal, yieldRate: number, frequency: number): Decimal {
        return macaulay.div(new Decimal(1).add(new Decimal(yieldRate).div(frequency)));
    }

    /**
     * Price, Macaulay and modified duration at a flat compounded yield,
     * each rounded to 4 decimals.
     */
    static bondStatistics(
        terms: BondTerms,
        yieldRate: number,
        weighting: DurationWeighting = DurationWeighting.EXPONENTIAL
    ): BondStatistics {
        const schedule = BondCashflow.buildScheduleDecimal(terms);
        const price = BondPricing.discountAtYield(schedule, yieldRate);
        const macaulay = this.macaulayFromSchedule(schedule, yieldRate, price, weighting);

        return Object.freeze({
            price: toDisplay(price),
            macaulayDuration: toDisplay(macaulay),
            modifiedDuration: toDisplay(this.modifiedFromMacaulay(macaulay, yieldRate, schedule.frequency)),
        });
    }

    /**
     * Macaulay duration across a range of yields.
     * Returns Plotly-ready curve data.
     */
    static computeDurationCurve(
        terms: BondTerms,
        options: CurveOptions & { weighting?: DurationWeighting } = {}
    ): CurvePlot[] {
        const yields = yieldGrid(terms, options);
        const schedule = BondCashflow.buildScheduleDecimal(terms);
        const weighting = options.weighting ?? DurationWeighting.EXPONENTIAL;
        const durations = yields.map((y) =>
            toDisplay(this.macaulayFromSchedule(schedule, y, BondPricing.discountAtYield(schedule, y), weighting))
        );

        return curveTrace(
            yields,
            durations,
            "Macaulay Duration",
            "Yield: %{x:.2%}<br>Duration: %{y:.4f} yrs<extra></extra>",
            options
        );
    }
}
