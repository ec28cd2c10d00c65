import { BOND_MATH, Decimal, toDisplay } from "./config";
import { BondCashflow, type DecimalSchedule } from "./cashflow";
import { DomainError, LengthMismatchError } from "./errors";
import { logger } from "./logger";
import { DiscountCalculator } from "./rates";
import { parseBondTerms, parseZeroCurve } from "./schemas";
import type { BondTerms, CurveOptions, CurvePlot, SolverOptions, ZeroCurve } from "./types";

const log = logger.child({ module: "pricing" });


/**
 * Evenly spaced yields between the curve bounds.
 */
export function yieldGrid(terms: BondTerms, options: CurveOptions = {}): number[] {
    const points = options.points ?? BOND_MATH.curve.points;
    const minYield = options.minYield ?? 0;
    const maxYield = options.maxYield
        ?? (terms.couponRate > 0 ? terms.couponRate * 2 : BOND_MATH.curve.fallbackMaxYield);

    if (!Number.isInteger(points) || points < 2) {
        throw new DomainError(`A curve needs at least 2 points, received ${points}`);
    }
    if (!(maxYield > minYield)) {
        throw new DomainError(`maxYield (${maxYield}) must exceed minYield (${minYield})`);
    }

    const step = (maxYield - minYield) / (points - 1);
    return Array.from({ length: points }, (_, i) => minYield + step * i);
}


/**
 * One Plotly scatter trace in the style shared by every curve.
 */
export function curveTrace(
    x: number[],
    y: number[],
    name: string,
    hovertemplate: string,
    options: CurveOptions = {}
): CurvePlot[] {
    return [
        {
            x,
            y,
            type: "scatter",
            mode: "lines+markers",
            name: options.name ?? name,
            line: {
                shape: "spline",
                smoothing: options.smoothing ?? BOND_MATH.curve.smoothing,
                width: 2,
            },
            marker: { size: 6 },
            hovertemplate,
        },
    ];
}


/**
 * BondPricing values a bond from a zero curve or from a flat
 * periodically compounded yield.
 */
export class BondPricing {

    /**
     * Price from per-period simple zero rates, rounded to 4 decimals.
     *
     * @param terms - bond terms
     * @param zeroRates - one simple rate per payment, in payment order
     * @throws LengthMismatchError when the curve and schedule lengths differ
     */
    static priceFromCurve(terms: BondTerms, zeroRates: ZeroCurve): number {
        const { times, amounts } = BondCashflow.buildScheduleDecimal(terms);
        const rates = parseZeroCurve(zeroRates);

        if (rates.length !== times.length) {
            throw new LengthMismatchError(times.length, rates.length);
        }

        const price = amounts.reduce(
            (sum, amount, i) => sum.add(amount.mul(DiscountCalculator.discountFactorDecimal(1, times[i], rates[i]))),
            new Decimal(0)
        );

        log.debug({ terms, zeroRates: rates, price: price.toNumber() }, "curve price");
        return toDisplay(price);
    }

    /**
     * Full-precision price at a flat compounded yield.
     */
    static priceFromYieldDecimal(terms: BondTerms, yieldRate: number): Decimal {
        return this.discountAtYield(BondCashflow.buildScheduleDecimal(terms), yieldRate);
    }

    /**
     * Sum of a prebuilt schedule's amounts discounted at `(1 + y/f)^-(i+1)`.
     */
    static discountAtYield(schedule: DecimalSchedule, yieldRate: number): Decimal {
        if (!Number.isFinite(yieldRate)) {
            throw new DomainError(`yield must be a finite number, received ${yieldRate}`);
        }

        return schedule.amounts.reduce(
            (sum, amount, i) =>
                sum.add(amount.mul(DiscountCalculator.compoundedDiscountDecimal(yieldRate, schedule.frequency, i + 1))),
            new Decimal(0)
        );
    }

    /**
     * Price at a flat yield compounded `frequency` times a year.
     * Returned unrounded: duration divides by it.
     */
    static priceFromYield(terms: BondTerms, yieldRate: number): number {
        const price = this.priceFromYieldDecimal(terms, yieldRate).toNumber();
        log.debug({ terms, yieldRate, price }, "yield price");
        return price;
    }

    /**
     * Solves the flat compounded yield that reproduces `price`
     * (Newton–Raphson on `priceFromYield`).
     */
    static solveYieldFromPrice(terms: BondTerms, price: number, options: SolverOptions = {}): number {
        if (!Number.isFinite(price) || price <= 0) {
            throw new DomainError(`price must be a positive finite number, received ${price}`);
        }

        const iterations = options.iterations ?? BOND_MATH.solver.iterations;
        const tolerance = new Decimal(options.tolerance ?? BOND_MATH.solver.tolerance);
        const { amounts, frequency } = BondCashflow.buildScheduleDecimal(terms);
        const freq = new Decimal(frequency);
        const target = new Decimal(price);

        let ytm = new Decimal(options.initialGuess ?? terms.couponRate);

        for (let i = 0; i < iterations; i++) {
            const base = new Decimal(1).add(ytm.div(freq));
            if (base.lte(0)) break;

            let f = target.neg();
            let df = new Decimal(0);
            amounts.forEach((amount, idx) => {
                const k = idx + 1;
                const discount = base.pow(k);
                f = f.add(amount.div(discount));
                df = df.sub(amount.mul(k).div(discount.mul(base).mul(freq)));
            });

            if (df.abs().lt(new Decimal("1e-30"))) break;

            const next = ytm.sub(f.div(df));
            if (!next.isFinite()) break;
            if (next.sub(ytm).abs().lt(tolerance)) {
                return next.toNumber();
            }
            ytm = next;
        }

        log.warn({ terms, price, lastYield: ytm.toNumber() }, "yield solver did not converge");
        throw new DomainError(`No yield reproduces price ${price} within ${iterations} iterations`);
    }

    /**
     * Current Yield.
     *
     * Formula:
     * `Annual Coupon` / `Price`
     */
    static currentYield(terms: BondTerms, price: number): number {
        if (!Number.isFinite(price) || price <= 0) {
            throw new DomainError(`price must be a positive finite number, received ${price}`);
        }
        const { faceValue, couponRate } = parseBondTerms(terms);
        return new Decimal(faceValue).mul(couponRate).div(price).toNumber();
    }

    /**
     * Compute the price/yield curve of the bond.
     * Returns Plotly-ready curve data.
     */
    static computePriceYieldCurve(terms: BondTerms, options: CurveOptions = {}): CurvePlot[] {
        const yields = yieldGrid(terms, options);
        const schedule = BondCashflow.buildScheduleDecimal(terms);
        const prices = yields.map((y) => toDisplay(this.discountAtYield(schedule, y)));

        return curveTrace(
            yields,
            prices,
            "Price / Yield",
            "Yield: %{x:.2%}<br>Price: %{y:.4f}<extra></extra>",
            options
        );
    }
}
