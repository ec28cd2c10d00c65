import { Decimal, toDisplay } from "./config";
import { RateConvention } from "./enums";
import { DomainError } from "./errors";


function requireFinite(values: Record<string, number>): void {
    for (const [name, value] of Object.entries(values)) {
        if (!Number.isFinite(value)) {
            throw new DomainError(`${name} must be a finite number, received ${value}`);
        }
    }
}

/**
 * Converts a result to a JS number, rejecting values a double cannot hold.
 */
function toFiniteNumber(result: Decimal, label: string): number {
    const value = result.toNumber();
    if (!result.isFinite() || !Number.isFinite(value)) {
        throw new DomainError(`${label} is not representable as a finite number (${result.toString()})`);
    }
    return value;
}

/**
 * Raises `base` to `exponent`, rejecting results that have no real value.
 */
function realPow(base: Decimal, exponent: Decimal): Decimal {
    if (base.isNeg() && !exponent.isInteger()) {
        throw new DomainError(
            `Cannot raise negative base ${base.toString()} to non-integral power ${exponent.toString()}`
        );
    }
    if (base.isZero() && exponent.isNeg()) {
        throw new DomainError("Cannot raise zero to a negative power");
    }
    return base.pow(exponent);
}


/**
 * DiscountCalculator holds the single-cash-flow primitives:
 * simple-rate discounting and simple/compounded rate conversion.
 * All methods are pure.
 */
export class DiscountCalculator {

    /**
     * Full-precision simple-interest discount: `face / (1 + rate * tenor)`.
     */
    static discountFactorDecimal(face: Decimal.Value, tenor: Decimal.Value, rate: Decimal.Value): Decimal {
        const denominator = new Decimal(1).add(new Decimal(rate).mul(tenor));
        if (denominator.isZero()) {
            throw new DomainError(`Discount denominator 1 + rate * tenor is zero (rate=${rate}, tenor=${tenor})`);
        }
        return new Decimal(face).div(denominator);
    }

    /**
     * Price of a zero-coupon bond under simple-interest discounting.
     *
     * @param face - amount paid at `tenor`
     * @param tenor - years to payment
     * @param rate - simple annual rate
     */
    static discountFactor(face: number, tenor: number, rate: number): number {
        requireFinite({ face, tenor, rate });
        return this.discountFactorDecimal(face, tenor, rate).toNumber();
    }

    /**
     * Compounded rate equivalent to a simple rate over `t` years:
     * `((1 + r*t)^(1/(t*freq)) - 1) * freq`
     */
    static simpleToCompounded(simpleRate: number, t: number, freq: number): number {
        requireFinite({ simpleRate, t, freq });
        const periods = new Decimal(t).mul(freq);
        if (periods.lte(0)) {
            throw new DomainError(`t * freq must be positive, received ${periods.toString()}`);
        }

        const growth = new Decimal(1).add(new Decimal(simpleRate).mul(t));
        const result = realPow(growth, new Decimal(1).div(periods)).sub(1).mul(freq);
        return toFiniteNumber(result, "Compounded rate");
    }

    /**
     * Simple rate equivalent to a compounded rate over `t` years:
     * `((1 + c/freq)^(t*freq) - 1) / t`
     */
    static compoundedToSimple(compoundedRate: number, t: number, freq: number): number {
        requireFinite({ compoundedRate, t, freq });
        const periods = new Decimal(t).mul(freq);
        if (periods.lte(0)) {
            throw new DomainError(`t * freq must be positive, received ${periods.toString()}`);
        }

        const base = new Decimal(1).add(new Decimal(compoundedRate).div(freq));
        const result = realPow(base, periods).sub(1).div(t);
        return toFiniteNumber(result, "Simple rate");
    }

    /**
     * Re-expresses `rate` from one convention in another over `t` years.
     */
    static convertRate(
        rate: number,
        from: RateConvention,
        to: RateConvention,
        t: number,
        freq: number
    ): number {
        requireFinite({ rate, t, freq });
        if (from === to) return rate;

        return from === RateConvention.SIMPLE
            ? this.simpleToCompounded(rate, t, freq)
            : this.compoundedToSimple(rate, t, freq);
    }

    /**
     * PV of one cash flow at a simple rate, rounded to 4 decimals.
     */
    static presentValue(cf: number, simpleRate: number, tau: number): number {
        requireFinite({ cf, simpleRate, tau });
        return toDisplay(this.discountFactorDecimal(1, tau, simpleRate).mul(cf));
    }

    /**
     * `(1 + y/freq)^-periods`, the periodic-compounding discount factor.
     */
    static compoundedDiscountDecimal(yieldRate: Decimal.Value, freq: number, periods: Decimal.Value): Decimal {
        const base = new Decimal(1).add(new Decimal(yieldRate).div(freq));
        return realPow(base, new Decimal(periods).neg());
    }
}
