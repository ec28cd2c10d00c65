import { BondCashflow } from "./cashflow";
import { DurationWeighting, PeriodCountMode } from "./enums";
import { InvalidBondError } from "./errors";
import { BondDuration } from "./duration";
import { BondPricing } from "./pricing";
import { BondParamsSchema, formatIssues, type SerializedBond } from "./schemas";
import type {
    BondParams,
    BondStatistics,
    BondTerms,
    CashFlowSchedule,
    CashflowSummary,
    CurveOptions,
    CurvePlot,
    ISODateString,
    SolverOptions,
    ZeroCurve
} from "./types";


/**
 * Immutable fixed-coupon bond.
 *
 * Every "setter" returns a new instance; the original is frozen.
 */
export class Bond implements BondTerms {

    readonly faceValue: number;
    readonly tenorYears: number;
    readonly couponRate: number;
    readonly frequency: number;
    readonly periodCountMode: PeriodCountMode;


    private constructor(terms: Required<BondTerms>) {
        this.faceValue = terms.faceValue;
        this.tenorYears = terms.tenorYears;
        this.couponRate = terms.couponRate;
        this.frequency = terms.frequency;
        this.periodCountMode = terms.periodCountMode;
        Object.freeze(this);
    }


    /**
     * Create a validated bond instance with sensible defaults.
     *
     * @param params Optional bond parameters
     * @throws InvalidBondError when any term is out of range
     */
    static initialize(params: BondParams = {}): Bond {
        const terms: Required<BondTerms> = {
            faceValue: params.faceValue ?? 100,
            tenorYears: params.tenorYears ?? 5,
            couponRate: params.couponRate ?? 0.05,
            frequency: params.frequency ?? 2,
            periodCountMode: params.periodCountMode ?? PeriodCountMode.TRUNCATE,
        };

        // Validates every term and the period count.
        BondCashflow.countPeriods(terms);

        return new Bond(terms);
    }


    // --- Core values ---

    /**
     * Coupon payment amount per period.
     */
    get couponPerPeriod(): number {
        return this.schedule.couponAmount;
    }

    /**
     * Total number of coupon periods over bond lifetime.
     */
    get totalPeriods(): number {
        return BondCashflow.countPeriods(this);
    }

    get schedule(): CashFlowSchedule {
        return BondCashflow.buildSchedule(this);
    }


    // --- Pricing ---

    /**
     * Price from per-period simple zero rates.
     */
    getCurvePrice(zeroRates: ZeroCurve): number {
        return BondPricing.priceFromCurve(this, zeroRates);
    }

    /**
     * Unrounded price at a flat compounded yield.
     */
    getPrice(yieldRate: number): number {
        return BondPricing.priceFromYield(this, yieldRate);
    }

    /**
     * Yield to maturity implied by `price`.
     */
    getYield(price: number, options?: SolverOptions): number {
        return BondPricing.solveYieldFromPrice(this, price, options);
    }

    getCurrentYield(price: number): number {
        return BondPricing.currentYield(this, price);
    }

    getPriceYieldCurve(options?: CurveOptions): CurvePlot[] {
        return BondPricing.computePriceYieldCurve(this, options);
    }


    // --- Interest Rate Sensitivity ---

    getDuration(yieldRate: number, weighting?: DurationWeighting): number {
        return BondDuration.macaulayDuration(this, yieldRate, weighting);
    }

    getModifiedDuration(yieldRate: number, weighting?: DurationWeighting): number {
        return BondDuration.modifiedDuration(this, yieldRate, weighting);
    }

    getStatistics(yieldRate: number, weighting?: DurationWeighting): BondStatistics {
        return BondDuration.bondStatistics(this, yieldRate, weighting);
    }

    getDurationCurve(options?: CurveOptions & { weighting?: DurationWeighting }): CurvePlot[] {
        return BondDuration.computeDurationCurve(this, options);
    }


    // --- Cashflow Tables ---

    getCashflowSummary(issueDate: ISODateString): CashflowSummary[] {
        return BondCashflow.generate(this, issueDate);
    }


    // --- Copy-on-write setters ---

    withFaceValue(faceValue: number): Bond {
        return Bond.initialize({ ...this.toJSON(), faceValue });
    }

    withTenor(tenorYears: number): Bond {
        return Bond.initialize({ ...this.toJSON(), tenorYears });
    }

    withCouponRate(couponRate: number): Bond {
        return Bond.initialize({ ...this.toJSON(), couponRate });
    }

    withFrequency(frequency: number): Bond {
        return Bond.initialize({ ...this.toJSON(), frequency });
    }

    withPeriodCountMode(periodCountMode: PeriodCountMode): Bond {
        return Bond.initialize({ ...this.toJSON(), periodCountMode });
    }


    /**
     * Generates a new instance from a JSON string or object.
     * Missing terms take the `initialize` defaults.
     *
     * @throws InvalidBondError on malformed JSON or invalid terms
     */
    static parseFromJSON(json: string | object): Bond {
        let raw: unknown = json;
        if (typeof json === "string") {
            try {
                raw = JSON.parse(json);
            } catch (e) {
                const reason = e instanceof Error ? e.message : String(e);
                throw new InvalidBondError([`malformed JSON: ${reason}`]);
            }
        }

        const parsed = BondParamsSchema.safeParse(raw);
        if (!parsed.success) {
            throw new InvalidBondError(formatIssues(parsed.error));
        }
        return Bond.initialize(parsed.data);
    }

    /**
     * Converts the current instance to a plain JSON object.
     */
    toJSON(): SerializedBond {
        return {
            faceValue: this.faceValue,
            tenorYears: this.tenorYears,
            couponRate: this.couponRate,
            frequency: this.frequency,
            periodCountMode: this.periodCountMode,
        };
    }
}
