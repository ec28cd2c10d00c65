import type { PeriodCountMode } from "./enums";

/**
 * ISO 8601 date string (UTC recommended).
 * Example: "2026-01-15"
 */
export type ISODateString = string;


/**
 * Contractual terms every valuation operation works from.
 */
export interface BondTerms {
  /** Par value repaid at maturity */
  readonly faceValue: number;

  /** Total bond life in years */
  readonly tenorYears: number;

  /**
   * Annual coupon rate as a decimal.
   * Example: 0.0625 = 6.25%
   */
  readonly couponRate: number;

  /** Coupon payments per year */
  readonly frequency: number;

  /** @default PeriodCountMode.TRUNCATE */
  readonly periodCountMode?: PeriodCountMode;
}


/**
 * Initialization parameters for `Bond.initialize`.
 */
export interface BondParams {
  /** @default 100 */
  faceValue?: number;

  /** @default 5 */
  tenorYears?: number;

  /** @default 0.05 */
  couponRate?: number;

  /**
   * Coupon payment frequency per year.
   * @default 2 (semi-annual)
   */
  frequency?: number;

  /** @default PeriodCountMode.TRUNCATE */
  periodCountMode?: PeriodCountMode;
}


/**
 * Ordered coupon and principal payments of a bond.
 */
export interface CashFlowSchedule {
  /** Number of payments */
  readonly periods: number;

  /** Coupon paid every period */
  readonly couponAmount: number;

  /** Payment times in years, `(i + 1) / frequency` */
  readonly paymentTimes: readonly number[];

  /** Cash paid at each time; the last entry includes the face value */
  readonly amounts: readonly number[];
}


/**
 * Per-period simple rates, aligned positionally with `paymentTimes`.
 */
export type ZeroCurve = readonly number[];


/**
 * Price and rate sensitivity of a bond at a flat compounded yield.
 */
export interface BondStatistics {
  readonly price: number;
  readonly macaulayDuration: number;
  readonly modifiedDuration: number;
}


/**
 * Single row of a dated cash-flow table.
 */
export interface CashflowSummary {
  /**
   * Sequential period index (1-based).
   */
  period: number;

  /** Payment time in years from issue */
  time: number;

  /**
   * Payment date label (yyyy-MM-dd).
   */
  dateLabel: string;

  /**
   * Coupon paid for the period.
   */
  interest: number;

  /**
   * Principal repayment (non-zero only at maturity).
   */
  principal: number;

  /**
   * Total cash received for the period.
   */
  total: number;
}


/**
 * Range of yields a curve is sampled over.
 */
export interface CurveOptions {
  /** @default 0 */
  minYield?: number;

  /** @default twice the coupon rate, or 0.1 for a zero-coupon bond */
  maxYield?: number;

  /** @default 20 */
  points?: number;

  name?: string;

  /** @default 0.8 */
  smoothing?: number;
}


/**
 * Plotly-compatible curve trace.
 */
export interface CurvePlot {
  x: number[];              // yields
  y: number[];              // prices or durations
  type: "scatter";
  mode: "lines+markers";
  name: string;

  line: {
    shape: "spline";
    smoothing: number;
    width?: number;
  };

  marker?: {
    size?: number;
  };

  hovertemplate?: string;
}


/**
 * Newton–Raphson settings for yield solving.
 */
export interface SolverOptions {
  /** Starting yield, defaults to the coupon rate */
  initialGuess?: number;
  iterations?: number;
  tolerance?: number;
}
