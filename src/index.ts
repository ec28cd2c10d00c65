import { BondCashflow } from "./cashflow";
import { BondDuration } from "./duration";
import { BondPricing } from "./pricing";
import { DiscountCalculator } from "./rates";

export { Bond } from "./bond";
export { BondCashflow } from "./cashflow";
export type { DecimalSchedule } from "./cashflow";
export { BondDuration } from "./duration";
export { BondPricing } from "./pricing";
export { DiscountCalculator } from "./rates";
export { BOND_MATH } from "./config";
export { DurationWeighting, PeriodCountMode, RateConvention } from "./enums";
export {
    BondValuationError,
    DomainError,
    InvalidBondError,
    LengthMismatchError,
    isBondValuationError,
    type BondValuationErrorCode
} from "./errors";
export { logger } from "./logger";
export {
    BondParamsSchema,
    BondTermsSchema,
    SerializedBondSchema,
    ZeroCurveSchema,
    type SerializedBond
} from "./schemas";
export type * from "./types";


// Function-style surface over the engines.

export const discountFactor = DiscountCalculator.discountFactor.bind(DiscountCalculator);
export const simpleToCompounded = DiscountCalculator.simpleToCompounded.bind(DiscountCalculator);
export const compoundedToSimple = DiscountCalculator.compoundedToSimple.bind(DiscountCalculator);
export const convertRate = DiscountCalculator.convertRate.bind(DiscountCalculator);
export const presentValue = DiscountCalculator.presentValue.bind(DiscountCalculator);

export const buildSchedule = BondCashflow.buildSchedule.bind(BondCashflow);
export const cashflowTable = BondCashflow.generate.bind(BondCashflow);

export const priceFromCurve = BondPricing.priceFromCurve.bind(BondPricing);
export const priceFromYield = BondPricing.priceFromYield.bind(BondPricing);
export const solveYieldFromPrice = BondPricing.solveYieldFromPrice.bind(BondPricing);
export const currentYield = BondPricing.currentYield.bind(BondPricing);

export const macaulayDuration = BondDuration.macaulayDuration.bind(BondDuration);
export const modifiedDuration = BondDuration.modifiedDuration.bind(BondDuration);
export const bondStatistics = BondDuration.bondStatistics.bind(BondDuration);
