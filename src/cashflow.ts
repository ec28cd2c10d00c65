import { DateTime } from "luxon";
import { BOND_MATH, Decimal } from "./config";
import { PeriodCountMode } from "./enums";
import { InvalidBondError } from "./errors";
import { logger } from "./logger";
import { parseBondTerms } from "./schemas";
import type { BondTerms, CashFlowSchedule, CashflowSummary, ISODateString } from "./types";

const log = logger.child({ module: "cashflow" });


export interface DecimalSchedule {
    frequency: number;
    times: Decimal[];
    amounts: Decimal[];
    coupon: Decimal;
}


/**
 * Builds bond cash-flow schedules and dated cash-flow tables.
 */
export class BondCashflow {

    /**
     * Number of payments spanned by `tenorYears * frequency`.
     */
    static countPeriods(terms: BondTerms): number {
        return this.periodsOf(parseBondTerms(terms));
    }

    private static periodsOf(terms: BondTerms): number {
        const { tenorYears, frequency } = terms;
        const mode = terms.periodCountMode ?? PeriodCountMode.TRUNCATE;
        const exact = tenorYears * frequency;
        const nearest = Math.round(exact);
        const residual = Math.abs(exact - nearest);

        let periods: number;
        if (residual <= BOND_MATH.periodTolerance) {
            periods = nearest;
        } else if (mode === PeriodCountMode.STRICT) {
            throw new InvalidBondError([
                `tenorYears * frequency = ${exact} is not a whole number of periods`,
            ]);
        } else {
            periods = Math.trunc(exact);
            log.warn({ tenorYears, frequency, periods }, "fractional final period dropped");
        }

        if (periods < 1) {
            throw new InvalidBondError([
                `tenorYears * frequency = ${exact} spans no complete payment period`,
            ]);
        }
        return periods;
    }

    /**
     * Full-precision schedule, shared by the pricing and duration engines.
     */
    static buildScheduleDecimal(terms: BondTerms): DecimalSchedule {
        const parsed = parseBondTerms(terms);
        const { faceValue, couponRate, frequency } = parsed;
        const periods = this.periodsOf(parsed);
        const face = new Decimal(faceValue);
        const coupon = face.mul(couponRate).div(frequency);

        const times: Decimal[] = [];
        const amounts: Decimal[] = [];
        for (let i = 0; i < periods; i++) {
            times.push(new Decimal(i + 1).div(frequency));
            amounts.push(i === periods - 1 ? coupon.add(face) : coupon);
        }

        return { frequency, times, amounts, coupon };
    }

    /**
     * Ordered coupon and principal payments of a bond.
     * Every period pays `couponRate * faceValue / frequency`; the last
     * one also returns the face value.
     */
    static buildSchedule(terms: BondTerms): CashFlowSchedule {
        const { times, amounts, coupon } = this.buildScheduleDecimal(terms);

        return Object.freeze({
            periods: times.length,
            couponAmount: coupon.toNumber(),
            paymentTimes: Object.freeze(times.map((t) => t.toNumber())),
            amounts: Object.freeze(amounts.map((a) => a.toNumber())),
        });
    }

    /**
     * Generates a dated cash-flow table starting from `issueDate`.
     * Frequencies dividing 12 step by whole months (clamped to month end),
     * others by `365.25 * t` days.
     *
     * @param terms - bond terms
     * @param issueDate - ISO 8601 issue date
     */
    static generate(terms: BondTerms, issueDate: ISODateString): CashflowSummary[] {
        const issue = DateTime.fromISO(issueDate, { zone: "utc" });
        if (!issue.isValid) {
            throw new InvalidBondError([`issueDate "${issueDate}" is not a valid ISO 8601 date`]);
        }

        const { frequency } = terms;
        const schedule = this.buildSchedule(terms);
        const monthsPerPeriod = 12 % frequency === 0 ? 12 / frequency : null;

        return schedule.paymentTimes.map((time, idx) => {
            const paymentDate = monthsPerPeriod === null
                ? issue.plus({ days: Math.round(365.25 * time) })
                : issue.plus({ months: monthsPerPeriod * (idx + 1) });

            const total = schedule.amounts[idx];
            const principal = idx === schedule.periods - 1 ? terms.faceValue : 0;

            return {
                period: idx + 1,
                time,
                dateLabel: paymentDate.toFormat("yyyy-MM-dd"),
                interest: schedule.couponAmount,
                principal,
                total,
            };
        });
    }
}
