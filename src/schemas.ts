import { z } from "zod";
import { PeriodCountMode } from "./enums";
import { DomainError, InvalidBondError } from "./errors";
import type { BondTerms, ZeroCurve } from "./types";

const finite = () => z.number().finite();

export const BondTermsSchema = z.object({
    faceValue: finite().positive().describe("Par / face value"),
    tenorYears: finite().positive().describe("Total bond life in years"),
    couponRate: finite().min(0).describe("Annual coupon rate as decimal (0.05 = 5%)"),
    frequency: z.number().int().positive().describe("Coupon payments per year"),
    periodCountMode: z.nativeEnum(PeriodCountMode).optional().describe("Period count rounding"),
});

export const BondParamsSchema = BondTermsSchema.partial();

export const ZeroCurveSchema = z.array(finite().describe("Simple zero rate as decimal"));

export const SerializedBondSchema = BondTermsSchema.extend({
    periodCountMode: z.nativeEnum(PeriodCountMode),
});

export type SerializedBond = z.infer<typeof SerializedBondSchema>;


export function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => {
        const path = issue.path.join(".");
        return path ? `${path}: ${issue.message}` : issue.message;
    });
}


/**
 * Validates bond terms, raising `InvalidBondError` with every failing field.
 */
export function parseBondTerms(terms: BondTerms): BondTerms {
    const result = BondTermsSchema.safeParse(terms);
    if (!result.success) {
        throw new InvalidBondError(formatIssues(result.error));
    }
    return result.data;
}


export function parseZeroCurve(rates: ZeroCurve): ZeroCurve {
    const result = ZeroCurveSchema.safeParse(rates);
    if (!result.success) {
        throw new DomainError(`Invalid zero curve: ${formatIssues(result.error).join("; ")}`);
    }
    return result.data;
}
