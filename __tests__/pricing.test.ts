import { describe, it, expect } from 'vitest';
import {
  BondPricing,
  currentYield,
  DomainError,
  InvalidBondError,
  LengthMismatchError,
  priceFromCurve,
  priceFromYield,
  solveYieldFromPrice,
} from '../src';
import type { BondTerms } from '../src';

const annual: BondTerms = { faceValue: 100, tenorYears: 2, couponRate: 0.06, frequency: 1 };
const semiAnnual: BondTerms = { faceValue: 1000, tenorYears: 3, couponRate: 0.05, frequency: 2 };

describe('priceFromCurve', () => {
  it('should discount each cash flow at its own simple zero rate', () => {
    // 6 / 1.05 + 106 / 1.11 = 5.714285... + 95.495495...
    expect(priceFromCurve(annual, [0.05, 0.055])).toBe(101.2098);
  });

  it('should price a semi-annual bond off a six-point curve', () => {
    expect(priceFromCurve(semiAnnual, [0.03, 0.032, 0.034, 0.036, 0.038, 0.04])).toBe(1033.9727);
  });

  it('should reject a curve shorter than the schedule', () => {
    expect(() => priceFromCurve(annual, [0.05])).toThrow(LengthMismatchError);
  });

  it('should reject a curve longer than the schedule', () => {
    try {
      priceFromCurve(annual, [0.05, 0.055, 0.06]);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(LengthMismatchError);
      if (!(e instanceof LengthMismatchError)) return;
      expect(e.expected).toBe(2);
      expect(e.actual).toBe(3);
      expect(e.message).toBe('Zero curve has 3 rate(s) but the bond pays 2 cash flow(s)');
    }
  });

  it('should reject non-finite rates', () => {
    expect(() => priceFromCurve(annual, [0.05, Number.NaN])).toThrow(DomainError);
  });

  it('should validate the bond before the curve', () => {
    expect(() => priceFromCurve({ ...annual, faceValue: 0 }, [0.05])).toThrow(InvalidBondError);
  });
});

describe('priceFromYield', () => {
  it('should discount at a flat periodically compounded yield', () => {
    // 6 / 1.05 + 106 / 1.05^2
    expect(priceFromYield(annual, 0.05)).toBeCloseTo(101.85941043083900, 10);
  });

  it('should price at par when the yield equals the coupon', () => {
    expect(priceFromYield(semiAnnual, 0.05)).toBeCloseTo(1000, 10);
  });

  it('should sum the undiscounted cash flows at a zero yield', () => {
    expect(priceFromYield(annual, 0)).toBe(112);
  });

  it('should return an unrounded price', () => {
    expect(priceFromYield(semiAnnual, 0.04)).toBeCloseTo(1028.0071544534520, 9);
  });

  it('should reject a yield of -frequency', () => {
    expect(() => priceFromYield(semiAnnual, -2)).toThrow(DomainError);
  });
});

describe('solveYieldFromPrice', () => {
  it('should invert priceFromYield', () => {
    const price = priceFromYield(annual, 0.05);
    expect(solveYieldFromPrice(annual, price)).toBeCloseTo(0.05, 9);
  });

  it('should return the coupon rate for a par price', () => {
    expect(solveYieldFromPrice(semiAnnual, 1000)).toBeCloseTo(0.05, 9);
  });

  it('should accept a custom initial guess', () => {
    const price = priceFromYield(semiAnnual, 0.07);
    expect(solveYieldFromPrice(semiAnnual, price, { initialGuess: 0.2 })).toBeCloseTo(0.07, 9);
  });

  it('should reject a non-positive price', () => {
    expect(() => solveYieldFromPrice(annual, 0)).toThrow(DomainError);
  });

  it('should fail when the iteration budget runs out', () => {
    expect(() => solveYieldFromPrice(annual, 80, { iterations: 1 })).toThrow(DomainError);
  });
});

describe('currentYield', () => {
  it('should divide the annual coupon by the price', () => {
    expect(currentYield(annual, 95)).toBeCloseTo(6 / 95, 12);
  });

  it('should reject a non-positive price', () => {
    expect(() => currentYield(annual, -1)).toThrow(DomainError);
  });
});

describe('computePriceYieldCurve', () => {
  it('should sample prices from zero to twice the coupon by default', () => {
    const [trace] = BondPricing.computePriceYieldCurve(annual);
    expect(trace.type).toBe('scatter');
    expect(trace.mode).toBe('lines+markers');
    expect(trace.name).toBe('Price / Yield');
    expect(trace.x).toHaveLength(20);
    expect(trace.y).toHaveLength(20);
    expect(trace.x[0]).toBe(0);
    expect(trace.y[0]).toBe(112);
    expect(trace.x[19]).toBeCloseTo(0.12, 12);
    expect(trace.y[19]).toBe(89.8597);
  });

  it('should produce prices that fall as yields rise', () => {
    const [trace] = BondPricing.computePriceYieldCurve(semiAnnual, { minYield: 0.01, maxYield: 0.09, points: 5 });
    expect(trace.x).toEqual([0.01, 0.03, 0.05, 0.07, 0.09].map((x) => expect.closeTo(x, 12)));
    for (let i = 1; i < trace.y.length; i++) {
      expect(trace.y[i]).toBeLessThan(trace.y[i - 1]);
    }
    expect(trace.y[2]).toBe(1000);
  });

  it('should reject a degenerate range', () => {
    expect(() => BondPricing.computePriceYieldCurve(annual, { minYield: 0.05, maxYield: 0.05 })).toThrow(DomainError);
    expect(() => BondPricing.computePriceYieldCurve(annual, { points: 1 })).toThrow(DomainError);
  });
});
