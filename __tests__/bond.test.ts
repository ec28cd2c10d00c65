import { describe, it, expect } from 'vitest';
import {
  Bond,
  DurationWeighting,
  InvalidBondError,
  isBondValuationError,
  LengthMismatchError,
  PeriodCountMode,
} from '../src';

describe('Bond.initialize', () => {
  it('should fill in defaults', () => {
    const bond = Bond.initialize();
    expect(bond.toJSON()).toEqual({
      faceValue: 100,
      tenorYears: 5,
      couponRate: 0.05,
      frequency: 2,
      periodCountMode: PeriodCountMode.TRUNCATE,
    });
    expect(bond.totalPeriods).toBe(10);
    expect(bond.couponPerPeriod).toBe(2.5);
  });

  it('should reject invalid terms at construction', () => {
    expect(() => Bond.initialize({ faceValue: 0 })).toThrow(InvalidBondError);
    expect(() => Bond.initialize({ frequency: 0 })).toThrow(InvalidBondError);
    expect(() => Bond.initialize({ tenorYears: 0.25, frequency: 1 })).toThrow(InvalidBondError);
    expect(() => Bond.initialize({ tenorYears: 1.5, frequency: 1, periodCountMode: PeriodCountMode.STRICT }))
      .toThrow(InvalidBondError);
  });

  it('should be frozen', () => {
    const bond = Bond.initialize();
    expect(Object.isFrozen(bond)).toBe(true);
  });
});

describe('Bond valuation', () => {
  const bond = Bond.initialize({ faceValue: 100, tenorYears: 2, couponRate: 0.06, frequency: 1 });

  it('should expose its schedule', () => {
    expect(bond.schedule.amounts).toEqual([6, 106]);
    expect(bond.schedule.paymentTimes).toEqual([1, 2]);
  });

  it('should price from a zero curve', () => {
    expect(bond.getCurvePrice([0.05, 0.055])).toBe(101.2098);
    expect(() => bond.getCurvePrice([0.05])).toThrow(LengthMismatchError);
  });

  it('should price from a flat yield and back', () => {
    const price = bond.getPrice(0.05);
    expect(price).toBeCloseTo(101.85941043083900, 10);
    expect(bond.getYield(price)).toBeCloseTo(0.05, 9);
  });

  it('should report current yield', () => {
    expect(bond.getCurrentYield(100)).toBeCloseTo(0.06, 12);
  });

  it('should report durations and statistics', () => {
    expect(bond.getDuration(0.05)).toBe(1.9393);
    expect(bond.getModifiedDuration(0.05)).toBe(1.8469);
    expect(bond.getDuration(0.05, DurationWeighting.PERIODIC)).toBe(1.9439);
    expect(bond.getStatistics(0.05)).toEqual({
      price: 101.8594,
      macaulayDuration: 1.9393,
      modifiedDuration: 1.8469,
    });
  });

  it('should build curves', () => {
    expect(bond.getPriceYieldCurve({ points: 2 })[0].y).toEqual([112, 89.8597]);
    expect(bond.getDurationCurve({ points: 2 })[0].x).toEqual([0, 0.12]);
  });

  it('should build a dated cash-flow table', () => {
    const rows = bond.getCashflowSummary('2025-03-01');
    expect(rows.map((r) => [r.dateLabel, r.total])).toEqual([
      ['2026-03-01', 6],
      ['2027-03-01', 106],
    ]);
  });
});

describe('Bond copies', () => {
  const bond = Bond.initialize();

  it('should return a new bond from each setter', () => {
    const longer = bond.withTenor(10);
    expect(longer).not.toBe(bond);
    expect(longer.tenorYears).toBe(10);
    expect(bond.tenorYears).toBe(5);

    expect(bond.withFaceValue(1000).faceValue).toBe(1000);
    expect(bond.withCouponRate(0.07).couponRate).toBe(0.07);
    expect(bond.withFrequency(4).totalPeriods).toBe(20);
    expect(bond.withPeriodCountMode(PeriodCountMode.STRICT).periodCountMode).toBe(PeriodCountMode.STRICT);
  });

  it('should validate setter input', () => {
    expect(() => bond.withCouponRate(-0.01)).toThrow(InvalidBondError);
  });
});

describe('Bond JSON', () => {
  it('should round-trip through JSON', () => {
    const bond = Bond.initialize({ faceValue: 1000, tenorYears: 3, couponRate: 0.045, frequency: 4 });
    const restored = Bond.parseFromJSON(JSON.stringify(bond));
    expect(restored.toJSON()).toEqual(bond.toJSON());
  });

  it('should apply defaults to partial objects', () => {
    expect(Bond.parseFromJSON({ couponRate: 0.08 }).toJSON()).toEqual({
      faceValue: 100,
      tenorYears: 5,
      couponRate: 0.08,
      frequency: 2,
      periodCountMode: PeriodCountMode.TRUNCATE,
    });
  });

  it('should reject malformed JSON', () => {
    expect(() => Bond.parseFromJSON('{"faceValue":')).toThrow(InvalidBondError);
  });

  it('should reject wrongly typed fields', () => {
    try {
      Bond.parseFromJSON({ faceValue: '100' });
      expect.unreachable();
    } catch (e) {
      expect(isBondValuationError(e)).toBe(true);
      expect(e).toBeInstanceOf(InvalidBondError);
    }
  });
});
