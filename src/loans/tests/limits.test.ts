import { maxBorrowForCollateral, ratioForScore } from "../limits.js";

const ladder = { maxRatioBps: 15_000, scoreFree: 800 };

describe('limits', () => {
  test('ratio ladder end points', () => {
    expect(ratioForScore(0, ladder)).toBe(15_000);
    expect(ratioForScore(800, ladder)).toBe(0);
    expect(ratioForScore(1_000, ladder)).toBe(0);
    expect(ratioForScore(-5, ladder)).toBe(15_000);
  });

  test('ratio rounds up between the end points', () => {
    expect(ratioForScore(400, ladder)).toBe(7_500);
    expect(ratioForScore(1, ladder)).toBe(14_982);
    expect(ratioForScore(799, ladder)).toBe(19);
    expect(ratioForScore(400.9, ladder)).toBe(7_500);
  });

  test('ratio never increases with score', () => {
    let prev = Infinity;
    for (let s = 0; s <= 1_000; s++) {
      const r = ratioForScore(s, ladder);
      expect(r).toBeLessThanOrEqual(prev);
      prev = r;
    }
  });

  test('degenerate ladder requires nothing', () => {
    expect(ratioForScore(0, { maxRatioBps: 15_000, scoreFree: 0 })).toBe(0);
  });

  test('max borrow from collateral value and ratio', () => {
    expect(maxBorrowForCollateral(1_500n, 1n, 0, 15_000)).toBe(1_000n);
    expect(maxBorrowForCollateral(750n, 1n, 0, 7_500)).toBe(1_000n);
    // 1.0 unit at 2 500.000000 quote per unit, 150%
    expect(maxBorrowForCollateral(1_000_000n, 2_500_000_000n, 6, 15_000)).toBe(1_666_666_666n);
    expect(() => maxBorrowForCollateral(1n, 1n, 0, 0)).toThrow(RangeError);
  });
});
