import * as fc from 'fast-check';
import { SwapEngine } from '../src/modules/swap';
import { LiquidityExhaustedError, ValidationError } from '../src/errors';

/**
 * Constant-product swap math, independent of any run.
 */
describe('Swap Math', () => {
  let swap: SwapEngine;

  beforeEach(() => {
    swap = new SwapEngine(30);
  });

  describe('constructor', () => {
    it('rejects a fee of 10000 bps or more', () => {
      expect(() => new SwapEngine(10_000)).toThrow(ValidationError);
    });

    it('rejects a negative fee', () => {
      expect(() => new SwapEngine(-1)).toThrow(ValidationError);
    });

    it('accepts a zero fee', () => {
      expect(new SwapEngine(0).feeBps).toBe(0);
    });
  });

  describe('getAmountOut', () => {
    it('calculates correct output for standard swap', () => {
      const out = swap.getAmountOut(1_000, 1_000_000, 1_000_000);
      expect(out).toBeCloseTo((1_000_000 * 997) / 1_000_997, 9);
    });

    it('larger input yields larger output', () => {
      const out1 = swap.getAmountOut(1_000, 1_000_000, 1_000_000);
      const out2 = swap.getAmountOut(2_000, 1_000_000, 1_000_000);
      expect(out2).toBeGreaterThan(out1);
    });

    it('higher fee yields lower output', () => {
      const outLowFee = new SwapEngine(10).getAmountOut(1_000, 1_000_000, 1_000_000);
      const outHighFee = new SwapEngine(100).getAmountOut(1_000, 1_000_000, 1_000_000);
      expect(outLowFee).toBeGreaterThan(outHighFee);
    });

    it('returns zero for zero input', () => {
      expect(swap.getAmountOut(0, 1_000, 1_000)).toBe(0);
    });

    it('output never increases with the fee', () => {
      fc.assert(
        fc.property(
          fc.integer({ min: 0, max: 9_998 }),
          fc.integer({ min: 1, max: 9_999 }),
          fc.double({ min: 1, max: 1e9, noNaN: true }),
          (low, delta, amountIn) => {
            const high = Math.min(low + delta, 9_999);
            const outLow = new SwapEngine(low).getAmountOut(amountIn, 5e6, 5e6);
            const outHigh = new SwapEngine(high).getAmountOut(amountIn, 5e6, 5e6);
            return outLow >= outHigh;
          },
        ),
      );
    });
  });

  describe('getAmountIn', () => {
    it('calculates correct input for desired output', () => {
      const amountIn = swap.getAmountIn(1_000, 1_000_000, 1_000_000);
      expect(amountIn).toBeGreaterThan(1_000);
      expect(swap.getAmountOut(amountIn, 1_000_000, 1_000_000)).toBeCloseTo(1_000, 6);
    });

    it('throws when output reaches the reserve', () => {
      expect(() => swap.getAmountIn(2_000, 1_000, 1_000)).toThrow('Insufficient reserve');
    });

    it('returns zero for zero output', () => {
      expect(swap.getAmountIn(0, 1_000, 1_000)).toBe(0);
    });
  });

  describe('swap', () => {
    it('preserves the reserve product exactly when the fee is zero', () => {
      const result = new SwapEngine(0).swap({ deposit: 1_000_000, borrowed: 2_000_000 }, 5_000);
      const k = result.reserves.deposit * result.reserves.borrowed;
      expect(Math.abs(k - 2e12) / 2e12).toBeLessThan(1e-12);
    });

    it('preserves the reserve product across a chain of zero-fee swaps', () => {
      const engine = new SwapEngine(0);
      fc.assert(
        fc.property(fc.array(fc.double({ min: 0, max: 1e6, noNaN: true }), { maxLength: 20 }), (amounts) => {
          let reserves = { deposit: 1e6, borrowed: 1e6 };
          for (const amountIn of amounts) {
            reserves = engine.swap(reserves, amountIn).reserves;
            const k = reserves.deposit * reserves.borrowed;
            if (!(Math.abs(k - 1e12) / 1e12 < 1e-9) || !(reserves.borrowed > 0)) return false;
          }
          return true;
        }),
      );
    });

    it('grows the reserve product when a fee is charged', () => {
      const result = swap.swap({ deposit: 1_000_000, borrowed: 1_000_000 }, 10_000);
      expect(result.reserves.deposit * result.reserves.borrowed).toBeGreaterThan(1e12);
    });

    it('never decreases the reserve product when a fee is charged', () => {
      fc.assert(
        fc.property(
          fc.integer({ min: 1, max: 9_999 }),
          fc.double({ min: 1e3, max: 1e9, noNaN: true }),
          fc.double({ min: 1e3, max: 1e9, noNaN: true }),
          fc.double({ min: 0, max: 1e12, noNaN: true }),
          (feeBps, deposit, borrowed, amountIn) => {
            const result = new SwapEngine(feeBps).swap({ deposit, borrowed }, amountIn);
            const before = deposit * borrowed;
            const after = result.reserves.deposit * result.reserves.borrowed;
            return after >= before * (1 - 1e-9) && result.reserves.borrowed > 0;
          },
        ),
      );
    });

    it('books the fee on the accepted input', () => {
      const result = swap.swap({ deposit: 1_000_000, borrowed: 1_000_000 }, 10_000);
      expect(result.amountIn).toBe(10_000);
      expect(result.feeRevenue).toBeCloseTo(30, 9);
      expect(result.reserves.deposit).toBe(1_010_000);
      expect(result.reserves.borrowed).toBeCloseTo(1_000_000 - result.amountOut, 9);
      expect(result.clamped).toBe(false);
    });

    it('is a no-op for zero input', () => {
      const result = swap.swap({ deposit: 500, borrowed: 700 }, 0);
      expect(result).toEqual({
        amountIn: 0,
        amountOut: 0,
        feeRevenue: 0,
        reserves: { deposit: 500, borrowed: 700 },
        clamped: false,
      });
    });

    it('caps output so the reserve stays positive', () => {
      const result = new SwapEngine(0).swap({ deposit: 1_000_000, borrowed: 1_000_000 }, 1e20);
      expect(result.clamped).toBe(true);
      expect(result.amountOut).toBeCloseTo(999_999, 6);
      expect(result.reserves.borrowed).toBeCloseTo(1, 6);
      expect(result.amountIn).toBeLessThan(1e20);
      expect(result.amountIn).toBeCloseTo(999_999e6, -3);
    });

    it('caps an unbounded input', () => {
      const result = swap.swap({ deposit: 1_000, borrowed: 1_000 }, Number.POSITIVE_INFINITY);
      expect(result.clamped).toBe(true);
      expect(Number.isFinite(result.amountIn)).toBe(true);
      expect(result.reserves.borrowed).toBeGreaterThan(0);
    });

    it('throws LiquidityExhaustedError when a reserve is already empty', () => {
      expect(() => swap.swap({ deposit: 1_000_000, borrowed: 0 }, 100)).toThrow(LiquidityExhaustedError);
    });

    it('rejects negative and NaN input', () => {
      expect(() => swap.swap({ deposit: 1_000, borrowed: 1_000 }, -1)).toThrow(ValidationError);
      expect(() => swap.swap({ deposit: 1_000, borrowed: 1_000 }, Number.NaN)).toThrow(ValidationError);
    });

    it('does not mutate the reserves it is given', () => {
      const reserves = Object.freeze({ deposit: 1_000_000, borrowed: 1_000_000 });
      swap.swap(reserves, 10_000);
      expect(reserves).toEqual({ deposit: 1_000_000, borrowed: 1_000_000 });
    });
  });

  describe('analytics', () => {
    it('reports the spot price of the deposit asset', () => {
      expect(swap.spotPrice({ deposit: 2_000_000, borrowed: 1_000_000 })).toBe(0.5);
    });

    it('reports fee-free price impact as a fraction', () => {
      expect(swap.priceImpact({ deposit: 1_000_000, borrowed: 1_000_000 }, 10_000)).toBeCloseTo(1 / 101, 10);
    });

    it('reports zero impact for zero input', () => {
      expect(swap.priceImpact({ deposit: 1_000_000, borrowed: 1_000_000 }, 0)).toBe(0);
    });
  });
});
