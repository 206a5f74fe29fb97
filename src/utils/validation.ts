import { z } from 'zod';
import { ValidationError } from '../errors';
import { ErrorParser } from '../errors/parser';
import { AmmType, FlowModel } from '../types/common';
import { Parameters } from '../types/params';
import { PRECISION } from '../config';

const finite = () => z.number().finite();
const positive = () => finite().positive();
const nonNegative = () => finite().nonnegative();

/**
 * Schema for validated run parameters.
 *
 * Every range the engine relies on is enforced here, once, before
 * the run starts.
 */
export const ParametersSchema: z.ZodType<Parameters> = z
  .object({
    horizonDays: z.number().int().positive(),
    stepsPerDay: z.number().int().positive(),
    seed: z.number().int().min(0).max(PRECISION.MAX_SEED, 'seed must fit in 32 bits'),
    amm: z.object({
      type: z.nativeEnum(AmmType),
      feeBps: nonNegative().lt(PRECISION.BPS_DENOMINATOR, 'fee must be below 10000 bps'),
    }),
    initialState: z.object({
      depositReserve: positive(),
      borrowedReserve: positive(),
      depositAmount: positive(),
      rehypFraction: finite().min(0).max(1),
      borrowedAmount: nonNegative(),
    }),
    yields: z.object({
      underlyingApr: finite(),
      rehypApr: finite(),
      borrowCostApr: finite(),
    }),
    opsCostPerDay: nonNegative(),
    flow: z.object({
      model: z.nativeEnum(FlowModel),
      deterministicBpsOfPool: nonNegative(),
      stochastic: z.object({
        muDaily: finite(),
        sigmaDaily: nonNegative(),
        baseBpsOfPool: nonNegative(),
      }),
    }),
    risk: z.object({
      maxBorrowMultiple: positive(),
    }),
    markToMarket: z.object({
      priceA: positive(),
      priceB: positive(),
    }),
    pegDeviationStdBps: nonNegative(),
  })
  .superRefine((params, ctx) => {
    if (params.initialState.borrowedAmount > params.initialState.borrowedReserve) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['initialState', 'borrowedAmount'],
        message: 'cannot exceed borrowedReserve',
      });
    }
  });

/**
 * Validate raw input into immutable run parameters.
 *
 * @throws ValidationError listing every failed field
 */
export function validateParameters(input: unknown): Parameters {
  const result = ParametersSchema.safeParse(input);
  if (!result.success) {
    const issues = ErrorParser.formatIssues(result.error);
    throw new ValidationError(`Invalid simulation parameters (${issues.length} issue(s))`, issues);
  }
  return deepFreeze(result.data);
}

/**
 * Recursively freeze an object graph in place.
 */
export function deepFreeze<T extends object>(value: T): T {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  Object.freeze(value);
  return value;
}
