import { validateParameters, deepFreeze } from '../src/utils/validation';
import { ValidationError } from '../src/errors';
import { buildParameters } from '../src/test/fixtures';

function issuesOf(input: unknown): string[] {
  try {
    validateParameters(input);
  } catch (err) {
    if (err instanceof ValidationError) return err.issues;
    throw err;
  }
  throw new Error('expected validation to fail');
}

describe('validateParameters', () => {
  it('accepts the baseline parameters and freezes them', () => {
    const params = validateParameters(buildParameters());
    expect(params.amm.feeBps).toBe(7);
    expect(Object.isFrozen(params)).toBe(true);
    expect(Object.isFrozen(params.initialState)).toBe(true);
    expect(Object.isFrozen(params.flow.stochastic)).toBe(true);
  });

  it('rejects a fee of 10000 bps', () => {
    const base = buildParameters();
    expect(issuesOf({ ...base, amm: { ...base.amm, feeBps: 10_000 } })).toEqual([
      'amm.feeBps: fee must be below 10000 bps',
    ]);
  });

  it('rejects non-positive reserves and deposit', () => {
    const base = buildParameters();
    const issues = issuesOf({
      ...base,
      initialState: { ...base.initialState, depositReserve: 0, depositAmount: -1 },
    });
    expect(issues).toEqual([
      'initialState.depositReserve: Number must be greater than 0',
      'initialState.depositAmount: Number must be greater than 0',
    ]);
  });

  it('rejects a rehypothecation fraction outside [0, 1]', () => {
    const base = buildParameters();
    const issues = issuesOf({ ...base, initialState: { ...base.initialState, rehypFraction: 1.5 } });
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^initialState\.rehypFraction: /);
  });

  it('rejects unknown AMM and flow models', () => {
    const base = buildParameters();
    const issues = issuesOf({
      ...base,
      amm: { ...base.amm, type: 'stable_swap' },
      flow: { ...base.flow, model: 'poisson' },
    });
    expect(issues).toHaveLength(2);
    expect(issues[0]).toMatch(/^amm\.type: /);
    expect(issues[1]).toMatch(/^flow\.model: /);
  });

  it('rejects non-integer or non-positive horizon and step count', () => {
    const base = buildParameters();
    const issues = issuesOf({ ...base, horizonDays: 1.5, stepsPerDay: 0 });
    expect(issues.map((issue) => issue.split(':')[0])).toEqual(['horizonDays', 'stepsPerDay']);
  });

  it('rejects a borrowed amount above the borrowed reserve', () => {
    expect(issuesOf(buildParameters({ initialState: { borrowedAmount: 6_000_000 } }))).toEqual([
      'initialState.borrowedAmount: cannot exceed borrowedReserve',
    ]);
  });

  it('rejects seeds outside the 32-bit range', () => {
    expect(issuesOf(buildParameters({ seed: 2 ** 32 + 1 }))).toEqual(['seed: seed must fit in 32 bits']);
    expect(issuesOf(buildParameters({ seed: -1 }))).toEqual(['seed: Number must be greater than or equal to 0']);
  });

  it('accepts the largest 32-bit seed', () => {
    expect(validateParameters(buildParameters({ seed: 2 ** 32 - 1 })).seed).toBe(4_294_967_295);
  });

  it('accepts negative rates', () => {
    const params = validateParameters(buildParameters({ yields: { underlyingApr: -0.02 } }));
    expect(params.yields.underlyingApr).toBe(-0.02);
  });

  it('reports the issue count in the message', () => {
    expect(() => validateParameters({})).toThrow(/^Invalid simulation parameters \(\d+ issue\(s\)\)$/);
  });
});

describe('deepFreeze', () => {
  it('freezes nested objects in place', () => {
    const value = { a: { b: { c: 1 } }, list: [{ d: 2 }] };
    const frozen = deepFreeze(value);
    expect(frozen).toBe(value);
    expect(Object.isFrozen(value.a.b)).toBe(true);
    expect(Object.isFrozen(value.list[0])).toBe(true);
  });
});
