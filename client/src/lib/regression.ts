import * as d3 from 'd3';
import { DegenerateInputError } from './errors';

export interface LinearFit {
  readonly slope: number;
  readonly intercept: number;
  predict(x: number): number;
}

/**
 * Ordinary least-squares line through (xs[i], ys[i]).
 *
 * slope = Σ(x - x̄)(y - ȳ) / Σ(x - x̄)², intercept = ȳ - slope·x̄.
 * Order of the pairs does not matter, only that the two series line up.
 */
export function fitLinear(xs: readonly number[], ys: readonly number[]): LinearFit {
  if (xs.length !== ys.length) {
    throw new DegenerateInputError(`Cannot fit ${xs.length} x values against ${ys.length} y values`);
  }

  const meanX = d3.mean(xs);
  const meanY = d3.mean(ys);
  if (meanX === undefined || meanY === undefined) {
    throw new DegenerateInputError('Cannot fit a line through zero points');
  }

  const numerator = d3.sum(xs, (x, i) => (x - meanX) * (ys[i] - meanY));
  const denominator = d3.sum(xs, x => (x - meanX) ** 2);
  if (denominator === 0) {
    throw new DegenerateInputError('Independent variable has zero variance');
  }

  const slope = numerator / denominator;
  const intercept = meanY - slope * meanX;

  return {
    slope,
    intercept,
    predict: (x: number) => intercept + slope * x,
  };
}
