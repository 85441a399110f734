import * as d3 from 'd3';

export type RandomSource = () => number;

/**
 * Draw one element uniformly from `population`. Repeated entries are how
 * weight is expressed: a value listed k times is k times as likely.
 */
export function weightedChoice<T>(population: readonly T[], random: RandomSource = Math.random): T {
  if (population.length === 0) {
    throw new RangeError('Cannot choose from an empty population');
  }
  const index = d3.randomInt.source(random)(population.length)();
  return population[index];
}
