// packages/estimator/src/odds.ts
// Weighted log-odds under a multinomial model with a Dirichlet prior
// (Monroe, Colaresi & Quinn 2008, https://doi.org/10.1093/pan/mpn018).

import type { Estimate, PseudoCounts } from '@logodds/core';

/** Y: pseudo-count mass of the whole table. */
export function totalMass(pseudo: PseudoCounts[]): number {
  let total = 0;
  for (const p of pseudo) total += p.yWi;
  return total;
}

export function estimate({ yWi, yW, nI }: PseudoCounts, totalY: number): Estimate {
  const omegaWi = yWi / (nI - yWi);   // feature vs rest of its set
  const omegaW = yW / (totalY - yW);  // feature vs rest of the table
  const deltaWi = Math.log(omegaWi) - Math.log(omegaW);
  const sigma2Wi = 1 / yWi + 1 / yW;
  const zetaWi = deltaWi / Math.sqrt(sigma2Wi);
  return { omegaWi, omegaW, deltaWi, sigma2Wi, zetaWi };
}

export function computeEstimates(pseudo: PseudoCounts[]): Estimate[] {
  const totalY = totalMass(pseudo);
  return pseudo.map(p => estimate(p, totalY));
}
