/**
 * Audit metrics for a matched pair of spectra.
 *
 * Wraps {@link MSComparator} from `ms-spectrum`, which reports cosine,
 * tanimoto and the number of common peaks on mass- and intensity-weighted
 * vectors. These numbers are shown next to the aggregate score in reports;
 * they never enter the score matrix.
 */

import { MSComparator } from 'ms-spectrum';

import type { MassSpectrum, MassTolerance } from '../types.ts';

import { getToleranceAt } from './spectralSimilarity.ts';

/** Parameters for the comparator. */
export interface ComparatorOptions {
  /** Peak alignment tolerance. */
  tolerance: MassTolerance;
  /** Weight given to mass in the similarity vector (default 0). */
  massPower?: number;
  /** Weight given to intensity in the similarity vector (default 1). */
  intensityPower?: number;
}

/** Result returned by {@link compareSpectra}. */
export interface SpectrumComparison {
  cosine: number;
  tanimoto: number;
  nbCommonPeaks: number;
  nbPeaks1: number;
  nbPeaks2: number;
}

/**
 * Create a reusable comparator instance from the given options.
 * @param options - Comparator options.
 * @returns An `MSComparator` instance.
 */
export function createSpectrumComparator(
  options: ComparatorOptions,
): MSComparator {
  const { tolerance, massPower = 0, intensityPower = 1 } = options;
  return new MSComparator({
    delta: (mass: number) => getToleranceAt(mass, tolerance),
    massPower,
    intensityPower,
  });
}

/**
 * Compare a predicted spectrum with an observed one.
 * @param comparator - An `MSComparator` instance.
 * @param predicted - Predicted spectrum.
 * @param observed - Observed spectrum.
 * @returns Similarity metrics.
 */
export function compareSpectra(
  comparator: MSComparator,
  predicted: MassSpectrum,
  observed: MassSpectrum,
): SpectrumComparison {
  return comparator.getSimilarity(predicted, observed) as SpectrumComparison;
}
