/**
 * MS similarity between a predicted and an observed centroided spectrum.
 *
 * Peaks are paired one to one within a mass tolerance and the cosine is
 * computed on the intensities of the paired peaks only. Peaks without a
 * partner on the other side do not take part in the comparison.
 *
 * The pairing is greedy in ascending predicted m/z. For well separated
 * peaks it does not depend on which spectrum is called "predicted", but
 * when several peaks crowd inside one tolerance window the result of
 * swapping the two spectra may differ: the score is symmetric only as an
 * approximation.
 */

import type { MassSpectrum, MassTolerance } from '../types.ts';

/**
 * Absolute tolerance in Da at a given mass.
 * @param mass - Predicted m/z.
 * @param tolerance - Absolute or ppm tolerance.
 * @returns The allowed m/z difference.
 */
export function getToleranceAt(mass: number, tolerance: MassTolerance): number {
  if (tolerance.ppm !== undefined) {
    return (tolerance.ppm * Math.abs(mass)) / 1e6;
  }
  return tolerance.mz;
}

/** First index of `sorted` whose value is >= `value`. */
function lowerBound(sorted: number[], value: number): number {
  let low = 0;
  let high = sorted.length;
  while (low < high) {
    const middle = (low + high) >>> 1;
    if (sorted[middle] < value) {
      low = middle + 1;
    } else {
      high = middle;
    }
  }
  return low;
}

/**
 * Pair predicted and observed m/z values one to one.
 *
 * Predicted masses are visited in ascending order. Each one takes the
 * closest observed mass that is still free, looking at the nearest free
 * neighbour below and above its position in the sorted observed list.
 * On equal distance the neighbour above wins.
 * @param predicted - Predicted m/z values, in any order.
 * @param observed - Observed m/z values, in any order.
 * @param tolerance - Maximal allowed m/z difference.
 * @returns `[predictedIndex, observedIndex]` pairs in ascending predicted m/z.
 */
export function matchPeaks(
  predicted: number[],
  observed: number[],
  tolerance: MassTolerance,
): Array<[number, number]> {
  if (predicted.length === 0 || observed.length === 0) return [];

  const observedOrder = observed
    .map((_, index) => index)
    .toSorted((a, b) => observed[a] - observed[b]);
  const sortedMasses = observedOrder.map((index) => observed[index]);
  const used = new Array<boolean>(sortedMasses.length).fill(false);

  const predictedOrder = predicted
    .map((_, index) => index)
    .toSorted((a, b) => predicted[a] - predicted[b]);

  const pairs: Array<[number, number]> = [];
  for (const predictedIndex of predictedOrder) {
    const mass = predicted[predictedIndex];
    const position = lowerBound(sortedMasses, mass);

    let above = position;
    while (above < sortedMasses.length && used[above]) above++;
    let below = position - 1;
    while (below >= 0 && used[below]) below--;

    const allowed = getToleranceAt(mass, tolerance);
    let best = -1;
    let bestDelta = Number.POSITIVE_INFINITY;
    for (const candidate of [above, below]) {
      if (candidate < 0 || candidate >= sortedMasses.length) continue;
      const delta = Math.abs(sortedMasses[candidate] - mass);
      if (delta <= allowed && delta < bestDelta) {
        best = candidate;
        bestDelta = delta;
      }
    }

    if (best >= 0) {
      used[best] = true;
      pairs.push([predictedIndex, observedOrder[best]]);
    }
  }
  return pairs;
}

function keepPositivePeaks(spectrum: MassSpectrum): MassSpectrum {
  if (spectrum.x.length !== spectrum.y.length) {
    throw new RangeError(
      `Spectrum has ${String(spectrum.x.length)} m/z values but ${String(spectrum.y.length)} intensities`,
    );
  }
  const x: number[] = [];
  const y: number[] = [];
  for (let i = 0; i < spectrum.x.length; i++) {
    if (spectrum.y[i] === Number.POSITIVE_INFINITY) {
      throw new RangeError(`Intensity at m/z ${String(spectrum.x[i])} is not finite`);
    }
    if (spectrum.y[i] > 0) {
      x.push(spectrum.x[i]);
      y.push(spectrum.y[i]);
    }
  }
  return { x, y };
}

/**
 * Cosine similarity of two spectra after one-to-one peak alignment.
 * @param predicted - Predicted spectrum.
 * @param observed - Observed spectrum.
 * @param tolerance - Alignment tolerance.
 * @returns A value in [0, 1]; 0 when a spectrum is empty or no peak aligns.
 */
export function cosineSimilarityAligned(
  predicted: MassSpectrum,
  observed: MassSpectrum,
  tolerance: MassTolerance,
): number {
  const first = keepPositivePeaks(predicted);
  const second = keepPositivePeaks(observed);
  if (first.x.length === 0 || second.x.length === 0) return 0;

  const pairs = matchPeaks(first.x, second.x, tolerance);
  if (pairs.length === 0) return 0;

  // Scaled by their maxima so that squares neither overflow nor underflow.
  const vector1 = pairs.map(([i]) => first.y[i]);
  const vector2 = pairs.map(([, j]) => second.y[j]);
  const max1 = Math.max(...vector1);
  const max2 = Math.max(...vector2);

  let dot = 0;
  let norm1 = 0;
  let norm2 = 0;
  for (let k = 0; k < pairs.length; k++) {
    const a = vector1[k] / max1;
    const b = vector2[k] / max2;
    dot += a * b;
    norm1 += a * a;
    norm2 += b * b;
  }

  const similarity = dot / (Math.sqrt(norm1) * Math.sqrt(norm2));
  return Math.min(1, Math.max(0, similarity));
}
