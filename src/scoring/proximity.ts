/** Similarity of two scalar measurements, 1 when equal. */
export type ProximityScorer = (a?: number, b?: number) => number;

/**
 * Gaussian kernel on the difference of two values:
 * `exp(-0.5 * ((a - b) / sigma)^2)`.
 *
 * Returns 0 when either value is absent or when `sigma` is not a positive
 * finite number.
 * @param a - First value.
 * @param b - Second value.
 * @param sigma - Width of the kernel, in the unit of the values.
 */
export function gaussianProximity(
  a: number | undefined,
  b: number | undefined,
  sigma: number,
): number {
  if (a === undefined || b === undefined) return 0;
  if (!Number.isFinite(sigma) || sigma <= 0) return 0;
  const z = (a - b) / sigma;
  return Math.exp(-0.5 * z * z);
}

/**
 * Bind a kernel width once, e.g. 0.5 min for retention times or 15 nm for
 * absorption maxima.
 * @param sigma - Width of the kernel.
 * @returns A scorer for pairs of values.
 */
export function createProximityScorer(sigma: number): ProximityScorer {
  return (a, b) => gaussianProximity(a, b, sigma);
}
