import { InvalidConfigurationError } from '../errors.ts';
import type { Channel, MassTolerance, WeightConfig } from '../types.ts';
import { CHANNELS } from '../types.ts';

/** Options for building a score matrix. Every field has a default. */
export interface ScoringOptions {
  /** Weight per channel (default `{ ms: 0.5, rt: 0.3, lmax: 0.2 }`). */
  weights?: WeightConfig;
  /**
   * Peak alignment tolerance, `{ mz }` in Da or `{ ppm }`, never both
   * (default `{ mz: 0.01 }`).
   */
  tolerance?: { mz?: number; ppm?: number };
  /** Width of the retention time kernel in minutes (default 0.5). */
  rtSigma?: number;
  /** Width of the absorption maximum kernel in nm (default 15). */
  lmaxSigma?: number;
}

export interface ResolvedScoringOptions {
  weights: Record<Channel, number>;
  tolerance: MassTolerance;
  rtSigma: number;
  lmaxSigma: number;
}

export const DEFAULT_WEIGHTS: Readonly<Record<Channel, number>> = {
  ms: 0.5,
  rt: 0.3,
  lmax: 0.2,
};

export const DEFAULT_TOLERANCE: MassTolerance = { mz: 0.01 };
export const DEFAULT_RT_SIGMA = 0.5;
export const DEFAULT_LMAX_SIGMA = 15;

function resolveTolerance(tolerance: {
  mz?: number;
  ppm?: number;
}): MassTolerance {
  const { mz, ppm } = tolerance;
  if (mz !== undefined && ppm !== undefined) {
    throw new InvalidConfigurationError(
      'tolerance',
      'Set either an absolute (mz) or a relative (ppm) tolerance, not both',
    );
  }
  if (mz !== undefined) {
    if (!Number.isFinite(mz) || mz < 0) {
      throw new InvalidConfigurationError(
        'tolerance.mz',
        `Mass tolerance must be a non-negative number, got ${String(mz)}`,
      );
    }
    return { mz };
  }
  if (ppm !== undefined) {
    if (!Number.isFinite(ppm) || ppm < 0) {
      throw new InvalidConfigurationError(
        'tolerance.ppm',
        `ppm tolerance must be a non-negative number, got ${String(ppm)}`,
      );
    }
    return { ppm };
  }
  throw new InvalidConfigurationError(
    'tolerance',
    'A mass tolerance is required: set mz or ppm',
  );
}

function resolveSigma(name: string, sigma: number): number {
  if (!Number.isFinite(sigma) || sigma <= 0) {
    throw new InvalidConfigurationError(
      name,
      `${name} must be a positive number, got ${String(sigma)}`,
    );
  }
  return sigma;
}

/**
 * Apply defaults and check every parameter.
 * @param options - User options.
 * @returns Options with all fields set.
 * @throws {InvalidConfigurationError} On a negative weight, a non-positive
 * sigma, or a tolerance with both or neither of `mz` and `ppm`.
 */
export function resolveScoringOptions(
  options: ScoringOptions = {},
): ResolvedScoringOptions {
  const {
    weights: weightConfig = DEFAULT_WEIGHTS,
    tolerance = DEFAULT_TOLERANCE,
    rtSigma = DEFAULT_RT_SIGMA,
    lmaxSigma = DEFAULT_LMAX_SIGMA,
  } = options;

  const weights: Record<Channel, number> = { ms: 0, rt: 0, lmax: 0 };
  for (const channel of CHANNELS) {
    const weight = weightConfig[channel] ?? 0;
    if (!Number.isFinite(weight) || weight < 0) {
      throw new InvalidConfigurationError(
        `weights.${channel}`,
        `Weight of channel "${channel}" must be a non-negative number, got ${String(weight)}`,
      );
    }
    weights[channel] = weight;
  }

  return {
    weights,
    tolerance: resolveTolerance(tolerance),
    rtSigma: resolveSigma('rtSigma', rtSigma),
    lmaxSigma: resolveSigma('lmaxSigma', lmaxSigma),
  };
}
