/** Similarity channels combined into one aggregate score. */
export type Channel = 'ms' | 'rt' | 'lmax';

export const CHANNELS: readonly Channel[] = ['ms', 'rt', 'lmax'];

/**
 * Centroided mass spectrum as parallel arrays, `x` holding m/z values and
 * `y` the corresponding intensities.
 */
export interface MassSpectrum {
  x: number[];
  y: number[];
}

/** Chromatographic region an observed peak was integrated from. */
export interface PeakRegion {
  /** Start of the peak in minutes. */
  start: number;
  /** End of the peak in minutes. */
  end: number;
  apex?: number;
  area?: number;
}

/** A candidate product supplied by a prediction service. */
export interface PredictedRecord {
  /** Identity of the compound, usually a SMILES. */
  label: string;
  spectrum?: MassSpectrum;
  /** Retention time in minutes. */
  rt?: number;
  /** Absorption maximum in nm. */
  lmax?: number;
}

/** A peak extracted from an LC-MS run. */
export interface ObservedRecord {
  spectrum?: MassSpectrum;
  /** Retention time in minutes. */
  rt?: number;
  /** Absorption maximum in nm. */
  lmax?: number;
  peak?: PeakRegion;
}

/** Non-negative weight per channel. A missing channel weighs 0. */
export type WeightConfig = Partial<Record<Channel, number>>;

/**
 * Peak alignment tolerance: absolute in Da, or relative in ppm of the
 * predicted m/z. Exactly one of the two is set.
 */
export type MassTolerance =
  | { mz: number; ppm?: undefined }
  | { ppm: number; mz?: undefined };

/** Dense table of aggregate scores, one row per predicted record. */
export type ScoreMatrix = number[][];

export interface AssignedPair {
  predictedIndex: number;
  observedIndex: number;
  score: number;
}

export interface AssignmentResult {
  pairs: AssignedPair[];
  /** Sum of the matrix cells of all pairs. */
  totalScore: number;
  matrix: ScoreMatrix;
  /** Name of the strategy that produced the pairs. */
  strategy: string;
  /** `true` when the pairs come from a heuristic that is not guaranteed optimal. */
  degraded: boolean;
}
