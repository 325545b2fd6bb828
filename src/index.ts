export * from './types.ts';
export * from './errors.ts';

// scoring
export {
  cosineSimilarityAligned,
  getToleranceAt,
  matchPeaks,
} from './scoring/spectralSimilarity.ts';
export {
  createProximityScorer,
  gaussianProximity,
} from './scoring/proximity.ts';
export type { ProximityScorer } from './scoring/proximity.ts';
export {
  compareSpectra,
  createSpectrumComparator,
} from './scoring/spectrumComparator.ts';
export type {
  ComparatorOptions,
  SpectrumComparison,
} from './scoring/spectrumComparator.ts';

// matrix
export {
  DEFAULT_LMAX_SIGMA,
  DEFAULT_RT_SIGMA,
  DEFAULT_TOLERANCE,
  DEFAULT_WEIGHTS,
  resolveScoringOptions,
} from './matrix/resolveScoringOptions.ts';
export type {
  ResolvedScoringOptions,
  ScoringOptions,
} from './matrix/resolveScoringOptions.ts';
export {
  buildScoreMatrix,
  createScoringContext,
  scorePair,
  validateRecord,
} from './matrix/buildScoreMatrix.ts';
export type { PairScore, ScoringContext } from './matrix/buildScoreMatrix.ts';

// assignment
export type { AssignmentStrategy } from './assignment/AssignmentStrategy.ts';
export { greedyStrategy } from './assignment/greedyStrategy.ts';
export { hungarianStrategy } from './assignment/hungarianStrategy.ts';
export {
  getAssignmentStrategy,
  solveAssignment,
} from './assignment/solveAssignment.ts';
export type { SolverName } from './assignment/solveAssignment.ts';

// result
export { assembleResult } from './result/assembleResult.ts';
export type {
  AssembleOptions,
  CompoundMatchReport,
  MatchedCompound,
  UnmatchedRecord,
} from './result/assembleResult.ts';
export { annotatePeaks } from './result/annotatePeaks.ts';
export type { AnnotatedPeak } from './result/annotatePeaks.ts';

// compound
export { getCompoundInfo } from './compound/getCompoundInfo.ts';
export type { CompoundInfo } from './compound/getCompoundInfo.ts';

export { matchCompounds } from './matchCompounds.ts';
export type { MatchOptions } from './matchCompounds.ts';
