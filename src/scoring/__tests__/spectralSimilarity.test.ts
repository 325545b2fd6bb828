import { expect, test } from 'vitest';

import {
  cosineSimilarityAligned,
  getToleranceAt,
  matchPeaks,
} from '../spectralSimilarity.ts';

test('identical spectra score 1', () => {
  const spectrum = { x: [93.0335, 121.0284, 139.039], y: [20, 65, 100] };
  const copy = { x: [...spectrum.x], y: [...spectrum.y] };

  expect(cosineSimilarityAligned(spectrum, copy, { mz: 0.01 })).toBeCloseTo(1, 6);
});

test('spectra without any peak within tolerance score 0', () => {
  const predicted = { x: [100, 200], y: [1, 1] };
  const observed = { x: [100.5, 300], y: [1, 1] };

  expect(cosineSimilarityAligned(predicted, observed, { mz: 0.01 })).toBe(0);
});

test('cosine of the aligned intensities', () => {
  const predicted = { x: [100, 200], y: [1, 1] };
  const observed = { x: [100.005, 200.004], y: [1, 3] };

  // [1, 1] . [1, 3] / (sqrt(2) * sqrt(10))
  expect(cosineSimilarityAligned(predicted, observed, { mz: 0.01 })).toBeCloseTo(
    4 / Math.sqrt(20),
    10,
  );
});

test('peaks without partner are left out of the comparison', () => {
  const predicted = { x: [100, 200, 300], y: [2, 4, 8] };
  const observed = { x: [100, 200], y: [1, 2] };

  expect(cosineSimilarityAligned(predicted, observed, { mz: 0.01 })).toBeCloseTo(1, 10);
});

test('non-positive intensities are removed before alignment', () => {
  const predicted = { x: [100, 200], y: [4, 0] };
  const observed = { x: [100, 200], y: [0, 4] };

  expect(cosineSimilarityAligned(predicted, observed, { mz: 0.01 })).toBe(0);
});

test('empty spectra score 0', () => {
  const empty = { x: [], y: [] };
  const spectrum = { x: [100], y: [1] };

  expect(cosineSimilarityAligned(empty, spectrum, { mz: 0.01 })).toBe(0);
  expect(cosineSimilarityAligned(spectrum, empty, { mz: 0.01 })).toBe(0);
});

test('ppm tolerance scales with the predicted mass', () => {
  const predicted = { x: [500], y: [1] };
  const observed = { x: [500.004], y: [1] };

  expect(getToleranceAt(500, { ppm: 10 })).toBeCloseTo(0.005, 12);
  expect(cosineSimilarityAligned(predicted, observed, { ppm: 10 })).toBeCloseTo(1, 10);
  expect(cosineSimilarityAligned(predicted, observed, { ppm: 5 })).toBe(0);
});

test('swapping well separated spectra does not change the score', () => {
  const a = { x: [100, 150, 200], y: [10, 50, 30] };
  const b = { x: [100.002, 150.001, 199.998, 250], y: [12, 45, 35, 5] };

  const forward = cosineSimilarityAligned(a, b, { mz: 0.01 });
  const backward = cosineSimilarityAligned(b, a, { mz: 0.01 });

  expect(forward).toBeGreaterThan(0.99);
  expect(backward).toBeCloseTo(forward, 12);
});

test('crowded peaks pair differently when the spectra are swapped', () => {
  expect(matchPeaks([100, 100.008], [100.005], { mz: 0.01 })).toStrictEqual([
    [0, 0],
  ]);
  expect(matchPeaks([100.005], [100, 100.008], { mz: 0.01 })).toStrictEqual([
    [0, 1],
  ]);
});

test('predicted peaks are served in ascending m/z', () => {
  expect(matchPeaks([100.004, 100], [100.003], { mz: 0.01 })).toStrictEqual([
    [1, 0],
  ]);
});

test('equidistant neighbours: the upper one wins', () => {
  expect(matchPeaks([100], [99.5, 100.5], { mz: 1 })).toStrictEqual([[0, 1]]);
});

test('each observed peak is used at most once', () => {
  const pairs = matchPeaks([99.999, 100, 100.001], [100], { mz: 0.01 });

  expect(pairs).toStrictEqual([[0, 0]]);
});

test('observed indices refer to the unsorted input', () => {
  const pairs = matchPeaks([100, 200], [200.001, 50, 100.002], { mz: 0.01 });

  expect(pairs).toStrictEqual([
    [0, 2],
    [1, 0],
  ]);
});

test('mismatched array lengths are rejected', () => {
  expect(() =>
    cosineSimilarityAligned({ x: [100, 200], y: [1] }, { x: [100], y: [1] }, { mz: 0.01 }),
  ).toThrow(RangeError);
});

test('very large and very small intensities still give a bounded cosine', () => {
  const huge = { x: [100, 200], y: [1e200, 2e200] };
  const tiny = { x: [100, 200], y: [1e-200, 2e-200] };

  expect(cosineSimilarityAligned(huge, { x: [...huge.x], y: [...huge.y] }, { mz: 0.01 })).toBeCloseTo(1, 10);
  expect(cosineSimilarityAligned(tiny, { x: [...tiny.x], y: [...tiny.y] }, { mz: 0.01 })).toBeCloseTo(1, 10);
  expect(cosineSimilarityAligned(huge, tiny, { mz: 0.01 })).toBeCloseTo(1, 10);
});

test('an infinite intensity is rejected', () => {
  expect(() =>
    cosineSimilarityAligned(
      { x: [100], y: [Number.POSITIVE_INFINITY] },
      { x: [100], y: [1] },
      { mz: 0.01 },
    ),
  ).toThrow(RangeError);
});
