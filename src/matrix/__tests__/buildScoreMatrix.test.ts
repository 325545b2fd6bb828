import { expect, test } from 'vitest';

import { InvalidConfigurationError, MalformedRecordError } from '../../errors.ts';
import type { ObservedRecord, PredictedRecord } from '../../types.ts';
import {
  buildScoreMatrix,
  createScoringContext,
  scorePair,
} from '../buildScoreMatrix.ts';

const gaussian = (delta: number, sigma: number) =>
  Math.exp(-0.5 * (delta / sigma) ** 2);

test('retention time only: matching retention times score close to 1', () => {
  const predicted: PredictedRecord[] = [
    { label: 'A', rt: 2.4 },
    { label: 'B', rt: 3.6 },
    { label: 'C', rt: 5.6 },
  ];
  const observed: ObservedRecord[] = [{ rt: 2.41 }, { rt: 5.58 }, { rt: 3.59 }];

  const matrix = buildScoreMatrix(predicted, observed, {
    weights: { rt: 1 },
    rtSigma: 0.5,
  });

  expect(matrix).toHaveLength(3);
  expect(matrix[0][0]).toBeCloseTo(gaussian(0.01, 0.5), 10);
  expect(matrix[1][2]).toBeCloseTo(gaussian(0.01, 0.5), 10);
  expect(matrix[2][1]).toBeCloseTo(gaussian(0.02, 0.5), 10);
  expect(matrix[0][1]).toBeCloseTo(gaussian(3.18, 0.5), 10);
});

test('each cell is normalised by the weights of its own channels', () => {
  const predicted: PredictedRecord[] = [{ label: 'A', rt: 2, lmax: 300 }];
  const observed: ObservedRecord[] = [{ rt: 2, lmax: 315 }, { rt: 2 }];

  const [row] = buildScoreMatrix(predicted, observed, {
    weights: { rt: 0.3, lmax: 0.2 },
    lmaxSigma: 15,
  });

  expect(row[0]).toBeCloseTo((0.3 + 0.2 * Math.exp(-0.5)) / 0.5, 10);
  expect(row[1]).toBe(1);
});

test('a pair without any shared channel scores 0', () => {
  const matrix = buildScoreMatrix([{ label: 'A', rt: 2 }], [{ lmax: 300 }]);

  expect(matrix).toStrictEqual([[0]]);
});

test('a pair whose shared channels all weigh 0 scores 0', () => {
  const matrix = buildScoreMatrix([{ label: 'A', rt: 2 }], [{ rt: 2 }], {
    weights: { ms: 1 },
  });

  expect(matrix).toStrictEqual([[0]]);
});

test('an empty spectrum does not count as MS evidence', () => {
  const predicted: PredictedRecord[] = [
    { label: 'A', spectrum: { x: [], y: [] }, rt: 1 },
  ];
  const observed: ObservedRecord[] = [{ spectrum: { x: [100], y: [1] }, rt: 1 }];

  expect(buildScoreMatrix(predicted, observed)).toStrictEqual([[1]]);
});

test('a spectrum whose peaks are all filtered still counts as MS evidence', () => {
  const predicted: PredictedRecord[] = [
    { label: 'A', spectrum: { x: [100], y: [0] }, rt: 1 },
  ];
  const observed: ObservedRecord[] = [{ spectrum: { x: [100], y: [5] }, rt: 1 }];

  // (0.5 * 0 + 0.3 * 1) / (0.5 + 0.3) with the default weights
  expect(buildScoreMatrix(predicted, observed)[0][0]).toBeCloseTo(0.375, 12);
});

test('all three channels', () => {
  const predicted: PredictedRecord[] = [
    {
      label: 'COC(=O)c1ccccc1O',
      spectrum: { x: [121.0284, 153.0546], y: [80, 100] },
      rt: 5.5,
      lmax: 283,
    },
  ];
  const observed: ObservedRecord[] = [
    {
      spectrum: { x: [121.0286, 153.0549], y: [80, 100] },
      rt: 5.5,
      lmax: 283,
    },
  ];

  expect(buildScoreMatrix(predicted, observed)[0][0]).toBeCloseTo(1, 10);
});

test('every cell is within [0, 1]', () => {
  const predicted: PredictedRecord[] = [
    { label: 'A', spectrum: { x: [100, 200], y: [1, 2] }, rt: 1, lmax: 250 },
    { label: 'B', rt: 4 },
    { label: 'C', lmax: 320 },
    { label: 'D' },
  ];
  const observed: ObservedRecord[] = [
    { spectrum: { x: [100.001, 300], y: [3, 1] }, rt: 1.2 },
    { rt: 3.9, lmax: 318 },
    { spectrum: { x: [200], y: [7] }, lmax: 240 },
  ];

  for (const row of buildScoreMatrix(predicted, observed)) {
    for (const cell of row) {
      expect(cell).toBeGreaterThanOrEqual(0);
      expect(cell).toBeLessThanOrEqual(1);
    }
  }
});

test('scorePair reports the evaluated channels only', () => {
  const context = createScoringContext({ rtSigma: 0.5, lmaxSigma: 15 });
  const result = scorePair({ label: 'A', rt: 2, lmax: 280 }, { rt: 2.5 }, context);

  expect(result.channels).toStrictEqual({ rt: Math.exp(-0.5) });
  expect(result.score).toBeCloseTo(Math.exp(-0.5), 12);
});

test('empty inputs give an empty matrix', () => {
  expect(buildScoreMatrix([], [{ rt: 1 }])).toStrictEqual([]);
  expect(buildScoreMatrix([{ label: 'A' }, { label: 'B' }], [])).toStrictEqual([
    [],
    [],
  ]);
});

test('a negative weight is rejected before any record is looked at', () => {
  const malformed: ObservedRecord[] = [{ spectrum: { x: [1, 2], y: [1] } }];

  expect(() =>
    buildScoreMatrix([{ label: 'A' }], malformed, { weights: { rt: -0.1 } }),
  ).toThrow(InvalidConfigurationError);
});

test('tolerance needs exactly one of mz and ppm', () => {
  expect(() =>
    buildScoreMatrix([], [], { tolerance: { mz: 0.01, ppm: 10 } }),
  ).toThrow(/not both/);
  expect(() => buildScoreMatrix([], [], { tolerance: {} })).toThrow(
    InvalidConfigurationError,
  );
});

test('sigma must be positive', () => {
  expect(() => buildScoreMatrix([], [], { rtSigma: 0 })).toThrow(
    InvalidConfigurationError,
  );
  expect(() => buildScoreMatrix([], [], { lmaxSigma: -15 })).toThrow(
    /lmaxSigma must be a positive number/,
  );
});

test('mismatched spectrum arrays name the faulty record', () => {
  const observed: ObservedRecord[] = [
    { rt: 1 },
    { spectrum: { x: [100, 200], y: [1] } },
  ];

  let caught: unknown;
  try {
    buildScoreMatrix([{ label: 'A', rt: 1 }], observed);
  } catch (error) {
    caught = error;
  }

  expect(caught).toBeInstanceOf(MalformedRecordError);
  expect(caught).toMatchObject({ side: 'observed', index: 1 });
});

test('a non-finite retention time is malformed', () => {
  expect(() =>
    buildScoreMatrix([{ label: 'A', rt: Number.NaN }], [{ rt: 1 }]),
  ).toThrow('predicted record 0: retention time NaN is not finite');
});

test('a non-finite intensity is malformed', () => {
  expect(() =>
    buildScoreMatrix(
      [{ label: 'A', spectrum: { x: [100], y: [1] } }],
      [{ spectrum: { x: [100, 200], y: [1, Number.POSITIVE_INFINITY] } }],
    ),
  ).toThrow('observed record 0: spectrum has a non-finite intensity');
});
