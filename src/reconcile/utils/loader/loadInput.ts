/**
 * Load the records of one reaction from a JSON file.
 *
 * The file holds the predicted products, the observed peaks and optionally
 * the scoring options:
 * ```json
 * {
 *   "predicted": [{ "label": "COC(=O)c1ccccc1O", "rt": 5.6, "lmax": 280 }],
 *   "observed": [{ "rt": 5.58, "lmax": 281, "peak": { "start": 5.2, "end": 5.9 } }],
 *   "options": { "weights": { "rt": 0.6, "lmax": 0.4 }, "solver": "exact" }
 * }
 * ```
 * `null` is accepted wherever a value may be absent.
 */

import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import type { MatchOptions } from '../../../matchCompounds.ts';
import type { ObservedRecord, PredictedRecord } from '../../../types.ts';

const optionalNumber = z
  .number()
  .nullish()
  .transform((value) => value ?? undefined);

const SpectrumSchema = z.object({
  x: z.array(z.number()),
  y: z.array(z.number()),
});

const PeakRegionSchema = z.object({
  start: z.number(),
  end: z.number(),
  apex: optionalNumber,
  area: optionalNumber,
});

const PredictedSchema = z.object({
  label: z.string().min(1),
  spectrum: SpectrumSchema.nullish().transform((value) => value ?? undefined),
  rt: optionalNumber,
  lmax: optionalNumber,
});

const ObservedSchema = z.object({
  spectrum: SpectrumSchema.nullish().transform((value) => value ?? undefined),
  rt: optionalNumber,
  lmax: optionalNumber,
  peak: PeakRegionSchema.nullish().transform((value) => value ?? undefined),
});

const OptionsSchema = z
  .object({
    weights: z
      .object({
        ms: z.number().optional(),
        rt: z.number().optional(),
        lmax: z.number().optional(),
      })
      .strict()
      .optional(),
    tolerance: z
      .object({ mz: z.number().optional(), ppm: z.number().optional() })
      .strict()
      .optional(),
    rtSigma: z.number().optional(),
    lmaxSigma: z.number().optional(),
    solver: z.enum(['exact', 'greedy']).optional(),
    minScore: z.number().optional(),
  })
  .strict();

const InputSchema = z.object({
  predicted: z.array(PredictedSchema),
  observed: z.array(ObservedSchema),
  options: OptionsSchema.optional(),
});

/** Content of an input file. */
export interface ReconcileInput {
  predicted: PredictedRecord[];
  observed: ObservedRecord[];
  options: MatchOptions;
}

/**
 * Validate already parsed JSON.
 * @param data - Parsed JSON content.
 * @param source - Name used in error messages.
 * @returns Records and options.
 */
export function parseInput(data: unknown, source = 'input'): ReconcileInput {
  const result = InputSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid ${source}: ${issues}`, { cause: result.error });
  }
  const { predicted, observed, options = {} } = result.data;
  return { predicted, observed, options };
}

/**
 * Read and validate an input file.
 * @param filePath - Path to the JSON file.
 */
export async function loadInput(filePath: string): Promise<ReconcileInput> {
  const text = await readFile(filePath, 'utf8');
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new Error(`${filePath} is not valid JSON`, { cause: error });
  }
  return parseInput(data, filePath);
}
