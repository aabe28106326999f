/**
 * One PAR/sidecar pair, end to end
 *
 * Failures stay local to the pair: every error is caught, logged and
 * returned so the caller can count it and move on to the next pair.
 */

import path from 'path';
import type { InferenceSettings } from './config/inference';
import { extractFromParFile } from './par';
import { SidecarUpdateResult, updateSidecarFile } from './sidecar';
import type { InferenceResult } from './types/bids';
import { logger } from './utils/logger';

export interface PairOptions {
  settings?: InferenceSettings;
  dryRun?: boolean;
  now?: () => Date;
}

export type PairOutcome =
  | {
      success: true;
      parFile: string;
      sidecarFile: string;
      inference: InferenceResult;
      update: SidecarUpdateResult;
    }
  | {
      success: false;
      parFile: string;
      sidecarFile: string;
      stage: 'extract' | 'merge';
      error: Error;
    };

export interface BatchSummary {
  pairs: number;
  successes: number;
  failures: number;
  fieldsAdded: number;
  fieldsUpdated: number;
  outcomes: PairOutcome[];
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export async function processPair(
  parFile: string,
  sidecarFile: string,
  options: PairOptions = {}
): Promise<PairOutcome> {
  let inference: InferenceResult;
  try {
    inference = await extractFromParFile(parFile, { settings: options.settings });
  } catch (error) {
    logger.error(
      { parFile, error: error instanceof Error ? error.message : error },
      'PAR extraction failed'
    );
    return { success: false, parFile, sidecarFile, stage: 'extract', error: asError(error) };
  }

  try {
    const update = await updateSidecarFile(sidecarFile, inference, {
      dryRun: options.dryRun,
      sourceFile: path.basename(parFile),
      now: options.now,
    });
    return { success: true, parFile, sidecarFile, inference, update };
  } catch (error) {
    logger.error(
      { sidecarFile, error: error instanceof Error ? error.message : error },
      'Sidecar update failed'
    );
    return { success: false, parFile, sidecarFile, stage: 'merge', error: asError(error) };
  }
}

/**
 * Process pairs one after another; a failed pair never stops the rest
 */
export async function processPairs(
  pairs: Array<{ par: string; sidecar: string }>,
  options: PairOptions = {}
): Promise<BatchSummary> {
  const summary: BatchSummary = {
    pairs: pairs.length,
    successes: 0,
    failures: 0,
    fieldsAdded: 0,
    fieldsUpdated: 0,
    outcomes: [],
  };

  for (const pair of pairs) {
    const outcome = await processPair(pair.par, pair.sidecar, options);
    summary.outcomes.push(outcome);

    if (outcome.success) {
      summary.successes++;
      summary.fieldsAdded += outcome.update.summary.fieldsAdded.length;
      summary.fieldsUpdated += outcome.update.summary.fieldsUpdated.length;
    } else {
      summary.failures++;
    }
  }

  logger.info(
    { pairs: summary.pairs, successes: summary.successes, failures: summary.failures },
    'Finished processing PAR/sidecar pairs'
  );

  return summary;
}
