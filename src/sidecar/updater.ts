/**
 * Sidecar file update: read → validate → back up → merge → atomic write
 *
 * All-or-nothing per file: the sidecar is either replaced by the full merged
 * document or left untouched. Concurrent updates of the same path are not
 * supported.
 */

import fs from 'fs/promises';
import path from 'path';
import type { SidecarDocument } from '../types';
import { SidecarReadError, SidecarWriteError } from '../types';
import type { InferenceResult } from '../types/bids';
import { logger } from '../utils/logger';
import { createBackup } from './backup';
import { mergeSidecar, MergeSummary } from './merger';
import { parseSidecar, serializeSidecar } from './schema';

export interface SidecarUpdateOptions {
  /** Compute the merge summary without creating a backup or writing */
  dryRun?: boolean;
  /** PAR file name recorded in the provenance block */
  sourceFile?: string;
  now?: () => Date;
}

export interface SidecarUpdateResult {
  filePath: string;
  backupPath: string | null;
  written: boolean;
  summary: MergeSummary;
  document: SidecarDocument;
}

export async function loadSidecar(filePath: string): Promise<SidecarDocument> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new SidecarReadError(filePath, error);
  }

  try {
    return parseSidecar(text);
  } catch (error) {
    throw new SidecarReadError(filePath, error);
  }
}

async function writeAtomically(filePath: string, content: string): Promise<void> {
  const tempPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`
  );

  try {
    await fs.writeFile(tempPath, content, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      logger.warn(
        { tempPath, error: cleanupError instanceof Error ? cleanupError.message : cleanupError },
        'Failed to remove temporary sidecar file'
      );
    });
    throw error;
  }
}

export async function updateSidecarFile(
  filePath: string,
  inference: InferenceResult,
  options: SidecarUpdateOptions = {}
): Promise<SidecarUpdateResult> {
  const now = options.now ?? (() => new Date());
  const original = await loadSidecar(filePath);
  const processedAt = now();

  const { document, summary } = mergeSidecar(original, inference.fields, {
    site: inference.site,
    provenance: inference.provenance,
    sourceFile: options.sourceFile,
    processedAt,
  });

  if (options.dryRun) {
    logger.info(
      { filePath, added: summary.fieldsAdded.length, updated: summary.fieldsUpdated.length },
      'Dry run: sidecar left unchanged'
    );
    return { filePath, backupPath: null, written: false, summary, document };
  }

  const backupPath = await createBackup(filePath, processedAt);

  try {
    await writeAtomically(filePath, serializeSidecar(document));
  } catch (error) {
    throw new SidecarWriteError(filePath, backupPath, error);
  }

  logger.info(
    {
      filePath,
      backupPath,
      added: summary.fieldsAdded.length,
      updated: summary.fieldsUpdated.length,
    },
    'Sidecar updated'
  );

  return { filePath, backupPath, written: true, summary, document };
}
