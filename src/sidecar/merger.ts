/**
 * Non-destructive merge of inferred BIDS fields into a sidecar document
 */

import { config } from '../config';
import type { JsonValue, SidecarDocument } from '../types';
import type { BidsFieldSet, BidsValue, InferenceProvenance, SiteDetection } from '../types/bids';
import { logger } from '../utils/logger';
import { isDeepStrictEqual } from 'util';

/** Keys starting with this prefix are bookkeeping, never BIDS data */
export const RESERVED_PREFIX = '_';
export const PROVENANCE_KEY = '_BIDSProcessingInfo';

export interface MergeSummary {
  fieldsAdded: string[];
  fieldsUpdated: string[];
  fieldsUnchanged: string[];
}

export interface MergeContext {
  site: SiteDetection;
  provenance?: InferenceProvenance;
  /** PAR file the fields came from, recorded in the provenance block */
  sourceFile?: string;
  processedAt: Date;
}

export interface MergeResult {
  document: SidecarDocument;
  summary: MergeSummary;
}

function toJson(value: BidsValue): JsonValue {
  return Array.isArray(value) ? [...value] : value;
}

/**
 * Merge `fields` into a copy of `document`:
 * absent keys are added, differing keys overwritten, equal keys left alone.
 * Keys not in `fields` keep their value and position. The provenance block
 * replaces any previous one.
 */
export function mergeSidecar(
  document: SidecarDocument,
  fields: BidsFieldSet,
  context: MergeContext
): MergeResult {
  const merged: SidecarDocument = { ...document };
  const summary: MergeSummary = { fieldsAdded: [], fieldsUpdated: [], fieldsUnchanged: [] };

  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    if (key.startsWith(RESERVED_PREFIX)) {
      logger.debug({ key }, 'Skipping reserved key in field set');
      continue;
    }

    const next = toJson(value);
    if (!Object.prototype.hasOwnProperty.call(merged, key)) {
      merged[key] = next;
      summary.fieldsAdded.push(key);
    } else if (!isDeepStrictEqual(merged[key], next)) {
      merged[key] = next;
      summary.fieldsUpdated.push(key);
    } else {
      summary.fieldsUnchanged.push(key);
    }
  }

  merged[PROVENANCE_KEY] = buildProvenanceBlock(context, summary);

  return { document: merged, summary };
}

export function buildProvenanceBlock(context: MergeContext, summary: MergeSummary): JsonValue {
  const { site, provenance } = context;

  const block: { [key: string]: JsonValue } = {
    ProcessedBy: config.tool.name,
    ToolVersion: config.tool.version,
    ProcessingDateTime: context.processedAt.toISOString(),
  };

  if (context.sourceFile) block.SourceFile = context.sourceFile;

  block.DetectedSite = site.siteLabel;
  block.SiteConfidence = site.confidence;
  block.SiteHeuristic = site.heuristic;
  block.PAR_Version = site.toolVersion ? `V${site.toolVersion}` : 'unknown';
  block.Characteristics = [...site.characteristics].sort();

  if (provenance) {
    block.Profile = provenance.profile;
    block.SliceTimingMethod = provenance.sliceTimingMethod;
    block.SliceEncodingStrategy = provenance.sliceEncodingStrategy;
    block.PhaseEncodingSource = provenance.phaseEncodingSource;
    block.EchoSpacingSource = provenance.echoSpacingSource;
    block.TaskNameSource = provenance.taskNameSource;
    block.DefaultsApplied = [...provenance.defaultsApplied];
  }

  block.FieldsAdded = [...summary.fieldsAdded];
  block.FieldsUpdated = [...summary.fieldsUpdated];

  return block;
}
