/**
 * PAR header → BIDS field inference
 *
 * Pure function of the header text: detects the site/version profile, then
 * runs each field's pattern chain (with image-table fallbacks) and derives
 * slice timing, encoding directions and echo spacing. Missing fields are
 * omitted or set to a configured default; extraction never fails as a whole.
 */

import { InferenceSettings, resolveInferenceSettings } from '../config/inference';
import type {
  BidsFieldName,
  BidsFieldSet,
  InferenceProvenance,
  InferenceResult,
} from '../types/bids';
import { logger } from '../utils/logger';
import { inferPhaseEncodingDirection, inferSliceEncodingDirection } from './directions';
import { computeEffectiveEchoSpacing } from './echo-spacing';
import { ImageTable } from './image-table';
import { matchFirst } from './patterns';
import { selectProfile } from './profiles';
import { detectSite } from './site-detector';
import { computeSliceTiming } from './slice-timing';
import { DEFAULT_TASK_NAME, taskNameFromText } from './task-name';
import { parseFloatValue, parseIntValue, parseStringValue, roundTo } from './values';

export interface InferenceOptions {
  /** Path of the PAR file; its tokens are a site detection fallback */
  filePath?: string;
  settings?: InferenceSettings;
}

const positive = (value: number | null): number | null => (value !== null && value > 0 ? value : null);
const positiveFloat = (m: RegExpMatchArray): number | null => positive(parseFloatValue(m[1]));
const positiveInt = (m: RegExpMatchArray): number | null => positive(parseIntValue(m[1]));
const text = (m: RegExpMatchArray): string | null => parseStringValue(m[1]);

const msToSeconds = (ms: number): number => roundTo(ms / 1000, 6);

export function inferBidsFields(content: string, options: InferenceOptions = {}): InferenceResult {
  const settings = options.settings ?? resolveInferenceSettings();
  const site = detectSite(content, settings, options.filePath);
  const profile = selectProfile(site.toolVersion);
  const table = ImageTable.parse(content, profile.columns);
  const p = profile.id;

  const fields: BidsFieldSet = {};
  const defaultsApplied: BidsFieldName[] = [];
  const provenance: InferenceProvenance = {
    profile: p,
    sliceTimingMethod: null,
    sliceEncodingStrategy: null,
    phaseEncodingSource: null,
    echoSpacingSource: null,
    taskNameSource: 'default',
    defaultsApplied,
  };

  // Timing
  const trMs = matchFirst(content, 'repetitionTime', p, positiveFloat);
  if (trMs !== null) fields.RepetitionTime = msToSeconds(trMs);

  const teMs = matchFirst(content, 'echoTime', p, positiveFloat) ?? positive(table.first('echoTime'));
  if (teMs !== null) {
    fields.EchoTime = msToSeconds(teMs);
  } else if (settings.echoTimeFallback !== null) {
    fields.EchoTime = settings.echoTimeFallback;
    defaultsApplied.push('EchoTime');
  }

  const sliceCount = matchFirst(content, 'numberOfSlices', p, positiveInt) ?? positive(table.maxSliceNumber());
  if (sliceCount !== null) fields.NumberOfSlices = sliceCount;

  if (fields.RepetitionTime !== undefined && sliceCount !== null) {
    fields.SliceTiming = computeSliceTiming(fields.RepetitionTime, sliceCount);
    provenance.sliceTimingMethod = 'interleaved-ascending-from-bottom';
  }

  // Encoding directions
  const sliceEncoding = inferSliceEncodingDirection(content, p, table);
  if (sliceEncoding) {
    fields.SliceEncodingDirection = sliceEncoding.direction;
    provenance.sliceEncodingStrategy = sliceEncoding.strategy;
  }

  const phaseEncoding = inferPhaseEncodingDirection(content, p);
  if (phaseEncoding) {
    fields.PhaseEncodingDirection = phaseEncoding;
    provenance.phaseEncodingSource = 'header';
  } else if (settings.phaseEncodingFallback !== null) {
    fields.PhaseEncodingDirection = settings.phaseEncodingFallback;
    provenance.phaseEncodingSource = 'fallback';
    defaultsApplied.push('PhaseEncodingDirection');
  } else {
    logger.debug('No phase encoding direction in header');
  }

  // Echo spacing
  const waterFatShift = matchFirst(content, 'waterFatShift', p, positiveFloat);
  if (waterFatShift !== null) fields.WaterFatShift = waterFatShift;

  const recon =
    matchFirst(content, 'reconResolution', p, readResolution) ??
    readResolutionFromTable(table) ??
    matchFirst(content, 'scanResolution', p, readResolution);
  if (recon) {
    fields.ReconMatrixPE = recon.y;
    fields.ReconMatrixFE = recon.x;
  }

  const echoSpacing =
    waterFatShift !== null && recon
      ? computeEffectiveEchoSpacing(waterFatShift, recon.y, settings.waterFatShiftHz)
      : null;
  if (echoSpacing !== null) {
    fields.EffectiveEchoSpacing = echoSpacing;
    provenance.echoSpacingSource = 'computed';
  } else if (settings.effectiveEchoSpacingFallback !== null) {
    fields.EffectiveEchoSpacing = settings.effectiveEchoSpacingFallback;
    provenance.echoSpacingSource = 'fallback';
    defaultsApplied.push('EffectiveEchoSpacing');
  }

  // Geometry
  const thickness = matchFirst(content, 'sliceThickness', p, positiveFloat) ?? positive(table.first('sliceThickness'));
  if (thickness !== null) {
    fields.SliceThickness = thickness;

    const gap =
      matchFirst(content, 'sliceGap', p, m => parseFloatValue(m[1])) ?? table.first('sliceGap');
    if (gap !== null && gap >= 0) {
      fields.SpacingBetweenSlices = roundTo(thickness + gap, 6);
    }
  }

  const flipAngle = matchFirst(content, 'flipAngle', p, positiveFloat) ?? positive(table.first('flipAngle'));
  if (flipAngle !== null) fields.FlipAngle = flipAngle;

  // Naming
  const protocolName = matchFirst(content, 'protocolName', p, text);
  const examinationName = matchFirst(content, 'examinationName', p, text);
  const taskFromProtocol = protocolName ? taskNameFromText(protocolName) : null;
  const taskFromExamination = examinationName ? taskNameFromText(examinationName) : null;

  if (taskFromProtocol) {
    fields.TaskName = taskFromProtocol;
    provenance.taskNameSource = 'protocol-name';
  } else if (taskFromExamination) {
    fields.TaskName = taskFromExamination;
    provenance.taskNameSource = 'examination-name';
  } else {
    fields.TaskName = DEFAULT_TASK_NAME;
    defaultsApplied.push('TaskName');
  }

  if (protocolName) fields.ProtocolName = protocolName;

  const seriesDescription = matchFirst(content, 'seriesDescription', p, text);
  if (seriesDescription) fields.SeriesDescription = seriesDescription;

  const patientPosition = matchFirst(content, 'patientPosition', p, text);
  if (patientPosition) fields.PatientPosition = patientPosition;

  const seriesNumber = matchFirst(content, 'seriesNumber', p, positiveInt);
  if (seriesNumber !== null) fields.SeriesNumber = seriesNumber;

  const acquisitionNumber = matchFirst(content, 'acquisitionNumber', p, positiveInt);
  if (acquisitionNumber !== null) fields.AcquisitionNumber = acquisitionNumber;

  // Philips scaling, from the first image row
  const rescaleSlope = positive(table.first('rescaleSlope'));
  if (rescaleSlope !== null) fields.PhilipsRescaleSlope = rescaleSlope;

  const rescaleIntercept = table.first('rescaleIntercept');
  if (rescaleIntercept !== null) fields.PhilipsRescaleIntercept = rescaleIntercept;

  const scaleSlope = positive(table.first('scaleSlope'));
  if (scaleSlope !== null) fields.PhilipsScaleSlope = scaleSlope;

  if (rescaleSlope !== null || scaleSlope !== null) fields.UsePhilipsFloatNotDisplayScaling = true;

  // Constants
  fields.Manufacturer = settings.manufacturer;
  if (settings.magneticFieldStrength !== null) {
    fields.MagneticFieldStrength = settings.magneticFieldStrength;
    defaultsApplied.push('MagneticFieldStrength');
  }

  logger.debug(
    {
      profile: p,
      site: site.siteLabel,
      confidence: site.confidence,
      fieldCount: Object.keys(fields).length,
      imageRows: table.rowCount,
    },
    'Inferred BIDS fields from PAR header'
  );

  return { fields, site, provenance };
}

function readResolution(m: RegExpMatchArray): { x: number; y: number } | null {
  const x = positive(parseIntValue(m[1]));
  const y = positive(parseIntValue(m[2]));
  return x !== null && y !== null ? { x, y } : null;
}

function readResolutionFromTable(table: ImageTable): { x: number; y: number } | null {
  const x = positive(table.first('reconResolutionX'));
  const y = positive(table.first('reconResolutionY'));
  return x !== null && y !== null ? { x, y } : null;
}
