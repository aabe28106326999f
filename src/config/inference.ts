/**
 * Inference settings table
 *
 * Every constant and fallback the PAR inference relies on lives here so it can
 * be inspected and overridden per site or per run.
 */

import type { PhaseEncodingDirection, SiteLabel } from '../types/bids';
import { config } from './index';

export interface SiteMarkers {
  /** Upper-case substrings searched in the patient name (4.2 headers only) */
  patientName: Array<{ site: SiteLabel; tokens: string[] }>;
  /** Upper-case substrings searched in the PAR file path */
  filePath: Array<{ site: SiteLabel; tokens: string[] }>;
}

export interface SubjectIdRange {
  /** Subject IDs are read as `<prefix><3 digits>` from the examination name */
  prefix: string;
  /** Suffix values below this map to `below`, the rest to `atOrAbove` */
  threshold: number;
  below: SiteLabel;
  atOrAbove: SiteLabel;
}

export interface InferenceSettings {
  /** Water-fat resonance offset in Hz at the assumed field strength (3T) */
  waterFatShiftHz: number;
  /** Reported as MagneticFieldStrength; must match the field strength assumed above */
  magneticFieldStrength: number | null;
  manufacturer: string;
  /** Echo time in seconds when none can be read; null leaves EchoTime absent */
  echoTimeFallback: number | null;
  /** Echo spacing in seconds when it cannot be computed; null leaves it absent */
  effectiveEchoSpacingFallback: number | null;
  /** Used when the header carries no recognizable direction; null leaves it absent */
  phaseEncodingFallback: PhaseEncodingDirection | null;
  siteMarkers: SiteMarkers;
  /** Placeholder heuristic, reported with Medium confidence like path markers. Null disables it. */
  subjectIdRange: SubjectIdRange | null;
}

export const DEFAULT_INFERENCE_SETTINGS: InferenceSettings = {
  waterFatShiftHz: 434.215,
  magneticFieldStrength: 3,
  manufacturer: 'Philips',
  echoTimeFallback: null,
  effectiveEchoSpacingFallback: null,
  phaseEncodingFallback: null,
  siteMarkers: {
    patientName: [
      { site: 'Amsterdam', tokens: ['VUMC', 'AMSTERDAM', 'VU', 'AMS'] },
      { site: 'Leiden', tokens: ['LUMC', 'LEIDEN', 'HULSBOSCH', 'LEI'] },
    ],
    filePath: [
      { site: 'Amsterdam', tokens: ['AMSTERDAM', 'VUMC', 'AMS'] },
      { site: 'Leiden', tokens: ['LEIDEN', 'LUMC', 'LEI'] },
    ],
  },
  subjectIdRange: {
    prefix: '110',
    threshold: 500,
    below: 'Leiden',
    atOrAbove: 'Amsterdam',
  },
};

/**
 * Resolve settings: defaults, then environment overrides, then explicit overrides
 */
export function resolveInferenceSettings(overrides: Partial<InferenceSettings> = {}): InferenceSettings {
  const fromEnv: Partial<InferenceSettings> = {};
  const env = config.inference;

  if (env.waterFatShiftHz !== undefined) fromEnv.waterFatShiftHz = env.waterFatShiftHz;
  if (env.magneticFieldStrength !== undefined) fromEnv.magneticFieldStrength = env.magneticFieldStrength;
  if (env.echoTimeFallback !== undefined) fromEnv.echoTimeFallback = env.echoTimeFallback;
  if (env.effectiveEchoSpacingFallback !== undefined) {
    fromEnv.effectiveEchoSpacingFallback = env.effectiveEchoSpacingFallback;
  }
  if (env.phaseEncodingFallback !== undefined) fromEnv.phaseEncodingFallback = env.phaseEncodingFallback;

  return {
    ...DEFAULT_INFERENCE_SETTINGS,
    ...fromEnv,
    ...overrides,
  };
}
