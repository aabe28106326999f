/**
 * Pattern chains for PAR header fields
 *
 * Each field has an ordered list of case-insensitive patterns. The first rule
 * that matches AND yields an acceptable value wins; later rules are fallbacks
 * for other header dialects or hand-edited headers.
 */

import type { SiteProfileId } from '../types/bids';

export interface PatternRule {
  pattern: RegExp;
  /** Only tried for these profiles; tried for every profile when absent */
  profiles?: SiteProfileId[];
}

export type PatternField =
  | 'toolVersion'
  | 'patientName'
  | 'examinationName'
  | 'protocolName'
  | 'seriesDescription'
  | 'patientPosition'
  | 'seriesNumber'
  | 'acquisitionNumber'
  | 'repetitionTime'
  | 'echoTime'
  | 'numberOfSlices'
  | 'sliceOrientation'
  | 'phaseDirection'
  | 'waterFatShift'
  | 'reconResolution'
  | 'scanResolution'
  | 'sliceThickness'
  | 'sliceGap'
  | 'flipAngle';

const NUMBER = '([\\d.]+)';
// Rest of the line, possibly empty; separators never cross a line break
const TEXT = '([^\\n\\r]*)';

function rule(source: string, profiles?: SiteProfileId[]): PatternRule {
  return { pattern: new RegExp(source, 'i'), profiles };
}

export const FIELD_PATTERNS: Record<PatternField, PatternRule[]> = {
  toolVersion: [rule('Research image export tool[ \\t]+V([\\d.]+)')],
  patientName: [rule(`Patient name[ \\t]*:[ \\t]*${TEXT}`)],
  examinationName: [rule(`Examination name[ \\t]*:[ \\t]*${TEXT}`)],
  protocolName: [rule(`Protocol name[ \\t]*:[ \\t]*${TEXT}`)],
  // "Series Type" (e.g. "Image   MRSERIES") is not a description and is not read
  seriesDescription: [rule(`Series description[ \\t]*:[ \\t]*${TEXT}`)],
  patientPosition: [rule(`Patient position[ \\t]*:[ \\t]*${TEXT}`)],
  seriesNumber: [
    rule('Series nr[ \\t]*:[ \\t]*(\\d+)'),
    rule('Series number[ \\t]*:[ \\t]*(\\d+)'),
  ],
  acquisitionNumber: [
    rule('Acquisition nr[ \\t]*:[ \\t]*(\\d+)'),
    rule('Acquisition number[ \\t]*:[ \\t]*(\\d+)'),
  ],
  repetitionTime: [
    rule(`Repetition time \\[ms\\][ \\t]*:[ \\t]*${NUMBER}`),
    rule(`\\bTR[ \\t]*[=:][ \\t]*${NUMBER}`),
    rule(`repetition_time[ \\t]+${NUMBER}`),
    rule(`Repetition[ \\t]+time[ \\t]*:[ \\t]*${NUMBER}`),
    rule(`rep_time[ \\t]+${NUMBER}`, ['generic']),
  ],
  echoTime: [
    rule(`Echo time[ \\t]*\\[ms\\][ \\t]*:[ \\t]*${NUMBER}`),
    rule(`\\bTE[ \\t]*[=:][ \\t]*${NUMBER}`),
    rule(`echo_time[ \\t]+${NUMBER}`),
    rule(`Echo[ \\t]+time[ \\t]*:[ \\t]*${NUMBER}`),
    rule(`Diffusion echo time \\[ms\\][ \\t]*:[ \\t]*${NUMBER}`, ['generic']),
  ],
  numberOfSlices: [
    rule('Max\\.[ \\t]*number of slices/locations[ \\t]*:[ \\t]*(\\d+)'),
    rule('number of slices[ \\t]*[=:][ \\t]*(\\d+)'),
  ],
  sliceOrientation: [
    rule('slice orientation \\( TRA/SAG/COR \\)[ \\t]*\\(integer\\)[ \\t]+(\\d+)'),
    rule('slice orientation[ \\t]*:[ \\t]*(\\d+)'),
    rule('slice_orientation[ \\t]*:[ \\t]*(\\d+)'),
  ],
  phaseDirection: [
    rule(`Preparation direction[ \\t]*:[ \\t]*${TEXT}`),
    rule(`Phase encoding direction[ \\t]*:[ \\t]*${TEXT}`),
    rule(`PE direction[ \\t]*:[ \\t]*${TEXT}`),
    rule(`Fold-?over direction[ \\t]*:[ \\t]*${TEXT}`),
  ],
  waterFatShift: [
    rule(`Water Fat shift \\[pixels\\][ \\t]*:[ \\t]*${NUMBER}`),
    rule(`water[ \\t]+fat[ \\t]+shift[ \\t]*:[ \\t]*${NUMBER}`),
    rule(`\\bWFS[ \\t]*:[ \\t]*${NUMBER}`),
  ],
  reconResolution: [rule('Recon resolution[ \\t]*\\(x,?[ \\t]*y\\)[ \\t]*:[ \\t]*(\\d+)[ \\t]+(\\d+)')],
  scanResolution: [rule('Scan resolution[ \\t]*\\(x,?[ \\t]*y\\)[ \\t]*:[ \\t]*(\\d+)[ \\t]+(\\d+)')],
  sliceThickness: [
    rule(`slice thickness \\(in mm[ \\t]*\\)[ \\t]*:[ \\t]*${NUMBER}`),
    rule(`slice thickness[ \\t]*:[ \\t]*${NUMBER}`),
  ],
  sliceGap: [
    rule(`slice gap \\(in mm[ \\t]*\\)[ \\t]*:[ \\t]*${NUMBER}`),
    rule(`slice gap[ \\t]*:[ \\t]*${NUMBER}`),
  ],
  flipAngle: [
    rule(`image_flip_angle \\(in degrees\\)[ \\t]+${NUMBER}`),
    rule(`Flip angle[ \\t]*\\[degrees\\][ \\t]*:[ \\t]*${NUMBER}`),
    rule(`flip angle[ \\t]*:[ \\t]*${NUMBER}`),
  ],
};

/**
 * Try the field's rules in order and return the first accepted value.
 * `accept` receives the match and returns null to reject it and keep looking.
 */
export function matchFirst<T>(
  content: string,
  field: PatternField,
  profile: SiteProfileId,
  accept: (match: RegExpMatchArray) => T | null
): T | null {
  for (const { pattern, profiles } of FIELD_PATTERNS[field]) {
    if (profiles && !profiles.includes(profile)) continue;

    const match = content.match(pattern);
    if (!match) continue;

    const value = accept(match);
    if (value !== null) return value;
  }
  return null;
}
