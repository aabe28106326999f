/**
 * Slice and phase encoding direction inference
 */

import type {
  PhaseEncodingDirection,
  SiteProfileId,
  SliceEncodingDirection,
  SliceEncodingStrategy,
} from '../types/bids';
import type { ImageTable } from './image-table';
import { matchFirst } from './patterns';
import { parseIntValue, parseStringValue } from './values';

const ORIENTATION_CODES: Record<number, SliceEncodingDirection> = {
  1: 'k', // transverse / axial
  2: 'i', // sagittal
  3: 'j', // coronal
};

// Rows checked when the orientation is read from the image table
const IMAGE_ROWS_SCANNED = 10;

export function orientationCodeToDirection(code: number | null): SliceEncodingDirection | null {
  if (code === null) return null;
  return ORIENTATION_CODES[code] ?? null;
}

/**
 * True when the header describes an EPI / functional acquisition
 */
export function looksFunctional(content: string): boolean {
  const technique = content.match(/Technique[ \t]*:[ \t]*([^\n\r]*)/i);
  if (technique && /EPI/i.test(technique[1])) return true;

  const epiFactor = content.match(/EPI factor[ \t]*(?:<[^>]*>)?[ \t]*:[ \t]*(\d+)/i);
  if (epiFactor && Number(epiFactor[1]) > 1) return true;

  const names = [
    content.match(/Protocol name[ \t]*:[ \t]*([^\n\r]*)/i)?.[1],
    content.match(/Examination name[ \t]*:[ \t]*([^\n\r]*)/i)?.[1],
  ];
  return names.some(name => name !== undefined && /rest|bold|fmri|task|epi/i.test(name));
}

export interface SliceEncodingInference {
  direction: SliceEncodingDirection;
  strategy: SliceEncodingStrategy;
}

/**
 * Strategies in priority order; the first that yields a direction wins:
 * explicit orientation code, image table column, patient position, functional default.
 */
export function inferSliceEncodingDirection(
  content: string,
  profile: SiteProfileId,
  table: ImageTable
): SliceEncodingInference | null {
  const fromCode = matchFirst(content, 'sliceOrientation', profile, m =>
    orientationCodeToDirection(parseIntValue(m[1]))
  );
  if (fromCode) return { direction: fromCode, strategy: 'orientation-code' };

  const tableCode = table.findInteger('sliceOrientation', code => code in ORIENTATION_CODES, IMAGE_ROWS_SCANNED);
  const fromTable = orientationCodeToDirection(tableCode);
  if (fromTable) return { direction: fromTable, strategy: 'image-table' };

  const position = matchFirst(content, 'patientPosition', profile, m => parseStringValue(m[1]));
  if (position) {
    const upper = position.toUpperCase();
    if (upper.includes('HEAD FIRST SUPINE') || upper === 'HFS') {
      return { direction: 'k', strategy: 'patient-position' };
    }
  }

  if (looksFunctional(content)) {
    return { direction: 'k', strategy: 'functional-default' };
  }

  return null;
}

// Most specific phrases first
const PHASE_DIRECTION_PHRASES: Array<[string, PhaseEncodingDirection]> = [
  ['anterior-posterior', 'j-'],
  ['posterior-anterior', 'j'],
  ['left-right', 'i-'],
  ['right-left', 'i'],
];

const PHASE_DIRECTION_ABBREVIATIONS = new Map<string, PhaseEncodingDirection>([
  ['ap', 'j-'],
  ['pa', 'j'],
  ['lr', 'i-'],
  ['rl', 'i'],
]);

/**
 * Map free-text direction ("Anterior-Posterior", "right to left", "AP") to a BIDS axis code
 */
export function phaseDirectionFromText(text: string): PhaseEncodingDirection | null {
  const normalized = text
    .trim()
    .toLowerCase()
    .replace(/\s+to\s+/g, '-')
    .replace(/[\s_]*-[\s_]*/g, '-')
    .replace(/[\s_]+/g, '-');

  const abbreviation = PHASE_DIRECTION_ABBREVIATIONS.get(normalized);
  if (abbreviation) return abbreviation;

  for (const [phrase, direction] of PHASE_DIRECTION_PHRASES) {
    if (normalized.includes(phrase)) return direction;
  }
  return null;
}

export function inferPhaseEncodingDirection(
  content: string,
  profile: SiteProfileId
): PhaseEncodingDirection | null {
  return matchFirst(content, 'phaseDirection', profile, m => phaseDirectionFromText(m[1]));
}
