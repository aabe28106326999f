/**
 * Acquisition site detection
 *
 * The export tool version is the primary signal: 4.1 headers only come from
 * Groningen, 4.2 headers from Amsterdam or Leiden. Within 4.2 the site is
 * taken from patient-name markers, then path markers, then the subject ID
 * range. Detection never throws; a missing signal lowers the confidence.
 */

import type { InferenceSettings } from '../config/inference';
import type { SiteDetection, SiteLabel } from '../types/bids';
import { logger } from '../utils/logger';
import { matchFirst } from './patterns';
import { parseStringValue } from './values';

function findMarker(
  haystack: string,
  markers: Array<{ site: SiteLabel; tokens: string[] }>
): SiteLabel | null {
  const upper = haystack.toUpperCase();
  for (const { site, tokens } of markers) {
    if (tokens.some(token => upper.includes(token))) {
      return site;
    }
  }
  return null;
}

function siteFromSubjectId(content: string, settings: InferenceSettings): SiteLabel | null {
  const range = settings.subjectIdRange;
  if (!range) return null;

  const examName = matchFirst(content, 'examinationName', 'generic', m => parseStringValue(m[1]));
  if (!examName) return null;

  const idMatch = examName.match(new RegExp(`${range.prefix}(\\d{3})`));
  if (!idMatch) return null;

  const suffix = Number(idMatch[1]);
  return suffix < range.threshold ? range.below : range.atOrAbove;
}

function detectCharacteristics(content: string, toolVersion: string | null): Set<string> {
  const characteristics = new Set<string>();

  if (toolVersion === '4.1') characteristics.add('v4.1-format');
  if (toolVersion === '4.2') {
    characteristics.add('v4.2-format');
    characteristics.add('asl-capable');
  }
  if (content.includes('Number of label types')) characteristics.add('asl-capable');
  if (content.includes('SPIR')) characteristics.add('spir-suppression');
  if (content.includes('SENSE')) characteristics.add('sense-acceleration');

  return characteristics;
}

export function detectSite(
  content: string,
  settings: InferenceSettings,
  filePath?: string
): SiteDetection {
  const toolVersion = matchFirst(content, 'toolVersion', 'generic', m => m[1].replace(/\.$/, '') || null);
  const characteristics = detectCharacteristics(content, toolVersion);

  const result = (
    siteLabel: SiteLabel,
    confidence: SiteDetection['confidence'],
    heuristic: SiteDetection['heuristic']
  ): SiteDetection => ({ toolVersion, siteLabel, confidence, characteristics, heuristic });

  if (toolVersion === '4.1') {
    return result('Groningen', 'High', 'tool-version');
  }

  if (toolVersion !== '4.2') {
    logger.debug({ toolVersion }, 'No site mapping for export tool version');
    return result('Unknown', 'Low', 'none');
  }

  const patientName = matchFirst(content, 'patientName', 'amslei-v4.2', m => parseStringValue(m[1]));
  if (patientName) {
    const site = findMarker(patientName, settings.siteMarkers.patientName);
    if (site) return result(site, 'High', 'patient-name');
  }

  if (filePath) {
    const site = findMarker(filePath, settings.siteMarkers.filePath);
    if (site) return result(site, 'Medium', 'file-path');
  }

  const site = siteFromSubjectId(content, settings);
  if (site) {
    logger.debug({ site }, 'Site guessed from subject ID range');
    return result(site, 'Medium', 'subject-id-range');
  }

  return result('Unspecified', 'Low', 'default');
}
