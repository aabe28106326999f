import type { InferenceResult } from '../types/bids';
import { logger } from '../utils/logger';
import { inferBidsFields, InferenceOptions } from './inferencer';
import { readHeaderFile } from './reader';

export { inferBidsFields } from './inferencer';
export type { InferenceOptions } from './inferencer';
export { readHeaderFile } from './reader';
export { detectSite } from './site-detector';
export { selectProfile, SITE_PROFILES } from './profiles';
export { computeSliceTiming, interleavedAcquisitionOrder } from './slice-timing';
export { computeEffectiveEchoSpacing } from './echo-spacing';
export { phaseDirectionFromText, orientationCodeToDirection } from './directions';

/**
 * Read a PAR file and infer its BIDS fields. Throws HeaderReadError when the
 * file cannot be read; never throws for missing fields.
 */
export async function extractFromParFile(
  filePath: string,
  options: Omit<InferenceOptions, 'filePath'> = {}
): Promise<InferenceResult> {
  const content = await readHeaderFile(filePath);
  const result = inferBidsFields(content, { ...options, filePath });

  logger.info(
    {
      filePath,
      site: result.site.siteLabel,
      confidence: result.site.confidence,
      toolVersion: result.site.toolVersion,
      fields: Object.keys(result.fields).length,
    },
    'Extracted BIDS fields from PAR header'
  );

  return result;
}
