import type { ImageColumnMap, SiteProfile, SiteProfileId } from '../types/bids';

// Column layout shared by every 4.x export; later versions only append columns
const V4_COLUMNS: ImageColumnMap = {
  minColumns: 41,
  sliceNumber: 0,
  reconResolutionX: 9,
  reconResolutionY: 10,
  rescaleIntercept: 11,
  rescaleSlope: 12,
  scaleSlope: 13,
  sliceThickness: 22,
  sliceGap: 23,
  sliceOrientation: 25,
  echoTime: 30,
  flipAngle: 35,
};

export const SITE_PROFILES: Record<SiteProfileId, SiteProfile> = {
  // 4.1 adds diffusion b-value/gradient numbers, contrast and anisotropy types and the diffusion vector
  'groningen-v4.1': { id: 'groningen-v4.1', columns: { ...V4_COLUMNS, minColumns: 48 } },
  // 4.2 adds the ASL label type
  'amslei-v4.2': { id: 'amslei-v4.2', columns: { ...V4_COLUMNS, minColumns: 49 } },
  generic: { id: 'generic', columns: V4_COLUMNS },
};

/**
 * Pick the profile for a detected export tool version
 */
export function selectProfile(toolVersion: string | null): SiteProfile {
  switch (toolVersion) {
    case '4.1':
      return SITE_PROFILES['groningen-v4.1'];
    case '4.2':
      return SITE_PROFILES['amslei-v4.2'];
    default:
      return SITE_PROFILES.generic;
  }
}
