import { roundTo } from './values';

/**
 * Effective echo spacing (seconds, 8 decimals) from the water-fat shift in
 * pixels and the phase-encode size of the reconstruction matrix.
 *
 *   bandwidthPerPixel = waterFatShiftHz / wfsPixels
 *   EES = 1 / (bandwidthPerPixel * reconMatrixPE)
 */
export function computeEffectiveEchoSpacing(
  waterFatShiftPixels: number,
  reconMatrixPE: number,
  waterFatShiftHz: number
): number | null {
  if (!(waterFatShiftPixels > 0) || !(reconMatrixPE > 0) || !(waterFatShiftHz > 0)) {
    return null;
  }

  const bandwidthPerPixelHz = waterFatShiftHz / waterFatShiftPixels;
  return roundTo(1 / (bandwidthPerPixelHz * reconMatrixPE), 8);
}
