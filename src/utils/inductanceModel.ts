import type { GmrInput, InductanceInput, InductanceResult } from '@/types/line';
import { MU_0, SOLID_CONDUCTOR_GMR_FACTOR } from './physicalConstants';
import { resolveGeometry } from './geometryModel';
import { InvalidInputError, requirePositive, requirePositiveResult } from './invalidInput';
import { kmToM, perMToPerKm } from './units';

/**
 * GMR retenu : 0.7788 × r en mode auto, sinon la valeur saisie telle quelle
 * (aucune vérification de cohérence avec le rayon).
 */
export function resolveGmr(radius_m: number, gmr: GmrInput): number {
  switch (gmr?.mode) {
    case 'auto':
      return SOLID_CONDUCTOR_GMR_FACTOR * radius_m;
    case 'custom':
      requirePositive('gmr_m', gmr.gmr_m, 'm');
      return gmr.gmr_m;
    default:
      throw new InvalidInputError('gmr', 'GMR non renseigné (auto ou valeur imposée attendue)');
  }
}

/**
 * Inductance par phase : L = (μ0 / 2π) · ln(GMD / GMR)  [H/m]
 */
export function computeInductance(input: InductanceInput): InductanceResult {
  const { radius_m, gmr, geometry, length_km } = input;

  requirePositive('radius_m', radius_m, 'm');
  requirePositive('length_km', length_km, 'km');

  const gmr_m = resolveGmr(radius_m, gmr);
  const { gmd_m, phaseSpacings } = resolveGeometry(geometry);

  // ln(GMD/GMR) <= 0 donnerait une inductance nulle ou négative
  const logRatio = Math.log(gmd_m) - Math.log(gmr_m);
  if (gmd_m <= gmr_m || logRatio <= 0) {
    throw new InvalidInputError(
      'geometry',
      `GMD (${gmd_m} m) doit être supérieure au GMR (${gmr_m} m)`
    );
  }

  const L_H_per_m = (MU_0 / (2 * Math.PI)) * logRatio;
  requirePositiveResult('L_H_per_km', L_H_per_m);

  return {
    gmr_m,
    gmd_m,
    L_H_per_km: perMToPerKm(L_H_per_m),
    L_total_H: L_H_per_m * kmToM(length_km),
    phaseSpacings
  };
}
