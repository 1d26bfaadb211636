import type { ResistanceInput, ResistanceResult } from '@/types/line';
import { getTemperatureConstant } from '@/data/conductorMaterials';
import { InvalidInputError, requireFinite, requirePositive, requirePositiveResult } from './invalidInput';
import { perMToPerKm } from './units';

/**
 * Correction de la résistivité en température :
 * ρ2 = ρ1 × (T2 + θ) / (T1 + θ)
 */
export function correctResistivity(rho1_ohm_m: number, T1_C: number, T2_C: number, theta_C: number): number {
  const denominator = T1_C + theta_C;
  if (denominator <= 0) {
    throw new InvalidInputError(
      'T1_C',
      `Température de référence invalide: T1 + θ = ${denominator} °C (doit être > 0)`
    );
  }

  const numerator = T2_C + theta_C;
  if (numerator <= 0) {
    throw new InvalidInputError(
      'T2_C',
      `Température de fonctionnement invalide: T2 + θ = ${numerator} °C (doit être > 0)`
    );
  }

  return rho1_ohm_m * (numerator / denominator);
}

/**
 * Résistance linéique et totale d'un conducteur à la température de fonctionnement.
 */
export function computeResistance(input: ResistanceInput): ResistanceResult {
  const { material, rho1_ohm_m, area_m2, T1_C, T2_C, length_km } = input;

  requirePositive('rho1_ohm_m', rho1_ohm_m, 'Ω·m');
  requirePositive('area_m2', area_m2, 'm²');
  requireFinite('T1_C', T1_C, '°C');
  requireFinite('T2_C', T2_C, '°C');
  requirePositive('length_km', length_km, 'km');

  const theta = getTemperatureConstant(material);
  const rho2_ohm_m = correctResistivity(rho1_ohm_m, T1_C, T2_C, theta);

  const R_ohm_per_km = perMToPerKm(rho2_ohm_m / area_m2);
  requirePositiveResult('R_ohm_per_km', R_ohm_per_km);

  return {
    rho2_ohm_m,
    R_ohm_per_km,
    R_total_ohm: R_ohm_per_km * length_km
  };
}
