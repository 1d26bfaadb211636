import type { CapacitanceInput, CapacitanceResult, LineGeometry, PhaseSpacings } from '@/types/line';
import { EPSILON_0 } from './physicalConstants';
import { equivalentHeightEffect, resolveGeometry } from './geometryModel';
import { InvalidInputError, requirePositive, requirePositiveResult } from './invalidInput';
import { kmToM, perMToPerKm } from './units';

export interface EquivalentSpacing {
  gmd_m: number;
  heightEffect_m?: number;
  Deq_m: number;
  phaseSpacings?: PhaseSpacings;
}

/**
 * Distance équivalente D_eq tenant compte du plan de masse (méthode des images).
 *
 * - monophasé : D_eq = √(D² + (2h)²)
 * - triphasé  : D_eq = √(GMD · Dp), Dp = (2yA · 2yB · 2yC)^(1/3)
 */
export function equivalentSpacing(geometry: LineGeometry, height_m: number): EquivalentSpacing {
  const { gmd_m, phaseSpacings } = resolveGeometry(geometry);

  if (geometry.kind === 'single') {
    return {
      gmd_m,
      Deq_m: Math.hypot(gmd_m, 2 * height_m)
    };
  }

  const heightEffect_m = equivalentHeightEffect(geometry.positions);
  return {
    gmd_m,
    heightEffect_m,
    Deq_m: Math.sqrt(gmd_m) * Math.sqrt(heightEffect_m),
    phaseSpacings
  };
}

/**
 * Capacité phase-terre : C = 2π·ε0 / ln(D_eq / r)  [F/m]
 */
export function computeCapacitance(input: CapacitanceInput): CapacitanceResult {
  const { radius_m, height_m, geometry, length_km } = input;

  requirePositive('radius_m', radius_m, 'm');
  requirePositive('height_m', height_m, 'm');
  requirePositive('length_km', length_km, 'km');

  const { gmd_m, heightEffect_m, Deq_m, phaseSpacings } = equivalentSpacing(geometry, height_m);

  const logRatio = Math.log(Deq_m) - Math.log(radius_m);
  if (Deq_m <= radius_m || logRatio <= 0) {
    throw new InvalidInputError(
      'geometry',
      `Distance équivalente (${Deq_m} m) inférieure ou égale au rayon (${radius_m} m)`
    );
  }

  const C_F_per_m = (2 * Math.PI * EPSILON_0) / logRatio;
  requirePositiveResult('C_F_per_km', C_F_per_m);

  return {
    gmd_m,
    heightEffect_m,
    Deq_m,
    C_F_per_km: perMToPerKm(C_F_per_m),
    C_total_F: C_F_per_m * kmToM(length_km),
    phaseSpacings
  };
}
