import type { LineInputs } from '@/types/session';
import type { PhasePositions } from '@/types/line';
import { conductorMaterials } from './conductorMaterials';
import { mm2ToM2, mmToM } from '@/utils/units';

// Disposition horizontale par défaut : A(0,10) B(6,10) C(12,10)
export const defaultPhasePositions: PhasePositions = [
  { x_m: 0, y_m: 10 },
  { x_m: 6, y_m: 10 },
  { x_m: 12, y_m: 10 }
];

export const DEFAULT_LENGTH_KM = 10;
export const DEFAULT_RADIUS_MM = 10;

/**
 * Valeurs préremplies du formulaire de calcul.
 * Chaque appel renvoie un nouvel objet, les overrides remplacent des groupes entiers.
 */
export const createDefaultLineInputs = (overrides: Partial<LineInputs> = {}): LineInputs => ({
  resistance: {
    material: 'Copper',
    rho1_ohm_m: conductorMaterials.Copper.defaultRho_ohm_m,
    area_m2: mm2ToM2(300),
    T1_C: 20,
    T2_C: 50,
    length_km: DEFAULT_LENGTH_KM
  },
  inductance: {
    radius_m: mmToM(DEFAULT_RADIUS_MM),
    gmr: { mode: 'auto' },
    geometry: { kind: 'single', spacing_m: 2 },
    length_km: DEFAULT_LENGTH_KM
  },
  capacitance: {
    radius_m: mmToM(DEFAULT_RADIUS_MM),
    height_m: 10,
    geometry: { kind: 'single', spacing_m: 2 },
    length_km: DEFAULT_LENGTH_KM
  },
  ...overrides
});
