import type { ConductorMaterial } from '@/types/line';
import { InvalidInputError } from '@/utils/invalidInput';

export interface ConductorMaterialData {
  id: ConductorMaterial;
  label: string;
  temperatureConstant_C: number; // θ, température d'annulation de la résistance (en valeur absolue)
  defaultRho_ohm_m: number;      // résistivité à 20 °C
}

export const conductorMaterials: Record<ConductorMaterial, ConductorMaterialData> = {
  Copper: {
    id: 'Copper',
    label: 'Cuivre',
    temperatureConstant_C: 234.5,
    defaultRho_ohm_m: 1.724e-8
  },
  Aluminum: {
    id: 'Aluminum',
    label: 'Aluminium',
    temperatureConstant_C: 228.1,
    defaultRho_ohm_m: 2.82e-8
  }
};

export const getTemperatureConstant = (material: ConductorMaterial): number => {
  const data: ConductorMaterialData | undefined = conductorMaterials[material];
  if (!data) {
    throw new InvalidInputError('material', `Matériau inconnu: ${material}`);
  }
  return data.temperatureConstant_C;
};
