// Conversions d'unités pour les saisies en mm / mm² / km
export const mmToM = (mm: number): number => mm / 1000;
export const mm2ToM2 = (mm2: number): number => mm2 / 1e6;
export const kmToM = (km: number): number => km * 1000;
export const perMToPerKm = (valuePerM: number): number => valuePerM * 1000;
