import { describe, it, expect } from 'vitest';
import { computeResistance, correctResistivity } from '../resistanceModel';
import { InvalidInputError } from '../invalidInput';
import type { ResistanceInput } from '@/types/line';

const copperLine = (overrides: Partial<ResistanceInput> = {}): ResistanceInput => ({
  material: 'Copper',
  rho1_ohm_m: 1.724e-8,
  area_m2: 300e-6,
  T1_C: 20,
  T2_C: 50,
  length_km: 10,
  ...overrides
});

const captureError = (fn: () => unknown): InvalidInputError => {
  try {
    fn();
  } catch (error) {
    if (error instanceof InvalidInputError) return error;
    throw error;
  }
  throw new Error('InvalidInputError attendue');
};

describe('ResistanceModel', () => {
  it('Cas cuivre 300 mm², 20 → 50 °C, 10 km', () => {
    const result = computeResistance(copperLine());

    expect(result.rho2_ohm_m).toBe(1.724e-8 * (284.5 / 254.5));
    expect(Math.abs(result.rho2_ohm_m - 1.92722e-8)).toBeLessThan(1e-12);
    expect(result.R_ohm_per_km).toBeCloseTo(0.0642407, 7);
    expect(result.R_total_ohm).toBeCloseTo(0.642407, 6);
  });

  it('utilise la constante θ de l\'aluminium (228.1 °C)', () => {
    const result = computeResistance(copperLine({ material: 'Aluminum', rho1_ohm_m: 2.82e-8 }));
    expect(result.rho2_ohm_m).toBe(2.82e-8 * ((50 + 228.1) / (20 + 228.1)));
    expect(result.rho2_ohm_m).toBeCloseTo(3.16099e-8, 12);
  });

  it('la résistance totale vaut exactement R/km × longueur', () => {
    for (const length_km of [0.5, 3, 10, 127.25]) {
      const result = computeResistance(copperLine({ length_km }));
      expect(result.R_total_ohm).toBe(result.R_ohm_per_km * length_km);
    }
  });

  it('ρ2 = ρ1 quand T2 = T1', () => {
    const result = computeResistance(copperLine({ T1_C: 35, T2_C: 35 }));
    expect(result.rho2_ohm_m).toBe(1.724e-8);
  });

  it('la résistivité augmente avec la température de fonctionnement', () => {
    const temperatures = [-40, 0, 20, 75, 150];
    const rhos = temperatures.map(T2_C => computeResistance(copperLine({ T2_C })).rho2_ohm_m);
    for (let i = 1; i < rhos.length; i++) {
      expect(rhos[i]).toBeGreaterThan(rhos[i - 1]);
    }
    expect(computeResistance(copperLine({ T2_C: 60 })).rho2_ohm_m).toBeGreaterThan(1.724e-8);
  });

  it('accepte des températures négatives tant que T + θ > 0', () => {
    const result = computeResistance(copperLine({ T1_C: -20, T2_C: -10 }));
    expect(result.rho2_ohm_m).toBe(1.724e-8 * (224.5 / 214.5));
  });

  describe('rejet des saisies invalides', () => {
    it('section nulle ou négative', () => {
      expect(() => computeResistance(copperLine({ area_m2: 0 }))).toThrow(InvalidInputError);
      expect(captureError(() => computeResistance(copperLine({ area_m2: -1e-4 }))).field).toBe('area_m2');
    });

    it('dénominateur de température nul (T1 = -θ)', () => {
      const error = captureError(() => computeResistance(copperLine({ T1_C: -234.5 })));
      expect(error.field).toBe('T1_C');
      expect(error.name).toBe('InvalidInput');
    });

    it('T2 + θ non positif', () => {
      expect(captureError(() => computeResistance(copperLine({ T2_C: -300 }))).field).toBe('T2_C');
    });

    it('résistivité, longueur et valeurs non finies', () => {
      expect(captureError(() => computeResistance(copperLine({ rho1_ohm_m: 0 }))).field).toBe('rho1_ohm_m');
      expect(captureError(() => computeResistance(copperLine({ length_km: 0 }))).field).toBe('length_km');
      expect(captureError(() => computeResistance(copperLine({ T1_C: NaN }))).field).toBe('T1_C');
      expect(captureError(() => computeResistance(copperLine({ area_m2: Infinity }))).field).toBe('area_m2');
    });
  });

  it('correctResistivity applique ρ1 × (T2 + θ) / (T1 + θ)', () => {
    expect(correctResistivity(2, 10, 30, 10)).toBe(4);
    expect(() => correctResistivity(2, -10, 30, 10)).toThrow(InvalidInputError);
  });
});
