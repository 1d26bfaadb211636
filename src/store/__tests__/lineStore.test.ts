import { describe, it, expect, beforeEach } from 'vitest';
import { createLineStore } from '../lineStore';
import { defaultPhasePositions } from '@/data/defaultLineInputs';

describe('lineStore', () => {
  let store: ReturnType<typeof createLineStore>;

  beforeEach(() => {
    store = createLineStore();
  });

  it('calcule les valeurs par défaut à la création', () => {
    const { results } = store.getState();
    expect(results.resistance.status).toBe('ok');
    expect(results.inductance.status).toBe('ok');
    expect(results.capacitance.status).toBe('ok');
  });

  it('une hauteur nulle retient seulement le groupe capacité', () => {
    const before = store.getState().results;
    store.getState().setCapacitanceInputs({ height_m: 0 });

    const { results } = store.getState();
    expect(results.capacitance.status).toBe('error');
    expect(results.resistance).toBe(before.resistance);
    expect(results.inductance).toBe(before.inductance);

    const rows = store.getState().getSummaryRows();
    expect(rows.map(r => r.value === null)).toEqual([false, false, false, false, true, true]);
  });

  it('le changement de matériau préremplit la résistivité', () => {
    store.getState().setMaterial('Aluminum');

    const { inputs, results } = store.getState();
    expect(inputs.resistance.material).toBe('Aluminum');
    expect(inputs.resistance.rho1_ohm_m).toBe(2.82e-8);
    expect(results.resistance.status).toBe('ok');
    if (results.resistance.status === 'ok') {
      expect(results.resistance.result.rho2_ohm_m).toBeCloseTo(3.16099e-8, 12);
    }
  });

  it('passage en triphasé pour l\'inductance', () => {
    store.getState().setInductanceInputs({ geometry: { kind: 'three-phase', positions: defaultPhasePositions } });

    const { inductance } = store.getState().results;
    expect(inductance.status).toBe('ok');
    if (inductance.status === 'ok') {
      expect(inductance.result.L_H_per_km * 1000).toBeCloseTo(1.3756, 4);
    }
  });

  it('GMR effacé : erreur sur le champ gmr, résistance conservée', () => {
    const before = store.getState().results;
    store.getState().setInductanceInputs({ gmr: undefined });

    const { inductance, resistance } = store.getState().results;
    expect(inductance.status).toBe('error');
    if (inductance.status === 'error') {
      expect(inductance.field).toBe('gmr');
    }
    expect(resistance).toBe(before.resistance);
  });

  it('géométrie ou matériau effacés : erreur sur le champ concerné', () => {
    store.getState().setCapacitanceInputs({ geometry: undefined });
    store.getState().setResistanceInputs({ material: undefined });

    const { capacitance, resistance, inductance } = store.getState().results;
    expect(capacitance.status === 'error' && capacitance.field).toBe('geometry');
    expect(resistance.status === 'error' && resistance.field).toBe('material');
    expect(inductance.status).toBe('ok');
  });

  it('reset revient aux saisies par défaut', () => {
    store.getState().setResistanceInputs({ area_m2: 0 });
    expect(store.getState().results.resistance.status).toBe('error');

    store.getState().reset();
    expect(store.getState().inputs.resistance.area_m2).toBe(0.0003);
    expect(store.getState().results.resistance.status).toBe('ok');
  });

  it('calculateAll recalcule tous les groupes', () => {
    const before = store.getState().results;
    store.getState().calculateAll();
    const after = store.getState().results;
    expect(after).not.toBe(before);
    expect(after).toEqual(before);
  });

  it('export CSV du récapitulatif', () => {
    const lines = store.getState().getSummaryCsv().split('\n');
    expect(lines[0]).toBe('Parameter,Value');
    expect(lines).toHaveLength(8);
    expect(lines[1]).toBe(`Resistance (Ω/km),${String(1.724e-8 * (284.5 / 254.5) / 0.0003 * 1000)}`);
    expect(lines[7]).toBe('');
  });
});
