import { createStore } from 'zustand/vanilla';
import type {
  CapacitanceInput,
  ConductorMaterial,
  InductanceInput,
  ResistanceInput,
} from '@/types/line';
import type { LineCalculationResult, LineInputs, SummaryRow } from '@/types/session';
import { conductorMaterials } from '@/data/conductorMaterials';
import { createDefaultLineInputs } from '@/data/defaultLineInputs';
import {
  calculateCapacitanceGroup,
  calculateInductanceGroup,
  calculateResistanceGroup,
  runLineCalculation,
} from '@/services/calculationRunner';
import { generateSummaryCsv, generateSummaryRows } from '@/utils/tableGenerator';

interface LineStoreState {
  inputs: LineInputs;
  results: LineCalculationResult;
}

interface LineActions {
  // Saisies (mise à jour partielle, recalcul du seul groupe concerné)
  setResistanceInputs: (updates: Partial<ResistanceInput>) => void;
  setInductanceInputs: (updates: Partial<InductanceInput>) => void;
  setCapacitanceInputs: (updates: Partial<CapacitanceInput>) => void;
  setMaterial: (material: ConductorMaterial) => void;

  // Calculs
  calculateAll: () => void;
  reset: () => void;

  // Récapitulatif
  getSummaryRows: () => SummaryRow[];
  getSummaryCsv: () => string;
}

export type LineStore = LineStoreState & LineActions;

/**
 * Session de calcul : saisies des trois onglets et derniers résultats.
 * Une erreur de saisie dans un groupe n'efface pas les résultats des autres.
 */
export const createLineStore = (initialInputs: LineInputs = createDefaultLineInputs()) =>
  createStore<LineStore>((set, get) => ({
    inputs: initialInputs,
    results: runLineCalculation(initialInputs),

    setResistanceInputs: (updates) => {
      set((state) => {
        const inputs = { ...state.inputs, resistance: { ...state.inputs.resistance, ...updates } };
        return { inputs, results: { ...state.results, resistance: calculateResistanceGroup(inputs) } };
      });
    },

    setInductanceInputs: (updates) => {
      set((state) => {
        const inputs = { ...state.inputs, inductance: { ...state.inputs.inductance, ...updates } };
        return { inputs, results: { ...state.results, inductance: calculateInductanceGroup(inputs) } };
      });
    },

    setCapacitanceInputs: (updates) => {
      set((state) => {
        const inputs = { ...state.inputs, capacitance: { ...state.inputs.capacitance, ...updates } };
        return { inputs, results: { ...state.results, capacitance: calculateCapacitanceGroup(inputs) } };
      });
    },

    // Le changement de matériau préremplit la résistivité de référence
    setMaterial: (material) => {
      get().setResistanceInputs({
        material,
        rho1_ohm_m: conductorMaterials[material].defaultRho_ohm_m
      });
    },

    calculateAll: () => {
      const { inputs } = get();
      set({ results: runLineCalculation(inputs) });
    },

    reset: () => {
      const inputs = createDefaultLineInputs();
      set({ inputs, results: runLineCalculation(inputs) });
    },

    getSummaryRows: () => generateSummaryRows(get().results),

    getSummaryCsv: () => generateSummaryCsv(get().getSummaryRows()),
  }));
