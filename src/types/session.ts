import type {
  CapacitanceInput,
  CapacitanceResult,
  InductanceInput,
  InductanceResult,
  ResistanceInput,
  ResistanceResult,
} from './line';

export type FieldGroup = 'resistance' | 'inductance' | 'capacitance';

// Ordre de calcul : R → L → C
export const FIELD_GROUPS: readonly FieldGroup[] = ['resistance', 'inductance', 'capacitance'];

/**
 * Résultat d'un groupe de champs : soit le calcul, soit le message
 * d'erreur à afficher à la place des valeurs.
 */
export type GroupOutcome<T> =
  | { status: 'ok'; result: T }
  | { status: 'error'; field?: string; message: string };

export interface LineInputs {
  resistance: ResistanceInput;
  inductance: InductanceInput;
  capacitance: CapacitanceInput;
}

export interface LineCalculationResult {
  resistance: GroupOutcome<ResistanceResult>;
  inductance: GroupOutcome<InductanceResult>;
  capacitance: GroupOutcome<CapacitanceResult>;
}

export interface SummaryRow {
  parameter: string;
  value: number | null; // null = groupe en erreur, valeur retenue
}
