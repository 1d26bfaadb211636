import { computeResistance } from '@/utils/resistanceModel';
import { computeInductance } from '@/utils/inductanceModel';
import { computeCapacitance } from '@/utils/capacitanceModel';
import { isInvalidInputError } from '@/utils/invalidInput';
import { FIELD_GROUPS, type FieldGroup, type GroupOutcome, type LineCalculationResult, type LineInputs } from '@/types/session';

const groupLabels: Record<FieldGroup, string> = {
  resistance: 'résistance',
  inductance: 'inductance',
  capacitance: 'capacité'
};

/**
 * Exécute le calcul d'un groupe de champs. Seules les erreurs de saisie
 * deviennent un résultat en erreur ; toute autre exception remonte.
 */
export function runGroup<T>(group: FieldGroup, compute: () => T): GroupOutcome<T> {
  try {
    return { status: 'ok', result: compute() };
  } catch (error) {
    if (isInvalidInputError(error)) {
      console.warn(`⚠️ Calcul ${groupLabels[group]} impossible: ${error.message}`);
      return { status: 'error', field: error.field, message: error.message };
    }
    throw error;
  }
}

export const calculateResistanceGroup = (inputs: LineInputs) =>
  runGroup('resistance', () => computeResistance(inputs.resistance));

export const calculateInductanceGroup = (inputs: LineInputs) =>
  runGroup('inductance', () => computeInductance(inputs.inductance));

export const calculateCapacitanceGroup = (inputs: LineInputs) =>
  runGroup('capacitance', () => computeCapacitance(inputs.capacitance));

/**
 * Calcul complet R → L → C. Un groupe en erreur ne bloque pas les autres.
 */
export function runLineCalculation(inputs: LineInputs): LineCalculationResult {
  const result: LineCalculationResult = {
    resistance: calculateResistanceGroup(inputs),
    inductance: calculateInductanceGroup(inputs),
    capacitance: calculateCapacitanceGroup(inputs)
  };

  const computed = FIELD_GROUPS.filter(g => result[g].status === 'ok');
  console.log(`📊 Calcul paramètres de ligne: ${computed.length}/${FIELD_GROUPS.length} groupes calculés`);

  return result;
}
