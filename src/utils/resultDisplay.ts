import type { CapacitanceResult, InductanceResult, ResistanceResult } from '@/types/line';
import type { GroupOutcome, LineCalculationResult } from '@/types/session';

/**
 * Formats d'affichage des résultats (mêmes précisions que la fiche de calcul) :
 * résistivité en notation scientifique à 4 décimales, L et C à 6 décimales,
 * résistances et distances en notation fixe à 6 décimales.
 */
export const formatResistivity = (rho_ohm_m: number): string => `${rho_ohm_m.toExponential(4)} Ω·m`;
export const formatFixed = (value: number, unit: string): string => `${value.toFixed(6)} ${unit}`;
export const formatScientific = (value: number, unit: string): string => `${value.toExponential(6)} ${unit}`;
export const formatDistance = (value_m: number): string => formatFixed(value_m, 'm');

export interface DisplayLine {
  label: string;
  value: string;
}

export interface GroupDisplay {
  title: string;
  lines: DisplayLine[];
  error?: string;
  note: string;
}

export const interpretationNotes = {
  resistance: "L'augmentation de la température accroît la résistivité et la résistance totale.",
  inductance: "L'augmentation de l'espacement entre conducteurs accroît l'inductance.",
  capacitance: "La capacité diminue lorsque l'espacement et la hauteur au-dessus du sol augmentent."
} as const;

export function getResistanceLines(r: ResistanceResult): DisplayLine[] {
  return [
    { label: 'Résistivité corrigée ρ2', value: formatResistivity(r.rho2_ohm_m) },
    { label: 'Résistance par km', value: formatFixed(r.R_ohm_per_km, 'Ω/km') },
    { label: 'Résistance totale', value: formatFixed(r.R_total_ohm, 'Ω') }
  ];
}

export function getInductanceLines(l: InductanceResult): DisplayLine[] {
  const lines: DisplayLine[] = [];
  if (l.phaseSpacings) {
    const { Dab_m, Dbc_m, Dca_m } = l.phaseSpacings;
    lines.push({
      label: 'Distances entre phases',
      value: `Dab=${Dab_m.toFixed(3)} m, Dbc=${Dbc_m.toFixed(3)} m, Dca=${Dca_m.toFixed(3)} m`
    });
  }
  lines.push(
    { label: 'GMR', value: formatDistance(l.gmr_m) },
    { label: 'GMD', value: formatDistance(l.gmd_m) },
    { label: 'Inductance par km', value: formatScientific(l.L_H_per_km, 'H/km') },
    { label: 'Inductance totale', value: formatScientific(l.L_total_H, 'H') }
  );
  return lines;
}

export function getCapacitanceLines(c: CapacitanceResult): DisplayLine[] {
  const lines: DisplayLine[] = [{ label: 'GMD (effective)', value: formatDistance(c.gmd_m) }];
  if (c.heightEffect_m !== undefined) {
    lines.push({ label: 'Effet de hauteur équivalent Dp', value: formatDistance(c.heightEffect_m) });
  }
  lines.push(
    { label: 'Distance équivalente D_eq', value: formatDistance(c.Deq_m) },
    { label: 'Capacité par km', value: formatScientific(c.C_F_per_km, 'F/km') },
    { label: 'Capacité totale', value: formatScientific(c.C_total_F, 'F') }
  );
  return lines;
}

const toGroupDisplay = <T>(
  title: string,
  outcome: GroupOutcome<T>,
  toLines: (result: T) => DisplayLine[],
  note: string
): GroupDisplay =>
  outcome.status === 'ok'
    ? { title, lines: toLines(outcome.result), note }
    : { title, lines: [], error: outcome.message, note };

export function getCalculationDisplay(result: LineCalculationResult): GroupDisplay[] {
  return [
    toGroupDisplay('Résistance', result.resistance, getResistanceLines, interpretationNotes.resistance),
    toGroupDisplay('Inductance', result.inductance, getInductanceLines, interpretationNotes.inductance),
    toGroupDisplay('Capacité', result.capacitance, getCapacitanceLines, interpretationNotes.capacitance)
  ];
}
