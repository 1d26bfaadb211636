import type { LineCalculationResult, SummaryRow } from '@/types/session';

export const SUMMARY_CSV_FILENAME = 'RLC_Summary.csv';
export const SUMMARY_CSV_HEADER = ['Parameter', 'Value'] as const;

/**
 * Tableau récapitulatif des six grandeurs. Un groupe en erreur donne des
 * lignes sans valeur plutôt que de masquer tout le tableau.
 */
export const generateSummaryRows = (result: LineCalculationResult): SummaryRow[] => {
  const r = result.resistance.status === 'ok' ? result.resistance.result : null;
  const l = result.inductance.status === 'ok' ? result.inductance.result : null;
  const c = result.capacitance.status === 'ok' ? result.capacitance.result : null;

  return [
    { parameter: 'Resistance (Ω/km)', value: r?.R_ohm_per_km ?? null },
    { parameter: 'Resistance Total (Ω)', value: r?.R_total_ohm ?? null },
    { parameter: 'Inductance (H/km)', value: l?.L_H_per_km ?? null },
    { parameter: 'Inductance Total (H)', value: l?.L_total_H ?? null },
    { parameter: 'Capacitance (F/km)', value: c?.C_F_per_km ?? null },
    { parameter: 'Capacitance Total (F)', value: c?.C_total_F ?? null }
  ];
};

const escapeCsvField = (field: string): string =>
  /[",\r\n]/.test(field) ? `"${field.replace(/"/g, '""')}"` : field;

export const generateSummaryCsv = (rows: SummaryRow[]): string => {
  const lines = [
    SUMMARY_CSV_HEADER.join(','),
    ...rows.map(row => [row.parameter, row.value === null ? '' : String(row.value)].map(escapeCsvField).join(','))
  ];
  return `${lines.join('\n')}\n`;
};
