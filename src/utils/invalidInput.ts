/**
 * Erreur unique des modèles de calcul : une précondition sur les données
 * d'entrée n'est pas respectée (dimension non positive, points confondus,
 * argument de logarithme non positif, dénominateur de température nul).
 */
export class InvalidInputError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'InvalidInput';
    this.field = field;
  }
}

export const isInvalidInputError = (error: unknown): error is InvalidInputError =>
  error instanceof InvalidInputError;

export function requireFinite(field: string, value: number, unit: string): void {
  if (!isFinite(value)) {
    throw new InvalidInputError(field, `${field} invalide: ${value} ${unit} (valeur non finie)`);
  }
}

export function requirePositive(field: string, value: number, unit: string): void {
  requireFinite(field, value, unit);
  if (value <= 0) {
    throw new InvalidInputError(field, `${field} invalide: ${value} ${unit} (doit être > 0)`);
  }
}

// Résultat hors de la plage des doubles (dépassement ou sous-dépassement)
export function requirePositiveResult(field: string, value: number): void {
  if (!isFinite(value) || value <= 0) {
    throw new InvalidInputError(field, `Résultat ${field} hors plage numérique: ${value}`);
  }
}
