import type { LineGeometry, PhasePositions, PhaseSpacings, Point } from '@/types/line';
import { InvalidInputError, requireFinite, requirePositive } from './invalidInput';

const requireFinitePoint = (label: string, p: Point): void => {
  requireFinite(`${label}.x_m`, p.x_m, 'm');
  requireFinite(`${label}.y_m`, p.y_m, 'm');
};

const distance = (a: Point, b: Point): number => Math.hypot(a.x_m - b.x_m, a.y_m - b.y_m);

/**
 * Distances entre phases Dab, Dbc, Dca.
 * Deux conducteurs confondus rendent la GMD (et ln(GMD/GMR)) indéfinie.
 */
export function pairwiseDistances(a: Point, b: Point, c: Point): PhaseSpacings {
  requireFinitePoint('A', a);
  requireFinitePoint('B', b);
  requireFinitePoint('C', c);

  const spacings: PhaseSpacings = {
    Dab_m: distance(a, b),
    Dbc_m: distance(b, c),
    Dca_m: distance(c, a)
  };

  const pairs: Array<[string, number]> = [
    ['A-B', spacings.Dab_m],
    ['B-C', spacings.Dbc_m],
    ['C-A', spacings.Dca_m]
  ];
  for (const [pair, d] of pairs) {
    if (d <= 0) {
      throw new InvalidInputError('positions', `Conducteurs ${pair} confondus: distance nulle`);
    }
  }

  return spacings;
}

// Racines cubiques prises séparément : le produit a·b·c sort de la plage des doubles
// pour des distances très grandes ou très petites
export const geometricMean3 = (a: number, b: number, c: number): number =>
  Math.cbrt(a) * Math.cbrt(b) * Math.cbrt(c);

export const spacingsGmd = (s: PhaseSpacings): number => geometricMean3(s.Dab_m, s.Dbc_m, s.Dca_m);

/**
 * GMD de la ligne : l'espacement en monophasé, (Dab·Dbc·Dca)^(1/3) en triphasé transposé.
 */
export function geometricMeanDistance(geometry: LineGeometry): number {
  switch (geometry?.kind) {
    case 'single':
      requirePositive('spacing_m', geometry.spacing_m, 'm');
      return geometry.spacing_m;
    case 'three-phase': {
      const [a, b, c] = geometry.positions;
      return spacingsGmd(pairwiseDistances(a, b, c));
    }
    default:
      throw new InvalidInputError('geometry', 'Géométrie de ligne non renseignée');
  }
}

/**
 * Méthode des images : chaque conducteur est à 2·y de son image sous le sol.
 */
const imageDistance = (label: string, p: Point): number => {
  requireFinitePoint(label, p);
  if (p.y_m <= 0) {
    throw new InvalidInputError(
      `${label}.y_m`,
      `Hauteur de la phase ${label} invalide: ${p.y_m} m (doit être > 0)`
    );
  }
  return 2 * p.y_m;
};

export function imageDistances(positions: PhasePositions): [number, number, number] {
  const [a, b, c] = positions;
  return [imageDistance('A', a), imageDistance('B', b), imageDistance('C', c)];
}

// Dp : moyenne géométrique des distances conducteur-image
export function equivalentHeightEffect(positions: PhasePositions): number {
  const [dA, dB, dC] = imageDistances(positions);
  return geometricMean3(dA, dB, dC);
}

export interface ResolvedGeometry {
  gmd_m: number;
  phaseSpacings?: PhaseSpacings;
}

// GMD et, en triphasé, les distances entre phases utilisées pour la calculer
export function resolveGeometry(geometry: LineGeometry): ResolvedGeometry {
  if (geometry?.kind !== 'three-phase') {
    return { gmd_m: geometricMeanDistance(geometry) };
  }
  const [a, b, c] = geometry.positions;
  const phaseSpacings = pairwiseDistances(a, b, c);
  return { gmd_m: spacingsGmd(phaseSpacings), phaseSpacings };
}
