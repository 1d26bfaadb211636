export type ConductorMaterial = "Copper" | "Aluminum";

export interface Point {
  x_m: number;
  y_m: number;
}

// Positions des phases A, B, C
export type PhasePositions = [Point, Point, Point];

export interface SinglePhaseGeometry {
  kind: "single";
  spacing_m: number; // distance entre les deux conducteurs
}

export interface ThreePhaseGeometry {
  kind: "three-phase"; // ligne transposée
  positions: PhasePositions;
}

export type LineGeometry = SinglePhaseGeometry | ThreePhaseGeometry;

// GMR: calcul automatique (0.7788 × r) ou valeur imposée
export type GmrInput =
  | { mode: "auto" }
  | { mode: "custom"; gmr_m: number };

export interface ResistanceInput {
  material: ConductorMaterial;
  rho1_ohm_m: number;  // résistivité à T1
  area_m2: number;     // section du conducteur
  T1_C: number;        // température de référence
  T2_C: number;        // température de fonctionnement
  length_km: number;
}

export interface InductanceInput {
  radius_m: number;
  gmr: GmrInput;
  geometry: LineGeometry;
  length_km: number;
}

export interface CapacitanceInput {
  radius_m: number;
  height_m: number;    // hauteur moyenne au-dessus du sol (monophasé)
  geometry: LineGeometry;
  length_km: number;
}

export interface ResistanceResult {
  rho2_ohm_m: number;
  R_ohm_per_km: number;
  R_total_ohm: number;
}

export interface PhaseSpacings {
  Dab_m: number;
  Dbc_m: number;
  Dca_m: number;
}

export interface InductanceResult {
  gmr_m: number;
  gmd_m: number;
  L_H_per_km: number;
  L_total_H: number;
  phaseSpacings?: PhaseSpacings; // triphasé uniquement
}

export interface CapacitanceResult {
  gmd_m: number;
  heightEffect_m?: number; // Dp, triphasé uniquement
  Deq_m: number;
  C_F_per_km: number;
  C_total_F: number;
  phaseSpacings?: PhaseSpacings;
}
