export const MU_0 = 4 * Math.PI * 1e-7;   // Perméabilité du vide (H/m)
export const EPSILON_0 = 8.854e-12;       // Permittivité du vide (F/m)

// GMR d'un conducteur plein et rond : r' = r·e^(-1/4) ≈ 0.7788·r
export const SOLID_CONDUCTOR_GMR_FACTOR = 0.7788;
