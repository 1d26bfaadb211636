export type * from './types/line';
export type * from './types/session';
export { FIELD_GROUPS } from './types/session';

export { conductorMaterials, getTemperatureConstant } from './data/conductorMaterials';
export type { ConductorMaterialData } from './data/conductorMaterials';
export { createDefaultLineInputs, defaultPhasePositions } from './data/defaultLineInputs';

export { MU_0, EPSILON_0, SOLID_CONDUCTOR_GMR_FACTOR } from './utils/physicalConstants';
export { mmToM, mm2ToM2, kmToM } from './utils/units';
export { InvalidInputError, isInvalidInputError } from './utils/invalidInput';

export { computeResistance, correctResistivity } from './utils/resistanceModel';
export {
  pairwiseDistances,
  geometricMeanDistance,
  imageDistances,
  equivalentHeightEffect,
} from './utils/geometryModel';
export { computeInductance, resolveGmr } from './utils/inductanceModel';
export { computeCapacitance, equivalentSpacing } from './utils/capacitanceModel';

export { runLineCalculation } from './services/calculationRunner';
export { createLineStore } from './store/lineStore';
export type { LineStore } from './store/lineStore';

export {
  generateSummaryRows,
  generateSummaryCsv,
  SUMMARY_CSV_FILENAME,
} from './utils/tableGenerator';
export { getCalculationDisplay, interpretationNotes } from './utils/resultDisplay';
export { PDFGenerator, reportFileName } from './utils/pdfGenerator';
export type { PDFData } from './utils/pdfGenerator';
