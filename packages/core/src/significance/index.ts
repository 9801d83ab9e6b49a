/**
 * Significance Layer
 */

export * from './types.js';
export { SignificanceEvaluator, type SignificanceEvaluatorOptions } from './significance-evaluator.js';
export { loadKnownMechanisms, parseKnownMechanisms, testCausation } from './checks/causation.js';
export { testInformationGain } from './checks/information-gain.js';
export { grangerTest, testPredictivePower, type GrangerOutcome } from './checks/predictive-power.js';
export { testTemporalStability, windowCorrelations, coefficientOfVariation } from './checks/temporal-stability.js';
export { testCompressibility, compressedSize } from './checks/compressibility.js';
export * from './statistics.js';
