/**
 * ECG exports
 * @module signal/ecg
 */

export { EcgSynthesizer } from './ecg-synthesizer';
export { ECG_STRATEGIES } from './conditions';
export type { EcgContext, EcgSettings, EcgStrategy } from './conditions';
export { buildMorphology, conductedBeat, blockedBeat, ventricularBeat, qtGap } from './morphology';
export type { BeatLayout, Morphology, MorphologySpec, WaveSpec } from './morphology';
