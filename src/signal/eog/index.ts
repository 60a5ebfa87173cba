/**
 * EOG exports
 * @module signal/eog
 */

export { EogSynthesizer } from './eog-synthesizer';
export {
  mainSequenceDuration,
  mainSequenceVelocity,
  resolveSaccades,
  renderSaccades,
  placeSaccade,
} from './saccades';
export type { EogContext, Saccade } from './saccades';
export { renderPursuit } from './pursuit';
export type { PursuitSettings } from './pursuit';
export { drift, tremor, addMicrosaccades, renderFixation } from './fixation';
export type { FixationSettings } from './fixation';
export { blinkProfile, scheduleBlinks, checkBlinkFeasibility, renderBlinks } from './blinks';
export type { Blink, BlinkSettings } from './blinks';
