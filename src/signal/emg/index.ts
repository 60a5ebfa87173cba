/**
 * EMG exports
 * @module signal/emg
 */

export { EmgSynthesizer } from './emg-synthesizer';
export { firingRate, fireMotorUnits, applyFatigue } from './firing';
export type { FiringContext } from './firing';
export { constantEnvelope, rampEnvelope, customEnvelope, repetitiveEnvelope } from './patterns';
