/**
 * Configuration exports
 * @module config
 */

export {
  ECG_WAVE_DEFAULTS,
  ECG_TIMING,
  ECG_DEFAULTS,
  ARRHYTHMIA_DEFAULTS,
  ISCHEMIA_DEFAULTS,
  CONDUCTION_DEFAULTS,
  EMG_DEFAULTS,
  MAIN_SEQUENCE,
  EOG_DEFAULTS,
  FIXATION_DEFAULTS,
  BLINK_DEFAULTS,
  NOISE_DEFAULTS,
  OVERLAY_DEFAULTS,
  BURST_DEFAULTS,
  INTERFERENCE_DEFAULTS,
  BOUNDARY_POLICIES,
  PARAMETER_RANGES,
} from './defaults';
