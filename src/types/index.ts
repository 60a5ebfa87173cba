/**
 * Biosignal synthesis type definitions
 *
 * @module types
 */

// Signal types
export type {
  Signal,
  TimeBase,
  WaveformKernel,
  BoundaryPolicy,
  SignalFamily,
  BeatKind,
  BeatAnnotation,
  AnnotatedSignal,
} from './signal';

export { SIGNAL_FAMILIES } from './signal';

// Parameter types
export type {
  GenerationOptions,
  NoiseType,
  MotionArtifactType,
  InterferenceType,
  ElectrodeArtifactType,
  AnyNoiseType,
  NoiseParams,
  NoiseGenerateParams,
  ArtifactType,
  EmgPatternType,
  EmgRampType,
  EmgMovementType,
  IsometricParams,
  DynamicParams,
  RepetitiveParams,
  MovementSegment,
  ComplexParams,
  EmgParams,
  ArrhythmiaType,
  IschemiaType,
  ConductionType,
  EcgCondition,
  HeartBlockDegree,
  WaveShape,
  QrsShape,
  EcgParams,
  EogMovementType,
  GazeDirection,
  PursuitPattern,
  SaccadeParams,
  PursuitParams,
  FixationParams,
  BlinkParams,
  EogParams,
} from './params';

export {
  NOISE_TYPES,
  MOTION_ARTIFACT_TYPES,
  INTERFERENCE_TYPES,
  ELECTRODE_ARTIFACT_TYPES,
  ALL_NOISE_TYPES,
  ARTIFACT_TYPES,
  EMG_PATTERN_TYPES,
  EMG_RAMP_TYPES,
  EMG_MOVEMENT_TYPES,
  ARRHYTHMIA_TYPES,
  ISCHEMIA_TYPES,
  CONDUCTION_TYPES,
  ECG_CONDITIONS,
  EOG_MOVEMENT_TYPES,
  GAZE_DIRECTIONS,
  PURSUIT_PATTERNS,
} from './params';
