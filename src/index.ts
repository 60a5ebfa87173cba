/**
 * biosignal-synth - Synthetic EMG, ECG and EOG with noise and artifacts
 *
 * Reproducible, labelled test signals for biosignal-processing software.
 *
 * @packageDocumentation
 */

// Version
export const VERSION = '0.1.0';

// ============================================================================
// Types
// ============================================================================

export * from './types';

// ============================================================================
// Configuration
// ============================================================================

export * from './config';

// ============================================================================
// Synthesis
// ============================================================================

export * from './signal';

// ============================================================================
// Utilities
// ============================================================================

export * from './utils';
