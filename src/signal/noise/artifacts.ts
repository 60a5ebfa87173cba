/**
 * Motion and electrode artifacts
 *
 * Burst artifacts share one scheduler: `nEvents` bursts of `duration`
 * seconds at uniformly drawn start times.
 *
 * @module signal/noise/artifacts
 */

import { BURST_DEFAULTS, INTERFERENCE_DEFAULTS, NOISE_DEFAULTS } from '../../config/defaults';
import type { ElectrodeArtifactType, MotionArtifactType, NoiseParams } from '../../types';
import { hanning, linspace } from '../../utils/math';
import { requireFinite, requireInteger, requirePositive } from '../../utils/validation';
import { exponentialDecay } from '../kernels';
import { addConstant } from '../placement';
import { burstSettings, burstTone, placeBursts } from './bursts';
import type { NoiseContext, NoiseStrategy } from './bursts';

function amplitudeOf(params: NoiseParams): number {
  return requireFinite(params.amplitude ?? NOISE_DEFAULTS.amplitude, 'amplitude');
}

// ============================================================================
// Motion
// ============================================================================

function electrodeMovement(context: NoiseContext, params: NoiseParams): number[] {
  const amplitude = amplitudeOf(params);
  const settings = burstSettings(params, BURST_DEFAULTS.electrode_movement, context.timeBase, params.nArtifacts);
  const { samplingRate } = context.timeBase;

  return placeBursts(context, settings, (_samples, duration) =>
    exponentialDecay(amplitude * context.random.sign(), duration, samplingRate)
  );
}

function cableMotion(context: NoiseContext, params: NoiseParams): number[] {
  const amplitude = amplitudeOf(params);
  const settings = burstSettings(params, BURST_DEFAULTS.cable_motion, context.timeBase, params.nArtifacts);

  return placeBursts(context, settings, (samples, duration) => {
    const frequency = context.random.uniform(10, 30);
    const envelope = hanning(samples);
    return burstTone(samples, duration, frequency).map((v, i) => amplitude * envelope[i] * v);
  });
}

function subjectMovement(context: NoiseContext, params: NoiseParams): number[] {
  const amplitude = amplitudeOf(params);
  const settings = burstSettings(params, BURST_DEFAULTS.subject_movement, context.timeBase, params.nArtifacts);

  return placeBursts(context, settings, (samples, duration) => {
    const burst = new Array<number>(samples).fill(0);
    for (const frequency of [2, 5, 8]) {
      const tone = burstTone(samples, duration, frequency, context.random.uniform(0, 2 * Math.PI));
      for (let i = 0; i < samples; i++) {
        burst[i] += (amplitude / 3) * tone[i];
      }
    }
    const shift = context.random.uniform(-amplitude / 2, amplitude / 2);
    return burst.map(v => v + shift);
  });
}

function baselineShift(context: NoiseContext, params: NoiseParams): number[] {
  const amplitude = amplitudeOf(params);
  const settings = burstSettings(params, BURST_DEFAULTS.baseline_shift, context.timeBase, params.nArtifacts);

  return placeBursts(context, settings, samples => {
    const shift = amplitude * context.random.sign();
    // Half of the shifts recover linearly, the rest hold for the whole burst
    return context.random.chance(0.5)
      ? linspace(shift, 0, samples)
      : new Array<number>(samples).fill(shift);
  });
}

export const MOTION_STRATEGIES: Record<MotionArtifactType, NoiseStrategy> = {
  electrode_movement: electrodeMovement,
  cable_motion: cableMotion,
  subject_movement: subjectMovement,
  baseline_shift: baselineShift,
};

// ============================================================================
// Electrode
// ============================================================================

function poorContact(context: NoiseContext, params: NoiseParams): number[] {
  const amplitude = amplitudeOf(params);
  const settings = burstSettings(params, BURST_DEFAULTS.poor_contact, context.timeBase);

  return placeBursts(context, settings, samples => {
    const burst = new Array<number>(samples);
    for (let i = 0; i < samples; i++) {
      const dropout = context.random.chance(0.3);
      const noise = context.random.normal(0, Math.abs(amplitude));
      burst[i] = dropout ? 0 : noise;
    }
    return burst;
  });
}

function electrodePop(context: NoiseContext, params: NoiseParams): number[] {
  const amplitude = amplitudeOf(params);
  const settings = burstSettings(params, BURST_DEFAULTS.electrode_pop, context.timeBase);
  const { samplingRate } = context.timeBase;

  return placeBursts(context, settings, (_samples, duration) =>
    exponentialDecay(amplitude * context.random.sign(), duration, samplingRate)
  );
}

function impedanceChange(context: NoiseContext, params: NoiseParams): number[] {
  const amplitude = amplitudeOf(params);
  const settings = burstSettings(params, BURST_DEFAULTS.impedance_change, context.timeBase);

  return placeBursts(context, settings, samples =>
    linspace(0, 1, samples).map(
      transition => amplitude * transition * (1 + context.random.normal(0, 0.2 * Math.abs(amplitude)))
    )
  );
}

function dcOffset({ timeBase, random }: NoiseContext, params: NoiseParams): number[] {
  const amplitude = amplitudeOf(params);
  const drift = requirePositive(params.driftFrequency ?? INTERFERENCE_DEFAULTS.dcDriftFrequency, 'driftFrequency');
  const steps = requireInteger(params.nEvents ?? INTERFERENCE_DEFAULTS.dcSteps, 'nEvents');

  const base = amplitude * random.uniform(-1, 1);
  const signal = timeBase.time.map(t => base + amplitude * 0.5 * Math.sin(2 * Math.PI * drift * t));

  for (let i = 0; i < steps; i++) {
    const start = Math.round(random.uniform(0, timeBase.duration) * timeBase.samplingRate);
    addConstant(signal, amplitude * random.uniform(-0.5, 0.5), start);
  }
  return signal;
}

export const ELECTRODE_STRATEGIES: Record<ElectrodeArtifactType, NoiseStrategy> = {
  poor_contact: poorContact,
  electrode_pop: electrodePop,
  impedance_change: impedanceChange,
  dc_offset: dcOffset,
};
