/**
 * Surface EMG generator
 *
 * @example
 * ```typescript
 * const emg = new EmgSynthesizer(1000, 5);
 * const hold = emg.generate({ intensity: 0.8, fatigueRate: 1.5 });
 * const lift = emg.generate({ patternType: 'dynamic', rampType: 'sine', maxIntensity: 0.9 });
 * ```
 *
 * @module signal/emg/emg-synthesizer
 */

import { EMG_DEFAULTS } from '../../config/defaults';
import { EMG_MOVEMENT_TYPES, EMG_PATTERN_TYPES, EMG_RAMP_TYPES } from '../../types';
import type {
  BoundaryPolicy,
  ComplexParams,
  DynamicParams,
  EmgParams,
  IsometricParams,
  RepetitiveParams,
} from '../../types';
import {
  InvalidParameterError,
  requireNonNegative,
  requireOneOf,
  requirePositive,
  requireUnitInterval,
} from '../../utils/validation';
import { placeKernel } from '../placement';
import { Synthesizer, type SynthesizerOptions } from '../synthesizer';
import { makeTimeBase } from '../time-base';
import { applyFatigue, fireMotorUnits, type FiringContext } from './firing';
import {
  SEGMENT_BUILDERS,
  constantEnvelope,
  customEnvelope,
  rampEnvelope,
  repetitiveEnvelope,
} from './patterns';

/** Slack for summed segment durations */
const DURATION_TOLERANCE = 1e-9;

type WithoutPattern<T> = Omit<T, 'patternType' | 'randomSeed'>;

export class EmgSynthesizer extends Synthesizer<EmgParams> {
  constructor(samplingRate: number, duration: number, options: SynthesizerOptions = {}) {
    super('emg', samplingRate, duration, options);
  }

  protected variantOf(params: EmgParams): string {
    return params.patternType ?? 'isometric';
  }

  protected synthesize(params: EmgParams): number[] {
    requireOneOf(params.patternType ?? 'isometric', 'patternType', EMG_PATTERN_TYPES);

    switch (params.patternType) {
      case undefined:
      case 'isometric':
        return this.simulateIsometricContraction(params);
      case 'dynamic':
        return this.simulateDynamicContraction(params);
      case 'repetitive':
        return this.simulateRepetitiveMovement(params);
      case 'complex':
        return this.simulateComplexPattern(params);
    }
  }

  /**
   * Constant-force contraction occupying the first `duration` seconds
   */
  simulateIsometricContraction(params: WithoutPattern<IsometricParams> = {}): number[] {
    const intensity = requireUnitInterval(
      params.intensity ?? params.activationLevel ?? EMG_DEFAULTS.intensity,
      'intensity'
    );
    const segmentDuration = params.duration ?? this.timeBase.duration;
    requirePositive(segmentDuration, 'duration');
    if (segmentDuration > this.timeBase.duration + DURATION_TOLERANCE) {
      throw new InvalidParameterError(
        `exceeds the signal duration (${this.timeBase.duration} s)`,
        'duration',
        segmentDuration
      );
    }

    const segment = makeTimeBase(this.timeBase.samplingRate, segmentDuration);
    const { context, finish } = this.firingPass('isometric', params.boundaryPolicy);
    const active = fireMotorUnits(segment, constantEnvelope(segment, intensity), context);

    const fatigueRate = this.fatigueRateOf(params);
    if (fatigueRate !== undefined) {
      applyFatigue(active, segment, fatigueRate);
    }

    const signal = new Array<number>(this.timeBase.nSamples).fill(0);
    placeKernel(signal, active, 0, { policy: 'clip' });
    finish();
    return signal;
  }

  /**
   * Variable-force contraction following a ramp, a raised sine or a custom envelope
   */
  simulateDynamicContraction(params: WithoutPattern<DynamicParams> = {}): number[] {
    const maxIntensity = requireUnitInterval(params.maxIntensity ?? EMG_DEFAULTS.dynamic.maxIntensity, 'maxIntensity');
    const frequency = requirePositive(params.frequency ?? EMG_DEFAULTS.dynamic.frequency, 'frequency');

    let envelope: number[];
    if (params.envelope !== undefined) {
      if (params.envelope.length === 0) {
        throw new InvalidParameterError('must contain at least one value', 'envelope', params.envelope);
      }
      params.envelope.forEach((value, i) => requireUnitInterval(value, `envelope[${i}]`));
      envelope = customEnvelope(this.timeBase, params.envelope);
    } else {
      const rampType = requireOneOf(params.rampType ?? 'ramp', 'rampType', EMG_RAMP_TYPES);
      envelope = rampEnvelope(this.timeBase, rampType, maxIntensity, frequency);
    }

    return this.fireFullLength('dynamic', envelope, params);
  }

  /**
   * Cyclic contractions with rest periods
   */
  simulateRepetitiveMovement(params: WithoutPattern<RepetitiveParams> = {}): number[] {
    const defaults = EMG_DEFAULTS.repetitive;
    const envelope = repetitiveEnvelope(this.timeBase, {
      frequency: requirePositive(params.frequency ?? defaults.frequency, 'frequency'),
      dutyCycle: requireUnitInterval(params.dutyCycle ?? defaults.dutyCycle, 'dutyCycle'),
      intensity: requireUnitInterval(params.intensity ?? defaults.intensity, 'intensity'),
      restIntensity: requireUnitInterval(params.restIntensity ?? defaults.restIntensity, 'restIntensity'),
    });

    return this.fireFullLength('repetitive', envelope, params);
  }

  /**
   * Chain (or superpose, with `overlap`) movement segments
   */
  simulateComplexPattern(params: WithoutPattern<ComplexParams>): number[] {
    const { movements, overlap = false } = params;
    const segments = movements.map((movement, i) => ({
      type: requireOneOf(movement.type, `movements[${i}].type`, EMG_MOVEMENT_TYPES),
      duration: requirePositive(movement.duration, `movements[${i}].duration`),
      intensity: requireUnitInterval(movement.intensity, `movements[${i}].intensity`),
    }));

    const total = overlap
      ? Math.max(0, ...segments.map(s => s.duration))
      : segments.reduce((sum, s) => sum + s.duration, 0);
    if (total > this.timeBase.duration + DURATION_TOLERANCE) {
      throw new InvalidParameterError(
        `movements span ${total} s but the signal lasts ${this.timeBase.duration} s`,
        'movements',
        total
      );
    }

    const { context, finish } = this.firingPass('complex', params.boundaryPolicy);
    const signal = new Array<number>(this.timeBase.nSamples).fill(0);
    let cursor = 0;
    for (const segment of segments) {
      const segmentBase = makeTimeBase(this.timeBase.samplingRate, segment.duration);
      const rendered = SEGMENT_BUILDERS[segment.type](segmentBase, segment.intensity, context);
      placeKernel(signal, rendered, Math.round(cursor * this.timeBase.samplingRate), { policy: 'clip' });
      if (!overlap) cursor += segment.duration;
    }

    const fatigueRate = this.fatigueRateOf(params);
    if (fatigueRate !== undefined) {
      applyFatigue(signal, this.timeBase, fatigueRate);
    }
    finish();
    return signal;
  }

  private fireFullLength(
    variant: string,
    envelope: readonly number[],
    params: { fatigueRate?: number; fatigue?: boolean; boundaryPolicy?: BoundaryPolicy }
  ): number[] {
    const { context, finish } = this.firingPass(variant, params.boundaryPolicy);
    const signal = fireMotorUnits(this.timeBase, envelope, context);
    const fatigueRate = this.fatigueRateOf(params);
    if (fatigueRate !== undefined) {
      applyFatigue(signal, this.timeBase, fatigueRate);
    }
    finish();
    return signal;
  }

  private firingPass(variant: string, policy?: BoundaryPolicy): { context: FiringContext; finish: () => void } {
    const tally = this.createTally(this.resolvePolicy(policy));
    return {
      context: { random: this.random, tally },
      finish: () => this.reportDropped(tally, variant),
    };
  }

  private fatigueRateOf(params: { fatigueRate?: number; fatigue?: boolean }): number | undefined {
    if (params.fatigueRate !== undefined) {
      return requireNonNegative(params.fatigueRate, 'fatigueRate');
    }
    return params.fatigue ? EMG_DEFAULTS.fatigueRate : undefined;
  }
}
