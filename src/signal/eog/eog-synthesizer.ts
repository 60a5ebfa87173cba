/**
 * Single-channel EOG generator
 *
 * @example
 * ```typescript
 * const eog = new EogSynthesizer(250, 10);
 * const reading = eog.generate({ movementType: 'saccades', nSaccades: 8, addBlinks: true });
 * const tracking = eog.simulateSmoothPursuit({ pattern: 'sinusoidal', amplitude: 15, frequency: 0.3 });
 * ```
 *
 * @module signal/eog/eog-synthesizer
 */

import {
  BLINK_DEFAULTS,
  EOG_DEFAULTS,
  FIXATION_DEFAULTS,
} from '../../config/defaults';
import {
  EOG_MOVEMENT_TYPES,
  GAZE_DIRECTIONS,
  PURSUIT_PATTERNS,
} from '../../types';
import type {
  BlinkParams,
  BoundaryPolicy,
  EogMovementType,
  EogParams,
  FixationParams,
  PursuitParams,
  SaccadeParams,
  Signal,
} from '../../types';
import {
  InvalidParameterError,
  requireFinite,
  requireInteger,
  requireNonNegative,
  requireOneOf,
  requirePositive,
} from '../../utils/validation';
import { Synthesizer, type SynthesizerOptions } from '../synthesizer';
import { renderBlinks, type Blink, type BlinkSettings } from './blinks';
import { renderFixation, type FixationSettings } from './fixation';
import { renderPursuit, type PursuitSettings } from './pursuit';
import { renderSaccades, resolveSaccades, type EogContext } from './saccades';

export class EogSynthesizer extends Synthesizer<EogParams> {
  constructor(samplingRate: number, duration: number, options: SynthesizerOptions = {}) {
    super('eog', samplingRate, duration, options);
  }

  protected variantOf(params: EogParams): string {
    return params.movementType ?? 'saccades';
  }

  protected synthesize(params: EogParams): Signal {
    const movementType = requireOneOf(params.movementType ?? 'saccades', 'movementType', EOG_MOVEMENT_TYPES);
    const movement = this.movement(movementType, params);
    if (!params.addBlinks) return movement;

    const blinks = this.simulateBlinks(params);
    return movement.map((value, i) => value + blinks[i]);
  }

  private movement(movementType: EogMovementType, params: EogParams): Signal {
    switch (movementType) {
      case 'saccades':
        return this.simulateSaccades(this.saccadesFrom(params));
      case 'pursuit':
        return this.simulateSmoothPursuit({
          pattern: requireOneOf(params.pattern ?? 'linear', 'pattern', PURSUIT_PATTERNS),
          amplitude: params.amplitude,
          frequency: params.frequency,
          direction: params.direction,
          customTrajectory: params.customTrajectory,
          boundaryPolicy: params.boundaryPolicy,
        });
      case 'fixation':
        return this.simulateFixation(params);
    }
  }

  /**
   * Explicit amplitudes when given, otherwise nSaccades draws of U(-A, A)
   */
  private saccadesFrom(params: EogParams): SaccadeParams {
    const { amplitudes, durations, peakVelocities, boundaryPolicy } = params;
    if (amplitudes !== undefined) {
      return { amplitudes, directions: params.directions, durations, peakVelocities, boundaryPolicy };
    }

    const direction = requireOneOf(params.pattern ?? params.direction ?? 'horizontal', 'pattern', GAZE_DIRECTIONS);
    const range = requireNonNegative(params.amplitude ?? EOG_DEFAULTS.amplitude, 'amplitude');
    const count = requireInteger(params.nSaccades ?? EOG_DEFAULTS.nSaccades, 'nSaccades');
    return {
      amplitudes: Array.from({ length: count }, () => this.random.uniform(-range, range)),
      directions: direction,
      durations,
      peakVelocities,
      boundaryPolicy,
    };
  }

  /**
   * Step-and-hold gaze trace, one saccade after another from t = 0
   */
  simulateSaccades(params: SaccadeParams): Signal {
    const saccades = resolveSaccades(params);
    return this.pass('saccades', params.boundaryPolicy, context => renderSaccades(saccades, context));
  }

  simulateSmoothPursuit(params: PursuitParams = {}): Signal {
    const settings: PursuitSettings = {
      pattern: requireOneOf(params.pattern ?? 'linear', 'pattern', PURSUIT_PATTERNS),
      amplitude: requireFinite(params.amplitude ?? EOG_DEFAULTS.amplitude, 'amplitude'),
      frequency: requirePositive(params.frequency ?? EOG_DEFAULTS.frequency, 'frequency'),
      direction: requireOneOf(params.direction ?? 'horizontal', 'direction', GAZE_DIRECTIONS),
      customTrajectory: params.customTrajectory,
    };
    return this.pass('pursuit', params.boundaryPolicy, context => renderPursuit(settings, context));
  }

  simulateFixation(params: FixationParams = {}): Signal {
    const settings: FixationSettings = {
      microsaccadeRate: requireNonNegative(
        params.microsaccadeRate ?? FIXATION_DEFAULTS.microsaccadeRate,
        'microsaccadeRate'
      ),
      microsaccadeAmplitude: requireNonNegative(
        params.microsaccadeAmplitude ?? FIXATION_DEFAULTS.microsaccadeAmplitude,
        'microsaccadeAmplitude'
      ),
      driftAmplitude: requireNonNegative(params.driftAmplitude ?? FIXATION_DEFAULTS.driftAmplitude, 'driftAmplitude'),
      tremorAmplitude: requireNonNegative(
        params.tremorAmplitude ?? FIXATION_DEFAULTS.tremorAmplitude,
        'tremorAmplitude'
      ),
      tremorFrequency: requirePositive(params.tremorFrequency ?? FIXATION_DEFAULTS.tremorFrequency, 'tremorFrequency'),
    };
    return this.pass('fixation', params.boundaryPolicy, context => renderFixation(settings, context));
  }

  simulateBlinks(params: BlinkParams = {}): Signal {
    return this.blinkPass(params).signal;
  }

  /**
   * Blink trace plus the drawn start, duration and amplitude of each blink
   */
  simulateBlinkEvents(params: BlinkParams = {}): { signal: Signal; blinks: Blink[] } {
    return this.blinkPass(params);
  }

  private blinkPass(params: BlinkParams): { signal: Signal; blinks: Blink[] } {
    const [low, high] = params.amplitudeRange ?? BLINK_DEFAULTS.amplitudeRange;
    requireFinite(low, 'amplitudeRange[0]');
    requireFinite(high, 'amplitudeRange[1]');
    if (high < low) {
      throw new InvalidParameterError('must be ascending [min, max]', 'amplitudeRange', [low, high]);
    }

    const settings: BlinkSettings = {
      nBlinks: requireInteger(params.nBlinks ?? BLINK_DEFAULTS.nBlinks, 'nBlinks'),
      blinkDuration: requirePositive(params.blinkDuration ?? BLINK_DEFAULTS.blinkDuration, 'blinkDuration'),
      amplitudeRange: [low, high],
      minInterval: requireNonNegative(params.minInterval ?? BLINK_DEFAULTS.minInterval, 'minInterval'),
      naturalVariability: params.naturalVariability ?? BLINK_DEFAULTS.naturalVariability,
    };

    const tally = this.createTally(this.resolvePolicy(params.boundaryPolicy));
    const result = renderBlinks(settings, { timeBase: this.timeBase, random: this.random, tally });
    this.reportDropped(tally, 'blinks');
    return result;
  }

  private pass(
    variant: string,
    policy: BoundaryPolicy | undefined,
    work: (context: EogContext) => number[]
  ): number[] {
    const tally = this.createTally(this.resolvePolicy(policy));
    const signal = work({ timeBase: this.timeBase, random: this.random, tally });
    this.reportDropped(tally, variant);
    return signal;
  }
}
