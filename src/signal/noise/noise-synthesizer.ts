/**
 * Noise and artifact generator
 *
 * @example
 * ```typescript
 * const noise = new NoiseSynthesizer(1000, 5);
 * const hum = noise.generate({ noiseType: 'powerline', frequency: 60, amplitude: 0.2 });
 * const pops = noise.simulateElectrodeArtifacts('electrode_pop', { nEvents: 4 });
 * ```
 *
 * @module signal/noise/noise-synthesizer
 */

import {
  ELECTRODE_ARTIFACT_TYPES,
  INTERFERENCE_TYPES,
  MOTION_ARTIFACT_TYPES,
  NOISE_TYPES,
} from '../../types';
import type {
  ElectrodeArtifactType,
  InterferenceType,
  MotionArtifactType,
  NoiseGenerateParams,
  NoiseParams,
  NoiseType,
  Signal,
} from '../../types';
import { requireOneOf } from '../../utils/validation';
import { Synthesizer, type SynthesizerOptions } from '../synthesizer';
import { ELECTRODE_STRATEGIES, MOTION_STRATEGIES } from './artifacts';
import type { NoiseContext, NoiseStrategy } from './bursts';
import { INTERFERENCE_STRATEGIES } from './interference';
import { NOISE_STRATEGIES } from './spectra';
import { runNoiseStrategy } from './strategies';

export class NoiseSynthesizer extends Synthesizer<NoiseGenerateParams> {
  constructor(samplingRate: number, duration: number, options: SynthesizerOptions = {}) {
    super('noise', samplingRate, duration, options);
  }

  protected variantOf(params: NoiseGenerateParams): string {
    return params.noiseType ?? 'gaussian';
  }

  protected synthesize(params: NoiseGenerateParams): number[] {
    const noiseType = params.noiseType ?? 'gaussian';
    return this.run(noiseType, context => runNoiseStrategy(noiseType, context, params));
  }

  simulateNoise(noiseType: NoiseType = 'gaussian', params: NoiseParams = {}): Signal {
    const type = requireOneOf(noiseType, 'noiseType', NOISE_TYPES);
    return this.runStrategy(type, NOISE_STRATEGIES[type], params);
  }

  simulateMotionArtifacts(artifactType: MotionArtifactType = 'electrode_movement', params: NoiseParams = {}): Signal {
    const type = requireOneOf(artifactType, 'artifactType', MOTION_ARTIFACT_TYPES);
    return this.runStrategy(type, MOTION_STRATEGIES[type], params);
  }

  simulateInterference(interferenceType: InterferenceType = 'emg', params: NoiseParams = {}): Signal {
    const type = requireOneOf(interferenceType, 'interferenceType', INTERFERENCE_TYPES);
    return this.runStrategy(type, INTERFERENCE_STRATEGIES[type], params);
  }

  simulateElectrodeArtifacts(artifactType: ElectrodeArtifactType = 'poor_contact', params: NoiseParams = {}): Signal {
    const type = requireOneOf(artifactType, 'artifactType', ELECTRODE_ARTIFACT_TYPES);
    return this.runStrategy(type, ELECTRODE_STRATEGIES[type], params);
  }

  private runStrategy(variant: string, strategy: NoiseStrategy, params: NoiseParams): number[] {
    return this.run(variant, context => strategy(context, params));
  }

  private run(variant: string, work: (context: NoiseContext) => number[]): number[] {
    const tally = this.createTally();
    const signal = work({ timeBase: this.timeBase, random: this.random, tally });
    this.reportDropped(tally, variant);
    return signal;
  }
}
