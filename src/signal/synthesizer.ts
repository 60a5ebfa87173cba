/**
 * Synthesizer base class
 *
 * Owns the time base, the random stream, the logger and the boundary policy
 * shared by every family, and the two overlay operations (`addNoise`,
 * `addArtifact`) that work on any signal of matching length.
 *
 * @module signal/synthesizer
 */

import { BOUNDARY_POLICIES, OVERLAY_DEFAULTS } from '../config/defaults';
import { ARTIFACT_TYPES } from '../types';
import type {
  AnyNoiseType,
  ArtifactType,
  BoundaryPolicy,
  GenerationOptions,
  NoiseParams,
  Signal,
  SignalFamily,
  TimeBase,
} from '../types';
import { createLogger, type Logger } from '../utils/logger';
import { linspace } from '../utils/math';
import {
  InvalidParameterError,
  requireFinite,
  requireOneOf,
  requirePositive,
  requireSignalLength,
} from '../utils/validation';
import { exponentialDecay } from './kernels';
import { runNoiseStrategy } from './noise/strategies';
import { PlacementTally, placeKernel } from './placement';
import { sharedRandom, type Random } from './random';
import { makeTimeBase } from './time-base';

const BOUNDARY_POLICY_NAMES: readonly BoundaryPolicy[] = ['skip', 'clip'];

function artifactKernel(type: ArtifactType, amplitude: number, length: number, samplingRate: number): number[] {
  switch (type) {
    case 'spike':
      return [amplitude];
    case 'step':
      return new Array<number>(length).fill(amplitude);
    case 'ramp':
      return linspace(0, amplitude, length);
    case 'exponential_decay':
      return exponentialDecay(amplitude, length / samplingRate, samplingRate);
  }
}

/**
 * Per-instance options
 */
export interface SynthesizerOptions {
  /** Generator to draw from; defaults to the process-wide stream */
  random?: Random;
  logger?: Logger;
  /** Overrides the family default */
  boundaryPolicy?: BoundaryPolicy;
}

export abstract class Synthesizer<P extends GenerationOptions> {
  readonly timeBase: TimeBase;
  readonly family: SignalFamily;
  protected readonly random: Random;
  protected readonly logger: Logger;
  protected readonly boundaryPolicy: BoundaryPolicy;

  protected constructor(
    family: SignalFamily,
    samplingRate: number,
    duration: number,
    options: SynthesizerOptions = {}
  ) {
    this.family = family;
    this.timeBase = makeTimeBase(samplingRate, duration);
    this.random = options.random ?? sharedRandom;
    this.logger = options.logger ?? createLogger(family);
    this.boundaryPolicy = requireOneOf(
      options.boundaryPolicy ?? BOUNDARY_POLICIES[family],
      'boundaryPolicy',
      BOUNDARY_POLICY_NAMES
    );
  }

  /**
   * Generate a full-length signal
   *
   * A `randomSeed` reseeds this synthesizer's generator first; with the
   * shared default generator that restarts the process-wide stream.
   */
  generate(params: P): Signal {
    return this.seeded(params, () => this.synthesize(params));
  }

  /**
   * Apply `randomSeed`, then run `work` under a timed debug entry
   */
  protected seeded<T>(params: P, work: () => T): T {
    if (params.randomSeed !== undefined) {
      this.random.seed(params.randomSeed);
    }
    return this.logger.timed(
      'generated',
      { variant: this.variantOf(params), samples: this.timeBase.nSamples },
      work
    );
  }

  /**
   * Build the signal for already-seeded parameters
   */
  protected abstract synthesize(params: P): Signal;

  /**
   * Variant name used in log entries
   */
  protected abstract variantOf(params: P): string;

  /**
   * Per-call policy over the instance default
   */
  protected resolvePolicy(override?: BoundaryPolicy): BoundaryPolicy {
    return override === undefined
      ? this.boundaryPolicy
      : requireOneOf(override, 'boundaryPolicy', BOUNDARY_POLICY_NAMES);
  }

  protected createTally(policy: BoundaryPolicy = this.boundaryPolicy): PlacementTally {
    return new PlacementTally(policy);
  }

  /**
   * Log kernels dropped at the buffer edge
   */
  protected reportDropped(tally: PlacementTally, variant: string): void {
    if (tally.dropped > 0) {
      this.logger.debug('dropped kernels outside the buffer', {
        variant,
        dropped: tally.dropped,
        placed: tally.placed,
      });
    }
  }

  /**
   * Return `signal` plus one layer of noise
   *
   * Defaults differ from standalone noise generation: `std` and `amplitude`
   * are 0.1.
   */
  addNoise(signal: Signal, noiseType: AnyNoiseType = 'gaussian', noiseParams: NoiseParams = {}): Signal {
    requireSignalLength(signal, this.timeBase.nSamples);

    const tally = this.createTally('clip');
    const noise = runNoiseStrategy(
      noiseType,
      { timeBase: this.timeBase, random: this.random, tally },
      { ...OVERLAY_DEFAULTS, ...noiseParams }
    );
    this.reportDropped(tally, noiseType);
    return signal.map((value, i) => value + noise[i]);
  }

  /**
   * Return `signal` with one artifact added over [startTime, startTime + duration)
   *
   * The window is clipped at the end of the signal.
   */
  addArtifact(
    signal: Signal,
    artifactType: ArtifactType,
    startTime: number,
    duration: number,
    amplitude: number = 1
  ): Signal {
    requireSignalLength(signal, this.timeBase.nSamples);
    const type = requireOneOf(artifactType, 'artifactType', ARTIFACT_TYPES);
    requireFinite(startTime, 'startTime');
    if (startTime < 0 || startTime >= this.timeBase.duration) {
      throw new InvalidParameterError(
        `must lie in [0, ${this.timeBase.duration})`,
        'startTime',
        startTime
      );
    }
    requirePositive(duration, 'duration');
    requireFinite(amplitude, 'amplitude');

    const { samplingRate, nSamples } = this.timeBase;
    const start = Math.min(Math.round(startTime * samplingRate), nSamples - 1);
    const length = Math.max(Math.round(duration * samplingRate), 1);

    const kernel = artifactKernel(type, amplitude, length, samplingRate);
    const output = [...signal];
    placeKernel(output, kernel, start, { policy: 'clip' });
    return output;
  }
}
