/**
 * Smooth pursuit trajectories
 *
 * @module signal/eog/pursuit
 */

import { EOG_DEFAULTS } from '../../config/defaults';
import type { GazeDirection, PursuitPattern } from '../../types';
import { InvalidParameterError } from '../../utils/validation';
import { resampleLinear } from '../../utils/math';
import { saccadePosition } from '../kernels';
import { mainSequenceVelocity, type EogContext } from './saccades';

export interface PursuitSettings {
  pattern: PursuitPattern;
  amplitude: number;
  frequency: number;
  direction: GazeDirection;
  customTrajectory?: readonly number[];
}

/**
 * Sawtooth sweep with a small corrective saccade ending at each period
 */
function linearPursuit(settings: PursuitSettings, context: EogContext): number[] {
  const { amplitude, frequency } = settings;
  const { samplingRate, nSamples } = context.timeBase;
  const signal = context.timeBase.time.map(t => {
    const phase = frequency * t - Math.floor(frequency * t);
    return amplitude * (2 * phase - 1);
  });

  const periodSamples = Math.round(samplingRate / frequency);
  if (periodSamples < 1) return signal;

  const catchUp = EOG_DEFAULTS.catchUpFraction * amplitude;
  const trace = saccadePosition(
    catchUp,
    EOG_DEFAULTS.catchUpDuration,
    mainSequenceVelocity(catchUp),
    samplingRate
  );
  for (let i = 0; i + periodSamples < nSamples; i += periodSamples) {
    context.tally.place(signal, trace, i + periodSamples - trace.length);
  }
  return signal;
}

export function renderPursuit(settings: PursuitSettings, context: EogContext): number[] {
  const { amplitude, frequency } = settings;
  const omega = 2 * Math.PI * frequency;

  switch (settings.pattern) {
    case 'linear':
      return linearPursuit(settings, context);
    case 'sinusoidal':
      return context.timeBase.time.map(t => amplitude * Math.sin(omega * t));
    case 'circular': {
      // One channel of the circle: x for horizontal, y for vertical
      const component = settings.direction === 'horizontal' ? Math.cos : Math.sin;
      return context.timeBase.time.map(t => amplitude * component(omega * t));
    }
    case 'custom': {
      const trajectory = settings.customTrajectory;
      if (trajectory === undefined || trajectory.length < 2) {
        throw new InvalidParameterError('needs at least 2 points for a custom pursuit', 'customTrajectory', trajectory);
      }
      trajectory.forEach((value, i) => {
        if (!Number.isFinite(value)) {
          throw new InvalidParameterError('must be finite', `customTrajectory[${i}]`, value);
        }
      });
      return resampleLinear(trajectory, context.timeBase.nSamples);
    }
  }
}
