/**
 * Kernel placement
 * @module signal/placement
 */

import type { BoundaryPolicy } from '../types';

export interface PlacementOptions {
  /** Gain applied to every kernel sample */
  scale?: number;
  policy: BoundaryPolicy;
}

/**
 * Add `samples * scale` into `buffer` starting at `startIndex`
 *
 * With `skip` the kernel is written only if it lies entirely inside the
 * buffer; with `clip` the overlapping part is written.
 *
 * @returns Number of samples written (0 when skipped)
 */
export function placeKernel(
  buffer: number[],
  samples: readonly number[],
  startIndex: number,
  options: PlacementOptions
): number {
  const scale = options.scale ?? 1;
  const end = startIndex + samples.length;

  if (samples.length === 0) return 0;

  if (options.policy === 'skip' && (startIndex < 0 || end > buffer.length)) {
    return 0;
  }

  const first = Math.max(startIndex, 0);
  const last = Math.min(end, buffer.length);
  for (let i = first; i < last; i++) {
    buffer[i] += scale * samples[i - startIndex];
  }
  return Math.max(last - first, 0);
}

/**
 * Add `value` to every sample in [startIndex, endIndex), clipped to the buffer
 */
export function addConstant(buffer: number[], value: number, startIndex: number, endIndex: number = buffer.length): void {
  const first = Math.max(startIndex, 0);
  const last = Math.min(endIndex, buffer.length);
  for (let i = first; i < last; i++) {
    buffer[i] += value;
  }
}

/**
 * Tracks how many kernels a synthesis pass placed and dropped
 */
export class PlacementTally {
  placed = 0;
  dropped = 0;

  constructor(private readonly policy: BoundaryPolicy) {}

  place(buffer: number[], samples: readonly number[], startIndex: number, scale: number = 1): number {
    const written = placeKernel(buffer, samples, startIndex, { scale, policy: this.policy });
    if (written === 0 && samples.length > 0) {
      this.dropped++;
    } else {
      this.placed++;
    }
    return written;
  }
}
