/**
 * Ambient types for fft.js (the package ships none)
 *
 * Complex arrays are interleaved: [re0, im0, re1, im1, ...].
 */
declare module 'fft.js' {
  export default class FFT {
    /** Size must be a power of two greater than 1 */
    constructor(size: number);

    createComplexArray(): number[];
    completeSpectrum(spectrum: number[]): void;
    realTransform(out: number[], data: ArrayLike<number>): void;
    /** Scales the result by 1 / size */
    inverseTransform(out: number[], data: ArrayLike<number>): void;
  }
}
