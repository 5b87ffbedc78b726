/** One signal's estimate for a member on an axis. */
export interface SignalScore {
  /** In [-1, 1] */
  value: number;
  /** In [0, 1]; 0 means the signal has nothing to say about this member */
  confidence: number;
}

export const NO_SIGNAL: Readonly<SignalScore> = Object.freeze({ value: 0, confidence: 0 });
