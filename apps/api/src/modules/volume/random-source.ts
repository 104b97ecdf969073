export type RandomSource = {
  /** Uniform draw in [0, 1). */
  next: () => number;
};

export const mathRandomSource: RandomSource = {
  next: () => Math.random()
};

export function uniform(random: RandomSource, low: number, high: number): number {
  return low + (high - low) * random.next();
}

/**
 * Replays `values` in order and wraps around. Lets a caller pin every draw of a
 * decision cycle to reproduce one exact path.
 */
export function sequenceRandomSource(values: readonly number[]): RandomSource {
  if (values.length === 0) {
    throw new Error("sequenceRandomSource needs at least one value");
  }
  let index = 0;
  return {
    next: () => {
      const value = values[index % values.length];
      index += 1;
      return value;
    }
  };
}
