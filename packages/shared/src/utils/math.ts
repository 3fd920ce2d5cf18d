export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Running mean; a list of identical values yields that value exactly. */
export function mean(values: readonly number[]): number {
  let average = 0;
  for (let i = 0; i < values.length; i++) {
    average += (values[i] - average) / (i + 1);
  }
  return average;
}

/** Variance over the whole population (divides by n, not n - 1). */
export function populationVariance(values: readonly number[], center = mean(values)): number {
  if (values.length === 0) return 0;

  let squared = 0;
  for (const value of values) {
    squared += (value - center) * (value - center);
  }
  return squared / values.length;
}

export function longestCommonSubsequenceLength(a: readonly string[], b: readonly string[]): number {
  if (a.length === 0 || b.length === 0) return 0;

  let previous = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    const current = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j++) {
      current[j] =
        a[i - 1] === b[j - 1] ? previous[j - 1] + 1 : Math.max(previous[j], current[j - 1]);
    }
    previous = current;
  }
  return previous[b.length];
}
