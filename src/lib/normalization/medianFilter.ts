/**
 * Running median with an odd window. The window shrinks at the edges instead
 * of padding, so the first and last points keep their own neighbourhood.
 */
export const medianFilter = (values: number[], size: number): number[] => {
  if (size <= 1 || values.length === 0) {
    return [...values];
  }
  const halfWin = Math.floor(size / 2);
  const n = values.length;
  const out = new Array<number>(n);
  for (let i = 0; i < n; i += 1) {
    const lo = Math.max(0, i - halfWin);
    const hi = Math.min(n - 1, i + halfWin);
    const window = values.slice(lo, hi + 1).sort((a, b) => a - b);
    const mid = Math.floor(window.length / 2);
    out[i] = window.length % 2 === 0 ? (window[mid - 1] + window[mid]) / 2 : window[mid];
  }
  return out;
};

/** Moving average over `2 * halfWin + 1` points, clamped at the edges. */
export const movingAverage = (values: number[], halfWin: number): number[] => {
  const n = values.length;
  const out = new Array<number>(n);
  for (let i = 0; i < n; i += 1) {
    const lo = Math.max(0, i - halfWin);
    const hi = Math.min(n - 1, i + halfWin);
    let sum = 0;
    for (let j = lo; j <= hi; j += 1) sum += values[j];
    out[i] = sum / (hi - lo + 1);
  }
  return out;
};
