export type RoundedMeasurement = {
  value: number;
  error: number;
  decimals: number;
  /** `value ± error` with both printed at the same decimal place. */
  text: string;
};

const roundHalfAwayFromZero = (value: number, decimals: number): number => {
  const factor = 10 ** decimals;
  const scaled = Math.abs(value) * factor;
  // Nudge against binary representation error (e.g. 1.2345 stored as 1.23449999…).
  const rounded = Math.floor(scaled + 0.5 + 1e-9) / factor;
  return Math.sign(value) * rounded;
};

/**
 * Rounds the error up to one significant digit, or two when rounding up to one
 * digit would inflate it by more than 10 %, and rounds the value to the same
 * decimal place.
 */
export const roundToUncertainty = (value: number, error: number): RoundedMeasurement => {
  if (!(error > 0) || !Number.isFinite(error)) {
    return { value, error, decimals: 0, text: `${value} ± ${error}` };
  }
  let exponent = Math.floor(Math.log10(error));
  let amplitude = error / 10 ** exponent;
  let rounded = Math.ceil(amplitude - 1e-9);
  if ((rounded - amplitude) / amplitude > 0.1) {
    exponent -= 1;
    amplitude = error / 10 ** exponent;
    rounded = Math.ceil(amplitude - 1e-9);
  }
  if (rounded >= 10 && rounded % 10 === 0) {
    rounded /= 10;
    exponent += 1;
  }

  const decimals = Math.max(0, -exponent);
  const roundedError = Number((rounded * 10 ** exponent).toFixed(decimals));
  const roundedValue = Number(roundHalfAwayFromZero(value, -exponent).toFixed(decimals));
  return {
    value: roundedValue,
    error: roundedError,
    decimals,
    text: `${roundedValue.toFixed(decimals)} ± ${roundedError.toFixed(decimals)}`
  };
};
