import type { FitWindow, InstrumentConfig } from "../config";
import {
  PEAK_VALLEY_DISTANCE_FACTOR,
  PEAK_VALLEY_TRANSMITTANCE_FACTOR
} from "../model/zscanModel";
import type { NormalizedCurve } from "../normalization/normalizeChannels";
import { movingAverage } from "../normalization/medianFilter";

export type CurveSeries = {
  positions: number[];
  values: number[];
};

const SMOOTHING_HALF_WINDOW = 2;
/** Initial q0 is kept inside the model domain with some margin. */
export const MAX_INITIAL_Q0 = 0.9;

export const toSeries = (curve: NormalizedCurve, window: FitWindow | null): CurveSeries => {
  const points = window
    ? curve.points.filter(
        (point) => point.position >= window.startMm && point.position <= window.endMm
      )
    : curve.points;
  return {
    positions: points.map((point) => point.position),
    values: points.map((point) => point.transmittance)
  };
};

const argExtreme = (values: number[], better: (candidate: number, best: number) => boolean) => {
  let best = 0;
  for (let i = 1; i < values.length; i += 1) {
    if (better(values[i], values[best])) best = i;
  }
  return best;
};

/** Largest deviation of the smoothed curve from 1. */
export const openApertureSignal = (series: CurveSeries): number => {
  if (series.values.length === 0) {
    return 0;
  }
  const smoothed = movingAverage(series.values, SMOOTHING_HALF_WINDOW);
  return smoothed.reduce((peak, value) => Math.max(peak, Math.abs(value - 1)), 0);
};

/**
 * Point-to-point noise estimate, RMS of successive differences over √2. The
 * smooth Z-scan shape barely contributes at the usual step sizes.
 */
export const noiseLevel = (series: CurveSeries): number => {
  const { values } = series;
  if (values.length < 2) {
    return 0;
  }
  let sum = 0;
  for (let i = 1; i < values.length; i += 1) {
    sum += (values[i] - values[i - 1]) ** 2;
  }
  return Math.sqrt(sum / (2 * (values.length - 1)));
};

/** zR = πw0²/λ, in mm. */
export const rayleighRangeFromWaist = (beamWaistUm: number, wavelengthNm: number): number =>
  (Math.PI * (beamWaistUm * 1e-6) ** 2) / (wavelengthNm * 1e-9) * 1e3;

export const instrumentRayleighRange = (
  instrument: InstrumentConfig,
  wavelengthNm: number
): number | null => {
  if (instrument.rayleighRangeMm !== null) {
    return instrument.rayleighRangeMm;
  }
  if (instrument.beamWaistUm !== null) {
    return rayleighRangeFromWaist(instrument.beamWaistUm, wavelengthNm);
  }
  return null;
};

const scanSpan = (series: CurveSeries): number =>
  Math.abs(series.positions[series.positions.length - 1] - series.positions[0]);

/**
 * Half of the full width at half depth of the open-aperture dip (or peak).
 * For the 1/(1 + x²) shape of a weak absorber this is zR.
 */
const halfWidthAtHalfDepth = (
  positions: number[],
  deviations: number[],
  extremum: number
): number | null => {
  const half = Math.abs(deviations[extremum]) / 2;
  let left = extremum;
  while (left > 0 && Math.abs(deviations[left]) > half) left -= 1;
  let right = extremum;
  while (right < deviations.length - 1 && Math.abs(deviations[right]) > half) right += 1;
  if (Math.abs(deviations[left]) > half || Math.abs(deviations[right]) > half) {
    return null;
  }
  const width = Math.abs(positions[right] - positions[left]) / 2;
  return width > 0 ? width : null;
};

export type OpenApertureGuess = {
  q0: number;
  z0: number;
  zR: number;
  /** Set when the data-derived q0 had to be pulled back inside ±MAX_INITIAL_Q0. */
  limitedQ0: number | null;
};

export const guessOpenAperture = (
  series: CurveSeries,
  instrument: InstrumentConfig,
  wavelengthNm: number
): OpenApertureGuess => {
  const smoothed = movingAverage(series.values, SMOOTHING_HALF_WINDOW);
  const deviations = smoothed.map((value) => value - 1);
  const extremum = argExtreme(deviations, (candidate, best) => Math.abs(candidate) > Math.abs(best));

  // T(0) ≈ 1 − q0 / 2^{3/2} to first order in q0.
  const rawQ0 = 2 * Math.SQRT2 * (1 - smoothed[extremum]);
  const q0 = Math.max(-MAX_INITIAL_Q0, Math.min(MAX_INITIAL_Q0, rawQ0));

  const zR =
    instrumentRayleighRange(instrument, wavelengthNm) ??
    halfWidthAtHalfDepth(series.positions, deviations, extremum) ??
    scanSpan(series) / 10;

  return {
    q0,
    z0: series.positions[extremum],
    zR,
    limitedQ0: q0 === rawQ0 ? null : rawQ0
  };
};

export type ClosedApertureGuess = {
  deltaPhi0: number;
  z0: number;
  zR: number;
};

/**
 * Reads ΔΦ0 from the peak–valley difference of a purely refractive curve
 * (ΔTpv ≈ 0.406·|ΔΦ0|), positive when the valley lies before the peak.
 * z0 and zR come from the peak–valley midpoint and ΔZpv ≈ 1.7·zR.
 */
export const guessClosedAperture = (
  series: CurveSeries,
  instrument: InstrumentConfig,
  wavelengthNm: number
): ClosedApertureGuess => {
  const smoothed = movingAverage(series.values, SMOOTHING_HALF_WINDOW);
  const peak = argExtreme(smoothed, (candidate, best) => candidate > best);
  const valley = argExtreme(smoothed, (candidate, best) => candidate < best);
  const peakPosition = series.positions[peak];
  const valleyPosition = series.positions[valley];
  const sign = peakPosition > valleyPosition ? 1 : peakPosition < valleyPosition ? -1 : 0;
  const deltaTpv = smoothed[peak] - smoothed[valley];
  const peakValleyDistance = Math.abs(peakPosition - valleyPosition);

  return {
    deltaPhi0: (sign * deltaTpv) / PEAK_VALLEY_TRANSMITTANCE_FACTOR,
    z0: (peakPosition + valleyPosition) / 2,
    zR:
      instrumentRayleighRange(instrument, wavelengthNm) ??
      (peakValleyDistance > 0
        ? peakValleyDistance / PEAK_VALLEY_DISTANCE_FACTOR
        : scanSpan(series) / 10)
  };
};
