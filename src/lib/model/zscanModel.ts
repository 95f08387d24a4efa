/**
 * Thin-sample, third-order Z-scan forward model (Sheik-Bahae et al., 1990).
 *
 *   x      = (z − z0) / zR
 *   T_OA   = Σ_{m≥0} (−q)^m / (m + 1)^{3/2},   q = q0 / (1 + x²)
 *   T_CA   = T_OA · (1 + 4ΔΦ0·x / ((x² + 9)(x² + 1)))
 *
 * The open-aperture series is the two-photon absorption result for a
 * Gaussian temporal pulse. The closed-aperture curve uses the small-aperture
 * refractive term multiplied by the open-aperture transmittance, so it reduces
 * to the pure refractive curve when q0 = 0.
 *
 * The model is defined for |q0| < 1 and zR > 0 and returns NaN outside that
 * domain; the fit engine treats NaN as a constraint violation.
 */

export type ZScanParameters = {
  /** On-axis nonlinear phase shift at focus (rad). */
  deltaPhi0: number;
  /** Nonlinear absorption strength at focus, |q0| < 1. */
  q0: number;
  /** Focal position (mm). */
  z0: number;
  /** Rayleigh range (mm). */
  zR: number;
};

export type ParameterName = keyof ZScanParameters;

export const PARAMETER_NAMES: readonly ParameterName[] = ["deltaPhi0", "q0", "z0", "zR"];

/** ΔTpv ≈ 0.406·|ΔΦ0| for a small aperture. */
export const PEAK_VALLEY_TRANSMITTANCE_FACTOR = 0.406;
/** ΔZpv ≈ 1.7·zR. */
export const PEAK_VALLEY_DISTANCE_FACTOR = 1.7;

const MAX_SERIES_TERMS = 5000;

export const reducedPosition = (z: number, z0: number, zR: number): number => (z - z0) / zR;

export const isInModelDomain = (q0: number, zR: number): boolean =>
  Math.abs(q0) < 1 && zR > 0;

export const twoPhotonSeries = (q: number): number => {
  if (!(Math.abs(q) < 1)) {
    return Number.NaN;
  }
  let sum = 0;
  let power = 1;
  for (let m = 0; m < MAX_SERIES_TERMS; m += 1) {
    const term = power / (m + 1) ** 1.5;
    sum += term;
    if (Math.abs(term) <= 1e-16 * Math.abs(sum)) {
      break;
    }
    power *= -q;
  }
  return sum;
};

export const refractiveTransmittance = (x: number, deltaPhi0: number): number =>
  1 + (4 * deltaPhi0 * x) / ((x * x + 9) * (x * x + 1));

export const openApertureTransmittance = (
  z: number,
  params: Pick<ZScanParameters, "q0" | "z0" | "zR">
): number => {
  if (!isInModelDomain(params.q0, params.zR)) {
    return Number.NaN;
  }
  const x = reducedPosition(z, params.z0, params.zR);
  return twoPhotonSeries(params.q0 / (1 + x * x));
};

export const closedApertureTransmittance = (z: number, params: ZScanParameters): number => {
  if (!isInModelDomain(params.q0, params.zR)) {
    return Number.NaN;
  }
  const x = reducedPosition(z, params.z0, params.zR);
  return twoPhotonSeries(params.q0 / (1 + x * x)) * refractiveTransmittance(x, params.deltaPhi0);
};

export const modelCurve = (
  kind: "open-aperture" | "closed-aperture",
  positions: readonly number[],
  params: ZScanParameters
): number[] =>
  positions.map((z) =>
    kind === "open-aperture"
      ? openApertureTransmittance(z, params)
      : closedApertureTransmittance(z, params)
  );
