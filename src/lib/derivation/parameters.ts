import type { PhysicalConstants } from "../config";
import { validatePhysicalConstants } from "../config";
import { InvalidConstantsError } from "../errors";
import type { ZScanParameters } from "../model/zscanModel";

export type DerivedParameters = {
  /** Nonlinear refractive index, m²/W. */
  n2: number;
  /** Two-photon absorption coefficient, m/W. */
  beta: number;
  n2StandardError: number;
  betaStandardError: number;
  effectiveLengthM: number;
  peakIrradiance: number;
  wavelengthNm: number;
};

export type DerivationConstants = PhysicalConstants & { wavelengthNm: number };

/**
 * Leff = (1 − e^{−αL})/α with α = −ln(T_lin)/L, which is (1 − T_lin)/α.
 * A transparent sample (T_lin = 1) has Leff = L.
 */
export const effectiveLength = (lengthM: number, linearTransmittance: number): number => {
  if (linearTransmittance >= 1) {
    return lengthM;
  }
  const alpha = -Math.log(linearTransmittance) / lengthM;
  return (1 - linearTransmittance) / alpha;
};

/**
 * Converts fitted ΔΦ0 and q0 into n2 and β. Standard errors propagate
 * linearly since both relations are proportional.
 */
export const derivePhysicalParameters = (
  parameters: Pick<ZScanParameters, "deltaPhi0" | "q0">,
  standardErrors: Pick<ZScanParameters, "deltaPhi0" | "q0">,
  constants: DerivationConstants
): DerivedParameters => {
  const checked = validatePhysicalConstants(constants);
  if (checked.wavelengthNm === undefined) {
    throw new InvalidConstantsError("Invalid physical constants: wavelengthNm is required.", [
      "wavelengthNm: Required"
    ]);
  }
  const wavelengthM = checked.wavelengthNm * 1e-9;
  const effectiveLengthM = effectiveLength(checked.sampleLengthMm * 1e-3, checked.linearTransmittance);
  const irradianceLength = effectiveLengthM * checked.peakIrradiance;
  const n2PerPhase = wavelengthM / (2 * Math.PI * irradianceLength);
  const betaPerQ0 = (2 * Math.SQRT2) / irradianceLength;

  return {
    n2: parameters.deltaPhi0 * n2PerPhase,
    beta: parameters.q0 * betaPerQ0,
    n2StandardError: Math.abs(n2PerPhase) * standardErrors.deltaPhi0,
    betaStandardError: Math.abs(betaPerQ0) * standardErrors.q0,
    effectiveLengthM,
    peakIrradiance: checked.peakIrradiance,
    wavelengthNm: checked.wavelengthNm
  };
};

/** Dispersion of fused silica n2 (m²/W); λ is converted to metres. */
export const silicaNonlinearIndex = (wavelengthNm: number): number => {
  const lambda = wavelengthNm * 1e-9;
  return 2.8203e-20 - 3e-27 / lambda + 2e-33 / (lambda * lambda);
};

/** I0 = ΔΦ0·λ / (2π·L·n2) for a reference of known n2 and length L. */
export const estimatePeakIrradiance = (input: {
  deltaPhi0: number;
  wavelengthNm: number;
  lengthMm: number;
  n2: number;
}): number =>
  (input.deltaPhi0 * input.wavelengthNm * 1e-9) / (2 * Math.PI * input.lengthMm * 1e-3 * input.n2);
