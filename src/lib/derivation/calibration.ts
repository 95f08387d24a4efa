import type { AnalysisConfig } from "../config";
import { InvalidConstantsError } from "../errors";
import { fitCurves } from "../fitting/fitCurves";
import type { MeasurementRecord } from "../import/types";
import { normalizeRecord } from "../normalization/normalizeChannels";
import { estimatePeakIrradiance, silicaNonlinearIndex } from "./parameters";

export type IrradianceCalibration = {
  peakIrradiance: number;
  peakIrradianceStandardError: number;
  deltaPhi0: number;
  n2: number;
  lengthMm: number;
  wavelengthNm: number;
};

/**
 * Fits a scan of a reference of known n2 (fused silica by default) and turns
 * its phase shift into the peak irradiance at focus. The length falls back to
 * the record's `Silica thickness` header.
 */
export const calibrateIrradiance = (
  referenceRecord: MeasurementRecord,
  reference: { lengthMm?: number; n2?: number },
  config: AnalysisConfig
): IrradianceCalibration => {
  const lengthMm = reference.lengthMm ?? referenceRecord.silicaThicknessMm;
  if (lengthMm === null || !(lengthMm > 0)) {
    throw new InvalidConstantsError(
      "Invalid reference: a positive lengthMm is required when the record has no silica thickness.",
      ["lengthMm: Required"]
    );
  }
  const { wavelengthNm } = referenceRecord;
  const n2 = reference.n2 ?? silicaNonlinearIndex(wavelengthNm);
  if (!(n2 > 0)) {
    throw new InvalidConstantsError("Invalid reference: n2 must be positive.", ["n2: Must be positive"]);
  }

  const normalized = normalizeRecord(referenceRecord, config.normalization);
  const curves = fitCurves(normalized, {
    fit: config.fit,
    instrument: config.instrument,
    wavelengthNm
  });
  const { deltaPhi0 } = curves.parameters;
  const perPhase = estimatePeakIrradiance({ deltaPhi0: 1, wavelengthNm, lengthMm, n2 });

  return {
    peakIrradiance: deltaPhi0 * perPhase,
    peakIrradianceStandardError: Math.abs(perPhase) * curves.standardErrors.deltaPhi0,
    deltaPhi0,
    n2,
    lengthMm,
    wavelengthNm
  };
};
