import type { AnalysisConfig, PhysicalConstants } from "../config";
import type { DerivedParameters } from "../derivation/parameters";
import { derivePhysicalParameters } from "../derivation/parameters";
import type { MeasurementRecord, RecordKey } from "../import/types";
import { recordKeyOf } from "../import/types";
import type { ZScanParameters } from "../model/zscanModel";
import { normalizeRecord } from "../normalization/normalizeChannels";
import { deepFreeze } from "../util/deepFreeze";
import type { CurveFit } from "./fitCurves";
import { fitCurves } from "./fitCurves";

export type FitResult = {
  readonly key: RecordKey;
  readonly parameters: ZScanParameters;
  readonly standardErrors: ZScanParameters;
  readonly residualSumOfSquares: CurveFit["residualSumOfSquares"];
  readonly iterations: CurveFit["iterations"];
  readonly converged: boolean;
  readonly focus: CurveFit["focus"];
  readonly closedApertureFocusShift: CurveFit["closedApertureFocusShift"];
  /** q0 ended on the |q0| = 1 boundary instead of at a free minimum. */
  readonly q0DomainLimited: boolean;
  readonly derived: DerivedParameters;
  readonly droppedIndices: readonly number[];
  readonly warnings: readonly string[];
};

/**
 * Reduces one record: normalize, fit the focus and closed-aperture stages, then
 * derive n2 and β. The wavelength in `constants` overrides the record header.
 */
export const fitRecord = (
  record: MeasurementRecord,
  constants: PhysicalConstants,
  config: AnalysisConfig
): FitResult => {
  const wavelengthNm = constants.wavelengthNm ?? record.wavelengthNm;
  const normalized = normalizeRecord(record, config.normalization);
  const curves = fitCurves(normalized, {
    fit: config.fit,
    instrument: config.instrument,
    wavelengthNm
  });
  const derived = derivePhysicalParameters(curves.parameters, curves.standardErrors, {
    ...constants,
    wavelengthNm
  });

  const warnings = [...curves.warnings];
  if (normalized.droppedIndices.length > 0) {
    warnings.push(
      `${normalized.droppedIndices.length} sample(s) dropped where the reference reading was zero.`
    );
  }

  return deepFreeze({
    key: recordKeyOf(record),
    parameters: curves.parameters,
    standardErrors: curves.standardErrors,
    residualSumOfSquares: curves.residualSumOfSquares,
    iterations: curves.iterations,
    converged: true,
    focus: curves.focus,
    closedApertureFocusShift: curves.closedApertureFocusShift,
    q0DomainLimited: curves.q0DomainLimited,
    derived,
    droppedIndices: normalized.droppedIndices,
    warnings
  });
};
