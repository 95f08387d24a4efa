import type { AnalysisConfigInput } from "./config";
import { resolveAnalysisConfig, validatePhysicalConstants } from "./config";
import type { FitResult } from "./fitting/fitRecord";
import { fitRecord } from "./fitting/fitRecord";
import type { MeasurementRecord } from "./import/types";

/** Validates the inputs, then reduces one record. */
export const fit = (
  record: MeasurementRecord,
  constants: unknown,
  config: AnalysisConfigInput = {}
): FitResult =>
  fitRecord(record, validatePhysicalConstants(constants), resolveAnalysisConfig(config));

export type {
  AnalysisConfig,
  AnalysisConfigInput,
  FitWindow,
  PhysicalConstants
} from "./config";
export { analysisConfigSchema, resolveAnalysisConfig, validatePhysicalConstants } from "./config";
export type { FitStage, PartialFitEstimate } from "./errors";
export {
  FitDivergenceError,
  IllConditionedError,
  InvalidConstantsError,
  NormalizationError,
  ParseError,
  ZScanError
} from "./errors";
export type { FitResult } from "./fitting/fitRecord";
export { fitRecord } from "./fitting/fitRecord";
export type { ChannelRole, ChannelSlot, MeasurementRecord, RecordKey } from "./import/types";
export { formatRecordKey, recordKeyOf } from "./import/types";
export { parseMeasurementText } from "./import/parseMeasurement";
export { loadMeasurementFile } from "./import/loadMeasurementFile";
export type { RecordValidationReport, ValidationFinding } from "./import/validation";
export { generateRecordValidationReport } from "./import/validation";
export type { NormalizedCurve, NormalizedRecord } from "./normalization/normalizeChannels";
export { normalizeRecord } from "./normalization/normalizeChannels";
export type { ZScanParameters } from "./model/zscanModel";
export {
  closedApertureTransmittance,
  modelCurve,
  openApertureTransmittance
} from "./model/zscanModel";
export type { DerivedParameters } from "./derivation/parameters";
export {
  derivePhysicalParameters,
  effectiveLength,
  estimatePeakIrradiance,
  silicaNonlinearIndex
} from "./derivation/parameters";
export type { IrradianceCalibration } from "./derivation/calibration";
export { calibrateIrradiance } from "./derivation/calibration";
export type { RoundedMeasurement } from "./derivation/rounding";
export { roundToUncertainty } from "./derivation/rounding";
export type { ReliabilityFlag } from "./batch/reliability";
export type {
  BatchEntry,
  BatchFailure,
  BatchInput,
  BatchOptions,
  BatchResult
} from "./batch/runBatch";
export { runBatch } from "./batch/runBatch";
