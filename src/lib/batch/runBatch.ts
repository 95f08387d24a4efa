import type { AnalysisConfig, AnalysisConfigInput, PhysicalConstants } from "../config";
import { resolveAnalysisConfig, validatePhysicalConstants } from "../config";
import type { PartialFitEstimate } from "../errors";
import {
  InvalidConstantsError,
  NormalizationError,
  ParseError,
  ZScanError,
  isFitFailure
} from "../errors";
import type { FitResult } from "../fitting/fitRecord";
import { fitRecord } from "../fitting/fitRecord";
import { loadMeasurementFile } from "../import/loadMeasurementFile";
import { parseMeasurementText } from "../import/parseMeasurement";
import type { MeasurementRecord, RecordKey } from "../import/types";
import { recordKeyOf } from "../import/types";
import type { RecordValidationReport } from "../import/validation";
import { generateRecordValidationReport } from "../import/validation";
import type { ReliabilityFlag } from "./reliability";
import { assessReliability } from "./reliability";

export type BatchInput =
  | { id: string; text: string }
  | { id: string; path: string }
  | { id: string; record: MeasurementRecord };

export type BatchEntry = {
  id: string;
  key: RecordKey;
  status: "reliable" | "unreliable";
  flags: ReliabilityFlag[];
  result: FitResult | null;
  partial: PartialFitEstimate | null;
  validation: RecordValidationReport;
};

export type BatchFailure = {
  id: string;
  key: RecordKey | null;
  code: string;
  message: string;
};

export type BatchWarning = {
  code: "MIXED_SAMPLE_CODES";
  message: string;
  codes: string[];
};

export type BatchSummary = {
  succeeded: string[];
  unreliable: string[];
  failed: string[];
  skipped: string[];
};

export type BatchResult = {
  entries: BatchEntry[];
  failures: BatchFailure[];
  warnings: BatchWarning[];
  summary: BatchSummary;
  cancelled: boolean;
};

export type BatchOptions = {
  signal?: AbortSignal;
};

type RecordOutcome =
  | { kind: "entry"; entry: BatchEntry }
  | { kind: "failure"; failure: BatchFailure }
  | { kind: "skipped"; id: string };

const loadInput = async (input: BatchInput, config: AnalysisConfig): Promise<MeasurementRecord> => {
  if ("record" in input) {
    return input.record;
  }
  if ("text" in input) {
    return parseMeasurementText(input.text);
  }
  return loadMeasurementFile(input.path, { timeoutMs: config.batch.fileTimeoutMs });
};

const reduceInput = async (
  input: BatchInput,
  constants: PhysicalConstants,
  config: AnalysisConfig
): Promise<RecordOutcome> => {
  let record: MeasurementRecord | null = null;
  try {
    record = await loadInput(input, config);
    const validation = generateRecordValidationReport(record);
    const key = recordKeyOf(record);
    const wavelengthNm = constants.wavelengthNm ?? record.wavelengthNm;
    if (!(Number.isFinite(wavelengthNm) && wavelengthNm > 0)) {
      return {
        kind: "failure",
        failure: {
          id: input.id,
          key,
          code: "INVALID_WAVELENGTH",
          message: `Record wavelength ${record.wavelengthNm} nm is not positive and no wavelength is configured.`
        }
      };
    }
    try {
      const result = fitRecord(record, constants, config);
      const flags = assessReliability(result, config.reliability.maxRelativeStandardError);
      return {
        kind: "entry",
        entry: {
          id: input.id,
          key,
          status: flags.length === 0 ? "reliable" : "unreliable",
          flags,
          result,
          partial: null,
          validation
        }
      };
    } catch (error) {
      if (!isFitFailure(error)) {
        throw error;
      }
      return {
        kind: "entry",
        entry: {
          id: input.id,
          key,
          status: "unreliable",
          flags: [
            {
              code: error.code === "FIT_DIVERGENCE" ? "FIT_DIVERGED" : "ILL_CONDITIONED",
              message: error.message
            }
          ],
          result: null,
          partial: error.partial,
          validation
        }
      };
    }
  } catch (error) {
    const key = record ? recordKeyOf(record) : null;
    // Batch constants are checked up front, so a constants error here comes from the record.
    if (
      error instanceof ParseError ||
      error instanceof NormalizationError ||
      error instanceof InvalidConstantsError
    ) {
      return {
        kind: "failure",
        failure: { id: input.id, key, code: error.code, message: error.message }
      };
    }
    console.error("[zscan-batch] record error", {
      id: input.id,
      message: error instanceof Error ? error.message : String(error)
    });
    return {
      kind: "failure",
      failure: {
        id: input.id,
        key,
        code: error instanceof ZScanError ? error.code : "UNEXPECTED",
        message: error instanceof Error ? error.message : String(error)
      }
    };
  }
};

/**
 * Runs `worker` over `items` with at most `concurrency` in flight. Each result
 * lands at its input position, so the order never depends on timing.
 */
const mapWithConcurrency = async <T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T) => Promise<R>
): Promise<R[]> => {
  const results = new Array<R>(items.length);
  let cursor = 0;
  const drain = async (): Promise<void> => {
    while (cursor < items.length) {
      const position = cursor;
      cursor += 1;
      results[position] = await worker(items[position]);
    }
  };
  const lanes = Array.from({ length: Math.min(concurrency, items.length) }, () => drain());
  await Promise.all(lanes);
  return results;
};

const mixedCodeWarnings = (entries: BatchEntry[]): BatchWarning[] => {
  const codes = [...new Set(entries.map((entry) => entry.key.code))];
  if (codes.length <= 1) {
    return [];
  }
  return [
    {
      code: "MIXED_SAMPLE_CODES",
      message: `The batch mixes ${codes.length} sample codes: ${codes.join(", ")}.`,
      codes
    }
  ];
};

/**
 * Reduces every input independently. Failures of one record never stop the
 * others; only invalid batch constants reject the whole run.
 */
export const runBatch = async (
  inputs: readonly BatchInput[],
  constants: unknown,
  configInput: AnalysisConfigInput = {},
  options: BatchOptions = {}
): Promise<BatchResult> => {
  const config = resolveAnalysisConfig(configInput);
  let checked: PhysicalConstants;
  try {
    checked = validatePhysicalConstants(constants);
  } catch (error) {
    console.error("[zscan-batch] fail", {
      inputs: inputs.length,
      message: error instanceof Error ? error.message : String(error)
    });
    throw error;
  }

  console.info("[zscan-batch] start", {
    inputs: inputs.length,
    concurrency: config.batch.concurrency
  });

  const outcomes = await mapWithConcurrency(
    inputs,
    config.batch.concurrency,
    async (input): Promise<RecordOutcome> => {
      if (options.signal?.aborted) {
        return { kind: "skipped", id: input.id };
      }
      return reduceInput(input, checked, config);
    }
  );

  const entries: BatchEntry[] = [];
  const failures: BatchFailure[] = [];
  const summary: BatchSummary = { succeeded: [], unreliable: [], failed: [], skipped: [] };
  outcomes.forEach((outcome) => {
    if (outcome.kind === "skipped") {
      summary.skipped.push(outcome.id);
      return;
    }
    if (outcome.kind === "failure") {
      failures.push(outcome.failure);
      summary.failed.push(outcome.failure.id);
      return;
    }
    entries.push(outcome.entry);
    if (outcome.entry.status === "reliable") {
      summary.succeeded.push(outcome.entry.id);
    } else {
      summary.unreliable.push(outcome.entry.id);
    }
  });

  const result: BatchResult = {
    entries,
    failures,
    warnings: mixedCodeWarnings(entries),
    summary,
    cancelled: summary.skipped.length > 0
  };

  console.info("[zscan-batch] success", {
    succeeded: summary.succeeded.length,
    unreliable: summary.unreliable.length,
    failed: summary.failed.length,
    skipped: summary.skipped.length,
    cancelled: result.cancelled
  });
  return result;
};
