import type { ZScanParameters } from "./model/zscanModel";

export type FitStage = "open-aperture" | "closed-aperture";

export type PartialFitEstimate = {
  stage: FitStage;
  parameters: Partial<ZScanParameters>;
  residualSumOfSquares: number;
  iterations: number;
};

export class ZScanError extends Error {
  code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = "ZScanError";
    this.code = code;
  }
}

export class ParseError extends ZScanError {
  field?: string;
  line?: number;

  constructor(message: string, details: { field?: string; line?: number } = {}) {
    super(message, "PARSE_ERROR");
    this.name = "ParseError";
    this.field = details.field;
    this.line = details.line;
  }
}

export type NormalizationErrorCode =
  | "REFERENCE_DROPOUT"
  | "EMPTY_CHANNEL_SIGNAL"
  | "BASELINE_UNDEFINED";

export class NormalizationError extends ZScanError {
  constructor(message: string, code: NormalizationErrorCode) {
    super(message, code);
    this.name = "NormalizationError";
  }
}

export class FitDivergenceError extends ZScanError {
  partial: PartialFitEstimate;

  constructor(message: string, partial: PartialFitEstimate) {
    super(message, "FIT_DIVERGENCE");
    this.name = "FitDivergenceError";
    this.partial = partial;
  }
}

export class IllConditionedError extends ZScanError {
  partial: PartialFitEstimate;

  constructor(message: string, partial: PartialFitEstimate) {
    super(message, "ILL_CONDITIONED");
    this.name = "IllConditionedError";
    this.partial = partial;
  }
}

export class InvalidConstantsError extends ZScanError {
  issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, "INVALID_CONSTANTS");
    this.name = "InvalidConstantsError";
    this.issues = issues;
  }
}

export const isFitFailure = (
  error: unknown
): error is FitDivergenceError | IllConditionedError =>
  error instanceof FitDivergenceError || error instanceof IllConditionedError;
