import type { FitResult } from "../fitting/fitRecord";
import type { ParameterName } from "../model/zscanModel";
import { PARAMETER_NAMES } from "../model/zscanModel";

export type ReliabilityFlagCode =
  | "HIGH_RELATIVE_ERROR"
  | "Q0_OUT_OF_DOMAIN"
  | "FIT_DIVERGED"
  | "ILL_CONDITIONED";

export type ReliabilityFlag = {
  code: ReliabilityFlagCode;
  message: string;
  parameter?: ParameterName;
};

/**
 * Flags a converged fit whose parameters are poorly determined. Parameters at
 * exactly 0 (held, not fitted) are skipped. q0 is reported, never clamped; a
 * fit that stalled on the |q0| = 1 boundary counts as out of domain.
 */
export const assessReliability = (
  result: Pick<FitResult, "parameters" | "standardErrors" | "q0DomainLimited">,
  maxRelativeStandardError: number
): ReliabilityFlag[] => {
  const flags: ReliabilityFlag[] = [];
  PARAMETER_NAMES.forEach((parameter) => {
    const value = result.parameters[parameter];
    const error = result.standardErrors[parameter];
    if (value === 0) {
      return;
    }
    const relative = Math.abs(error / value);
    if (!(relative <= maxRelativeStandardError)) {
      flags.push({
        code: "HIGH_RELATIVE_ERROR",
        parameter,
        message: `${parameter} = ${value.toPrecision(4)} ± ${error.toPrecision(2)} exceeds the relative error limit of ${maxRelativeStandardError}.`
      });
    }
  });
  const { q0 } = result.parameters;
  if (!(Math.abs(q0) < 1)) {
    flags.push({
      code: "Q0_OUT_OF_DOMAIN",
      parameter: "q0",
      message: `q0 = ${q0} lies outside (−1, 1).`
    });
  } else if (result.q0DomainLimited) {
    flags.push({
      code: "Q0_OUT_OF_DOMAIN",
      parameter: "q0",
      message: `q0 = ${q0} is pinned to the edge of (−1, 1); the data call for a value outside it.`
    });
  }
  return flags;
};
