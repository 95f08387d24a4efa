import type { ChannelRole, MeasurementRecord } from "./types";
import { buildRoleLookup, readSlot } from "./types";

export type ValidationSeverity = "info" | "warn" | "error";

export type ValidationStatus = "clean" | "needs-info" | "broken";

export type ValidationCode =
  | "ZERO_SCAN_RANGE"
  | "TOO_FEW_POINTS"
  | "INDEX_GAPS"
  | "REFERENCE_DROPOUTS"
  | "NEGATIVE_VOLTAGES"
  | "CONSTANT_CHANNEL";

export type ValidationFinding = {
  code: ValidationCode;
  severity: ValidationSeverity;
  title: string;
  description: string;
  hint?: string;
  details?: {
    pointCount?: number;
    gapCount?: number;
    dropoutCount?: number;
    negativeCount?: number;
    channel?: ChannelRole;
  };
};

export type RecordValidationReport = {
  status: ValidationStatus;
  sampleCount: number;
  findings: ValidationFinding[];
};

export const MIN_RECOMMENDED_POINTS = 20;

const REFERENCE_ZERO = 1e-9;

export const checkZeroScanRange = (record: MeasurementRecord): ValidationFinding | null => {
  if (record.startPos === record.endPos) {
    return {
      code: "ZERO_SCAN_RANGE",
      severity: "error",
      title: "Scan range is zero",
      description: `Starting and ending positions are both ${record.startPos} mm, so every sample sits at the same z.`,
      hint: "Check the Starting pos and Ending pos header lines."
    };
  }
  return null;
};

export const checkTooFewPoints = (record: MeasurementRecord): ValidationFinding | null => {
  const pointCount = record.samples.length;
  if (pointCount < MIN_RECOMMENDED_POINTS) {
    return {
      code: "TOO_FEW_POINTS",
      severity: "warn",
      title: "Too few samples",
      description: `Only ${pointCount} samples were recorded; fitted standard errors will be large.`,
      hint: `Scans with at least ${MIN_RECOMMENDED_POINTS} samples give stable fits.`,
      details: { pointCount }
    };
  }
  return null;
};

export const checkIndexGaps = (record: MeasurementRecord): ValidationFinding | null => {
  let gapCount = 0;
  for (let index = 1; index < record.samples.length; index += 1) {
    if (record.samples[index].index - record.samples[index - 1].index !== 1) {
      gapCount += 1;
    }
  }
  if (gapCount > 0) {
    return {
      code: "INDEX_GAPS",
      severity: "info",
      title: "Sample index has gaps",
      description: `${gapCount} step(s) in the sample index are larger than 1. Positions are interpolated from the index, so gaps are spaced accordingly.`,
      details: { gapCount }
    };
  }
  return null;
};

export const checkReferenceDropouts = (record: MeasurementRecord): ValidationFinding | null => {
  const roles = buildRoleLookup(record.channelRoles);
  const dropoutCount = record.samples.filter(
    (sample) => Math.abs(readSlot(sample, roles.Reference)) <= REFERENCE_ZERO
  ).length;
  if (dropoutCount > 0) {
    return {
      code: "REFERENCE_DROPOUTS",
      severity: "warn",
      title: "Reference detector dropouts",
      description: `${dropoutCount} reference reading(s) are zero; those samples cannot be normalized and are dropped.`,
      hint: "Check the reference detector and its cabling.",
      details: { dropoutCount, channel: "Reference" }
    };
  }
  return null;
};

export const checkNegativeVoltages = (record: MeasurementRecord): ValidationFinding | null => {
  const roles = buildRoleLookup(record.channelRoles);
  const signalRoles: ChannelRole[] = ["ClosedAperture", "Reference", "OpenAperture"];
  const negativeCount = record.samples.reduce(
    (count, sample) =>
      count + signalRoles.filter((role) => readSlot(sample, roles[role]) < 0).length,
    0
  );
  if (negativeCount > 0) {
    return {
      code: "NEGATIVE_VOLTAGES",
      severity: "info",
      title: "Negative detector voltages",
      description: `${negativeCount} detector reading(s) are negative, which usually points to an offset in the acquisition.`,
      details: { negativeCount }
    };
  }
  return null;
};

export const checkConstantChannels = (record: MeasurementRecord): ValidationFinding[] => {
  const roles = buildRoleLookup(record.channelRoles);
  const signalRoles: ChannelRole[] = ["ClosedAperture", "Reference", "OpenAperture"];
  return signalRoles.flatMap((role): ValidationFinding[] => {
    const values = record.samples.map((sample) => readSlot(sample, roles[role]));
    const first = values[0];
    if (values.length > 1 && values.every((value) => value === first)) {
      return [
        {
          code: "CONSTANT_CHANNEL",
          severity: "warn",
          title: `${role} channel is constant`,
          description: `Channel ${roles[role]} reads ${first} V for every sample.`,
          hint: "Check the detector is connected and the channel roles in the header.",
          details: { channel: role }
        }
      ];
    }
    return [];
  });
};

export const resolveStatus = (findings: ValidationFinding[]): ValidationStatus => {
  if (findings.some((finding) => finding.severity === "error")) {
    return "broken";
  }
  if (findings.length > 0) {
    return "needs-info";
  }
  return "clean";
};

export const generateRecordValidationReport = (
  record: MeasurementRecord
): RecordValidationReport => {
  const findings = [
    checkZeroScanRange(record),
    checkTooFewPoints(record),
    checkIndexGaps(record),
    checkReferenceDropouts(record),
    checkNegativeVoltages(record)
  ].filter((finding): finding is ValidationFinding => finding !== null);
  findings.push(...checkConstantChannels(record));

  return {
    status: resolveStatus(findings),
    sampleCount: record.samples.length,
    findings
  };
};
