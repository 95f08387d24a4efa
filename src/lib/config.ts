import { z } from "zod";

import { InvalidConstantsError } from "./errors";

const normalizationSchema = z
  .object({
    baselineFraction: z.number().gt(0).max(0.5).default(0.1),
    maxZeroReferenceFraction: z.number().min(0).max(1).default(0.05),
    referenceEpsilon: z.number().min(0).default(1e-9),
    emptyChannelNoiseThreshold: z.number().min(0).default(1e-3),
    medianFilterSize: z
      .number()
      .int()
      .min(0)
      .refine((size) => size === 0 || size % 2 === 1, {
        message: "Median filter size must be 0 (off) or odd."
      })
      .default(0)
  })
  .strict();

const fitWindowSchema = z
  .object({
    startMm: z.number().finite(),
    endMm: z.number().finite()
  })
  .strict()
  .refine((window) => window.endMm > window.startMm, {
    message: "Fit window end must be greater than its start."
  });

const fitSchema = z
  .object({
    maxIterations: z.number().int().positive().default(200),
    tolerance: z.number().positive().default(1e-10),
    initialDamping: z.number().positive().default(1e-3),
    focusMode: z.enum(["fixed", "loose"]).default("fixed"),
    focusTolerance: z.number().positive().default(0.05),
    openApertureSignalThreshold: z.number().min(0).default(0.002),
    openApertureSignificance: z.number().min(0).default(3),
    nonlinearAbsorption: z.boolean().default(true),
    fitWindow: fitWindowSchema.nullable().default(null)
  })
  .strict();

const instrumentSchema = z
  .object({
    rayleighRangeMm: z.number().positive().nullable().default(null),
    beamWaistUm: z.number().positive().nullable().default(null)
  })
  .strict();

const reliabilitySchema = z
  .object({
    maxRelativeStandardError: z.number().positive().default(0.5)
  })
  .strict();

const batchSchema = z
  .object({
    concurrency: z.number().int().positive().default(4),
    fileTimeoutMs: z.number().int().positive().default(10_000)
  })
  .strict();

export const analysisConfigSchema = z
  .object({
    normalization: normalizationSchema.default({}),
    fit: fitSchema.default({}),
    instrument: instrumentSchema.default({}),
    reliability: reliabilitySchema.default({}),
    batch: batchSchema.default({})
  })
  .strict();

export type AnalysisConfig = z.infer<typeof analysisConfigSchema>;
export type AnalysisConfigInput = z.input<typeof analysisConfigSchema>;
export type NormalizationConfig = AnalysisConfig["normalization"];
export type FitConfig = AnalysisConfig["fit"];
export type InstrumentConfig = AnalysisConfig["instrument"];
export type FitWindow = NonNullable<FitConfig["fitWindow"]>;

/**
 * Fills every omitted setting with its default. Throws the zod error for
 * settings that are present but invalid.
 */
export const resolveAnalysisConfig = (input: AnalysisConfigInput = {}): AnalysisConfig =>
  analysisConfigSchema.parse(input);

export const physicalConstantsSchema = z
  .object({
    sampleLengthMm: z.number().finite().positive(),
    linearTransmittance: z.number().finite().positive().max(1),
    peakIrradiance: z.number().finite().positive(),
    wavelengthNm: z.number().finite().positive().optional()
  })
  .strict();

/** Peak irradiance is in W/m²; the wavelength falls back to the record header when omitted. */
export type PhysicalConstants = z.infer<typeof physicalConstantsSchema>;

export const validatePhysicalConstants = (input: unknown): PhysicalConstants => {
  const parsed = physicalConstantsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "constants"}: ${issue.message}`
    );
    throw new InvalidConstantsError(`Invalid physical constants: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
};
