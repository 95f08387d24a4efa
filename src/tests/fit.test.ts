import { describe, expect, it } from "vitest";
import {
  buildDeepDipRecord,
  buildNormalizedRecord,
  buildSyntheticRecord,
  scanPositions
} from "../data/syntheticScan";
import type { AnalysisConfig } from "../lib/config";
import { resolveAnalysisConfig } from "../lib/config";
import { FitDivergenceError, IllConditionedError } from "../lib/errors";
import type { FitContext } from "../lib/fitting/fitCurves";
import { fitCurves, fitOpenAperture } from "../lib/fitting/fitCurves";
import { fitRecord } from "../lib/fitting/fitRecord";
import {
  guessClosedAperture,
  guessOpenAperture,
  rayleighRangeFromWaist
} from "../lib/fitting/initialGuess";
import type { MeasurementRecord } from "../lib/import/types";
import { modelCurve } from "../lib/model/zscanModel";

const truth = { deltaPhi0: 0.8, q0: 0.3, z0: 49.3, zR: 3.2 };
const positions = scanPositions(29, 69, 201);
const constants = { sampleLengthMm: 1, linearTransmittance: 1, peakIrradiance: 1e13 };

const contextFor = (config: AnalysisConfig): FitContext => ({
  fit: config.fit,
  instrument: config.instrument,
  wavelengthNm: 532
});

/** Park–Miller sequence scaled to uniform noise with the given RMS. */
const seededNoise = (seed: number, rms: number) => {
  let state = seed;
  return () => {
    state = (state * 48271) % 2147483647;
    return rms * Math.sqrt(3) * ((2 * state) / 2147483647 - 1);
  };
};

const withDetectorNoise = (record: MeasurementRecord, seed: number, rms: number): MeasurementRecord => {
  const next = seededNoise(seed, rms);
  return {
    ...record,
    samples: record.samples.map((sample) => {
      const ch1 = sample.ch1 * (1 + next());
      const ch3 = sample.ch3 * (1 + next());
      return { ...sample, ch1, ch3 };
    })
  };
};

const captureError = (run: () => unknown): unknown => {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error("Expected the fit to throw");
};

describe("fit engine", () => {
  it("recovers the parameters of a noise-free scan", () => {
    const fit = fitCurves(buildNormalizedRecord(truth, positions), contextFor(resolveAnalysisConfig()));

    expect(Math.abs(fit.parameters.deltaPhi0 - truth.deltaPhi0)).toBeLessThan(1e-3);
    expect(Math.abs(fit.parameters.q0 - truth.q0)).toBeLessThan(1e-4);
    expect(Math.abs(fit.parameters.z0 - truth.z0)).toBeLessThan(0.01 * truth.zR);
    expect(fit.parameters.zR).toBeCloseTo(truth.zR, 4);
    expect(fit.focus.source).toBe("open-aperture");
    expect(fit.q0DomainLimited).toBe(false);
    expect(fit.iterations.openAperture).toBeGreaterThan(0);
    expect(fit.iterations.closedAperture).toBeGreaterThan(0);
  });

  it("keeps the open-aperture focus in fixed mode", () => {
    const fit = fitCurves(buildNormalizedRecord(truth, positions), contextFor(resolveAnalysisConfig()));

    expect(fit.parameters.z0).toBe(fit.focus.z0);
    expect(fit.parameters.zR).toBe(fit.focus.zR);
    expect(fit.closedApertureFocusShift).toEqual({ z0: 0, zR: 0 });
  });

  it("lets the closed-aperture focus move within the penalty in loose mode", () => {
    const normalized = buildNormalizedRecord(truth, positions);
    const shiftedClosed = modelCurve("closed-aperture", positions, { ...truth, z0: 49.35 });
    const config = resolveAnalysisConfig({ fit: { focusMode: "loose" } });
    const fit = fitCurves(
      {
        ...normalized,
        closedAperture: {
          channel: "ClosedAperture",
          points: positions.map((position, index) => ({
            index,
            position,
            transmittance: shiftedClosed[index]
          }))
        }
      },
      contextFor(config)
    );

    expect(fit.focus.z0).toBeCloseTo(truth.z0, 6);
    expect(fit.closedApertureFocusShift.z0).toBeGreaterThan(0);
    expect(fit.closedApertureFocusShift.z0).toBeLessThan(0.05);
  });

  it("does not move the focus in loose mode when both curves agree", () => {
    const config = resolveAnalysisConfig({ fit: { focusMode: "loose" } });
    const fit = fitCurves(buildNormalizedRecord(truth, positions), contextFor(config));

    expect(Math.abs(fit.closedApertureFocusShift.z0)).toBeLessThan(1e-4);
    expect(Math.abs(fit.parameters.deltaPhi0 - truth.deltaPhi0)).toBeLessThan(1e-3);
  });

  it("fits only the points inside the fit window", () => {
    const config = resolveAnalysisConfig({ fit: { fitWindow: { startMm: 40, endMm: 60 } } });
    const fit = fitCurves(buildNormalizedRecord(truth, positions), contextFor(config));

    expect(fit.parameters.deltaPhi0).toBeCloseTo(truth.deltaPhi0, 3);
    expect(fit.parameters.q0).toBeCloseTo(truth.q0, 3);
  });

  it("resolves the focus from the closed-aperture curve when the open aperture is flat", () => {
    const record = buildSyntheticRecord({
      parameters: { deltaPhi0: 0.5, q0: 0, z0: 50, zR: 2.5 },
      startPos: 20,
      endPos: 80,
      count: 241
    });
    const result = fitRecord(record, constants, resolveAnalysisConfig());

    expect(result.focus.source).toBe("closed-aperture");
    expect(result.parameters.q0).toBe(0);
    expect(result.parameters.deltaPhi0).toBeCloseTo(0.5, 4);
    expect(result.focus.z0).toBeCloseTo(50, 3);
    expect(result.focus.zR).toBeCloseTo(2.5, 3);
    expect(result.iterations.openAperture).toBe(0);
    expect(result.warnings).toHaveLength(1);
  });

  it("fits a strong absorber inside the domain without flagging the boundary", () => {
    const strong = { ...truth, q0: 0.95 };
    const fit = fitCurves(buildNormalizedRecord(strong, positions), contextFor(resolveAnalysisConfig()));

    expect(fit.parameters.q0).toBeCloseTo(0.95, 4);
    expect(fit.q0DomainLimited).toBe(false);
    expect(fit.warnings).toEqual([]);
  });

  it("reports an open-aperture dip too deep for the model instead of clamping q0 silently", () => {
    const result = fitRecord(buildDeepDipRecord(0.45), constants, resolveAnalysisConfig());

    expect(result.focus.source).toBe("open-aperture");
    expect(result.parameters.q0).toBeGreaterThan(0.999);
    expect(result.parameters.q0).toBeLessThan(1);
    expect(result.q0DomainLimited).toBe(true);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]).toMatch(/^The open-aperture fit stalled at q0 = /);
  });

  it("takes the focus from the closed aperture when the open-aperture dip is only noise", () => {
    const record = withDetectorNoise(
      buildSyntheticRecord({ parameters: { deltaPhi0: 0.5, q0: 0, z0: 49, zR: 3 } }),
      7,
      0.003
    );
    const result = fitRecord(record, constants, resolveAnalysisConfig());

    expect(result.focus.source).toBe("closed-aperture");
    expect(result.parameters.q0).toBe(0);
    expect(Math.abs(result.parameters.deltaPhi0 - 0.5)).toBeLessThan(0.02);
    expect(Math.abs(result.focus.z0 - 49)).toBeLessThan(0.05);
    expect(Math.abs(result.focus.zR - 3)).toBeLessThan(0.1);
    expect(result.warnings[0]).toContain("does not stand out from noise");
  });

  it("skips the open-aperture fit when nonlinear absorption is switched off", () => {
    const record = buildSyntheticRecord({ parameters: { deltaPhi0: 0.4, q0: 0.1, z0: 49, zR: 3 } });
    const result = fitRecord(
      record,
      constants,
      resolveAnalysisConfig({ fit: { nonlinearAbsorption: false } })
    );

    expect(result.focus.source).toBe("closed-aperture");
    expect(result.parameters.q0).toBe(0);
    expect(result.standardErrors.q0).toBe(0);
    expect(result.iterations.openAperture).toBe(0);
    expect(result.warnings).toEqual([
      "Nonlinear absorption is switched off; q0 fixed at 0 and the focus taken from the closed-aperture curve."
    ]);
  });

  it("returns identical frozen results for identical input", () => {
    const record = buildSyntheticRecord({ parameters: truth });
    const config = resolveAnalysisConfig();
    const first = fitRecord(record, constants, config);
    const second = fitRecord(record, constants, config);

    expect(second).toStrictEqual(first);
    expect(first.converged).toBe(true);
    expect(first.key).toEqual({ code: "SYNTH-1", concentration: 0, wavelengthNm: 532 });
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first.parameters)).toBe(true);
    expect(Object.isFrozen(first.derived)).toBe(true);
  });

  it("throws IllConditionedError for a flat open-aperture curve", () => {
    const error = captureError(() =>
      fitOpenAperture(
        { positions, values: positions.map(() => 1) },
        contextFor(resolveAnalysisConfig())
      )
    );

    expect(error).toBeInstanceOf(IllConditionedError);
    if (error instanceof IllConditionedError) {
      expect(error.partial.stage).toBe("open-aperture");
      expect(error.partial.parameters.q0).toBe(0);
    }
  });

  it("throws IllConditionedError with a partial estimate for a flat record", () => {
    const record = buildSyntheticRecord({ parameters: { deltaPhi0: 0, q0: 0, z0: 49, zR: 3 } });
    const error = captureError(() => fitRecord(record, constants, resolveAnalysisConfig()));

    expect(error).toBeInstanceOf(IllConditionedError);
    if (error instanceof IllConditionedError) {
      expect(error.partial.stage).toBe("closed-aperture");
      expect(error.partial.parameters.deltaPhi0).toBe(0);
    }
  });

  it("throws FitDivergenceError when the iteration budget runs out", () => {
    const config = resolveAnalysisConfig({ fit: { maxIterations: 1 } });
    const error = captureError(() => fitCurves(buildNormalizedRecord(truth, positions), contextFor(config)));

    expect(error).toBeInstanceOf(FitDivergenceError);
    if (error instanceof FitDivergenceError) {
      expect(error.partial.stage).toBe("open-aperture");
      expect(error.partial.iterations).toBe(1);
      expect(error.partial.parameters.zR).toBeGreaterThan(0);
    }
  });
});

describe("initial guesses", () => {
  it("limits the initial q0 to the model domain", () => {
    const series = { positions, values: modelCurve("open-aperture", positions, { ...truth, q0: 0.95 }) };
    const deep = { positions, values: series.values.map((value) => 1 - 2 * (1 - value)) };
    const guess = guessOpenAperture(deep, resolveAnalysisConfig().instrument, 532);

    expect(guess.q0).toBe(0.9);
    expect(guess.limitedQ0).toBeGreaterThan(0.9);
  });

  it("prefers the instrument Rayleigh range", () => {
    const series = { positions, values: modelCurve("open-aperture", positions, truth) };
    const fromRange = guessOpenAperture(series, { rayleighRangeMm: 2, beamWaistUm: null }, 532);
    const fromWaist = guessOpenAperture(series, { rayleighRangeMm: null, beamWaistUm: 20 }, 532);

    expect(fromRange.zR).toBe(2);
    expect(fromWaist.zR).toBeCloseTo(rayleighRangeFromWaist(20, 532), 12);
    expect(rayleighRangeFromWaist(20, 532)).toBeCloseTo(2.362, 3);
  });

  it("reads the sign of the phase shift from the peak and valley order", () => {
    const instrument = resolveAnalysisConfig().instrument;
    const positive = modelCurve("closed-aperture", positions, { ...truth, q0: 0 });
    const negative = modelCurve("closed-aperture", positions, { ...truth, q0: 0, deltaPhi0: -0.8 });

    expect(guessClosedAperture({ positions, values: positive }, instrument, 532).deltaPhi0).toBeGreaterThan(0.7);
    expect(guessClosedAperture({ positions, values: negative }, instrument, 532).deltaPhi0).toBeLessThan(-0.7);
  });
});
