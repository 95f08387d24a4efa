import type { FitConfig, InstrumentConfig } from "../config";
import type { FitStage, PartialFitEstimate } from "../errors";
import { FitDivergenceError, IllConditionedError } from "../errors";
import type { ZScanParameters } from "../model/zscanModel";
import {
  closedApertureTransmittance,
  isInModelDomain,
  openApertureTransmittance
} from "../model/zscanModel";
import type { NormalizedRecord } from "../normalization/normalizeChannels";
import type { CurveSeries } from "./initialGuess";
import {
  guessClosedAperture,
  guessOpenAperture,
  noiseLevel,
  openApertureSignal,
  toSeries
} from "./initialGuess";
import type { SolverOutcome } from "./levenbergMarquardt";
import { levenbergMarquardt, standardErrorsFrom } from "./levenbergMarquardt";
import { sumOfSquares } from "./linearAlgebra";

export type FitContext = {
  fit: FitConfig;
  instrument: InstrumentConfig;
  wavelengthNm: number;
};

export type FocusSource = "open-aperture" | "closed-aperture";

export type OpenApertureStage = {
  source: "open-aperture";
  q0: number;
  z0: number;
  zR: number;
  standardErrors: { q0: number; z0: number; zR: number };
  residualSumOfSquares: number;
  iterations: number;
  /** The fit stalled on |q0| = 1; the data asks for a q0 the model cannot take. */
  domainLimited: boolean;
};

/**
 * No usable open-aperture focus; q0 is taken as 0. Either nonlinear absorption
 * is switched off, or the dip does not stand out from the noise.
 */
export type WeakOpenApertureStage = {
  source: "closed-aperture";
  q0: 0;
  reason: "absorption-disabled" | "weak-signal";
  signal: number;
  noise: number;
  residualSumOfSquares: number;
};

export type FocusStage = OpenApertureStage | WeakOpenApertureStage;

export type ClosedApertureStage = {
  deltaPhi0: number;
  z0: number;
  zR: number;
  standardErrors: { deltaPhi0: number; z0: number; zR: number };
  residualSumOfSquares: number;
  iterations: number;
};

export type CurveFit = {
  parameters: ZScanParameters;
  standardErrors: ZScanParameters;
  residualSumOfSquares: { openAperture: number; closedAperture: number };
  iterations: { openAperture: number; closedAperture: number };
  focus: { z0: number; zR: number; source: FocusSource };
  closedApertureFocusShift: { z0: number; zR: number };
  q0DomainLimited: boolean;
  warnings: string[];
};

const solverOptions = (fit: FitConfig) => ({
  maxIterations: fit.maxIterations,
  tolerance: fit.tolerance,
  initialDamping: fit.initialDamping
});

/** Throws the typed failure for an outcome that cannot be reported as a fit. */
const requireUsable = (
  stage: FitStage,
  outcome: SolverOutcome,
  parameters: Partial<ZScanParameters>
): number[] => {
  const partial: PartialFitEstimate = {
    stage,
    parameters,
    residualSumOfSquares: outcome.residualSumOfSquares,
    iterations: outcome.iterations
  };
  if (!outcome.converged) {
    throw new FitDivergenceError(
      outcome.iterations === 0
        ? `The ${stage} fit could not start: the initial guess lies outside the model domain.`
        : `The ${stage} fit did not converge within ${outcome.iterations} iterations.`,
      partial
    );
  }
  if (!outcome.covariance) {
    throw new IllConditionedError(
      `The ${stage} normal matrix is singular; parameters are not identifiable from this curve.`,
      partial
    );
  }
  return standardErrorsFrom(outcome.covariance);
};

const requirePoints = (stage: FitStage, series: CurveSeries, parameterCount: number) => {
  if (series.values.length <= parameterCount) {
    throw new IllConditionedError(
      `The ${stage} curve has ${series.values.length} points for ${parameterCount} parameters.`,
      { stage, parameters: {}, residualSumOfSquares: Number.NaN, iterations: 0 }
    );
  }
};

/** Fits q0, z0 and zR to the open-aperture curve. */
export const fitOpenAperture = (series: CurveSeries, context: FitContext): OpenApertureStage => {
  requirePoints("open-aperture", series, 3);
  const guess = guessOpenAperture(series, context.instrument, context.wavelengthNm);
  if (guess.limitedQ0 !== null) {
    console.warn("[zscan-fit] initial q0 limited", { raw: guess.limitedQ0, used: guess.q0 });
  }

  const outcome = levenbergMarquardt(
    {
      initial: [guess.q0, guess.z0, guess.zR],
      residuals: ([q0, z0, zR]) =>
        series.positions.map(
          (z, i) => series.values[i] - openApertureTransmittance(z, { q0, z0, zR })
        ),
      isFeasible: ([q0, , zR]) => isInModelDomain(q0, zR)
    },
    solverOptions(context.fit)
  );
  const [q0, z0, zR] = outcome.params;
  const errors = requireUsable("open-aperture", outcome, { q0, z0, zR });

  return {
    source: "open-aperture",
    q0,
    z0,
    zR,
    standardErrors: { q0: errors[0], z0: errors[1], zR: errors[2] },
    residualSumOfSquares: outcome.residualSumOfSquares,
    iterations: outcome.iterations,
    domainLimited: outcome.blockedByDomain
  };
};

/**
 * Fits the open-aperture focus when the dip is both above the absolute
 * threshold and `openApertureSignificance` times the curve's noise level.
 */
export const resolveFocus = (openSeries: CurveSeries, context: FitContext): FocusStage => {
  const signal = openApertureSignal(openSeries);
  const noise = noiseLevel(openSeries);
  const flat = (reason: WeakOpenApertureStage["reason"]): WeakOpenApertureStage => ({
    source: "closed-aperture",
    q0: 0,
    reason,
    signal,
    noise,
    residualSumOfSquares: sumOfSquares(openSeries.values.map((value) => value - 1))
  });

  if (!context.fit.nonlinearAbsorption) {
    return flat("absorption-disabled");
  }
  if (
    signal < context.fit.openApertureSignalThreshold ||
    signal < context.fit.openApertureSignificance * noise
  ) {
    return flat("weak-signal");
  }
  return fitOpenAperture(openSeries, context);
};

/**
 * Fits the closed-aperture curve with q0 held at the focus-stage value.
 * Which of ΔΦ0, z0 and zR are free depends on the focus source and mode.
 */
export const fitClosedAperture = (
  series: CurveSeries,
  focus: FocusStage,
  context: FitContext
): ClosedApertureStage => {
  const { q0 } = focus;
  const model = (z: number, deltaPhi0: number, z0: number, zR: number) =>
    closedApertureTransmittance(z, { deltaPhi0, q0, z0, zR });
  const dataResiduals = (deltaPhi0: number, z0: number, zR: number) =>
    series.positions.map((z, i) => series.values[i] - model(z, deltaPhi0, z0, zR));

  if (focus.source === "closed-aperture") {
    requirePoints("closed-aperture", series, 3);
    const guess = guessClosedAperture(series, context.instrument, context.wavelengthNm);
    const outcome = levenbergMarquardt(
      {
        initial: [guess.deltaPhi0, guess.z0, guess.zR],
        residuals: ([deltaPhi0, z0, zR]) => dataResiduals(deltaPhi0, z0, zR),
        isFeasible: ([, , zR]) => zR > 0
      },
      solverOptions(context.fit)
    );
    const [deltaPhi0, z0, zR] = outcome.params;
    const errors = requireUsable("closed-aperture", outcome, { deltaPhi0, q0, z0, zR });
    return {
      deltaPhi0,
      z0,
      zR,
      standardErrors: { deltaPhi0: errors[0], z0: errors[1], zR: errors[2] },
      residualSumOfSquares: outcome.residualSumOfSquares,
      iterations: outcome.iterations
    };
  }

  // Divide out the absorptive part so the peak–valley guess sees refraction only.
  const ratio: CurveSeries = {
    positions: series.positions,
    values: series.positions.map(
      (z, i) => series.values[i] / openApertureTransmittance(z, focus)
    )
  };
  const { deltaPhi0: initialPhase } = guessClosedAperture(
    ratio,
    context.instrument,
    context.wavelengthNm
  );

  if (context.fit.focusMode === "fixed") {
    requirePoints("closed-aperture", series, 1);
    const outcome = levenbergMarquardt(
      {
        initial: [initialPhase],
        residuals: ([deltaPhi0]) => dataResiduals(deltaPhi0, focus.z0, focus.zR)
      },
      solverOptions(context.fit)
    );
    const [deltaPhi0] = outcome.params;
    const errors = requireUsable("closed-aperture", outcome, {
      deltaPhi0,
      q0,
      z0: focus.z0,
      zR: focus.zR
    });
    return {
      deltaPhi0,
      z0: focus.z0,
      zR: focus.zR,
      standardErrors: { deltaPhi0: errors[0], z0: 0, zR: 0 },
      residualSumOfSquares: outcome.residualSumOfSquares,
      iterations: outcome.iterations
    };
  }

  requirePoints("closed-aperture", series, 3);
  const penaltyScale = context.fit.focusTolerance * focus.zR;
  const outcome = levenbergMarquardt(
    {
      initial: [initialPhase, focus.z0, focus.zR],
      residuals: ([deltaPhi0, z0, zR]) => [
        ...dataResiduals(deltaPhi0, z0, zR),
        (z0 - focus.z0) / penaltyScale,
        (zR - focus.zR) / penaltyScale
      ],
      isFeasible: ([, , zR]) => zR > 0
    },
    solverOptions(context.fit)
  );
  const [deltaPhi0, z0, zR] = outcome.params;
  const errors = requireUsable("closed-aperture", outcome, { deltaPhi0, q0, z0, zR });
  const penalty = ((z0 - focus.z0) / penaltyScale) ** 2 + ((zR - focus.zR) / penaltyScale) ** 2;
  return {
    deltaPhi0,
    z0,
    zR,
    standardErrors: { deltaPhi0: errors[0], z0: errors[1], zR: errors[2] },
    residualSumOfSquares: outcome.residualSumOfSquares - penalty,
    iterations: outcome.iterations
  };
};

/** Focus stage, then closed-aperture stage, on the normalized curves of one record. */
export const fitCurves = (normalized: NormalizedRecord, context: FitContext): CurveFit => {
  const window = context.fit.fitWindow;
  const openSeries = toSeries(normalized.openAperture, window);
  const closedSeries = toSeries(normalized.closedAperture, window);
  const warnings: string[] = [];

  const focus = resolveFocus(openSeries, context);
  const closed = fitClosedAperture(closedSeries, focus, context);

  if (focus.source === "closed-aperture") {
    warnings.push(
      focus.reason === "absorption-disabled"
        ? "Nonlinear absorption is switched off; q0 fixed at 0 and the focus taken from the closed-aperture curve."
        : `Open-aperture signal ${focus.signal.toExponential(2)} does not stand out from noise ${focus.noise.toExponential(2)}; q0 fixed at 0 and the focus taken from the closed-aperture curve.`
    );
    return {
      parameters: { deltaPhi0: closed.deltaPhi0, q0: 0, z0: closed.z0, zR: closed.zR },
      standardErrors: {
        deltaPhi0: closed.standardErrors.deltaPhi0,
        q0: 0,
        z0: closed.standardErrors.z0,
        zR: closed.standardErrors.zR
      },
      residualSumOfSquares: {
        openAperture: focus.residualSumOfSquares,
        closedAperture: closed.residualSumOfSquares
      },
      iterations: { openAperture: 0, closedAperture: closed.iterations },
      focus: { z0: closed.z0, zR: closed.zR, source: "closed-aperture" },
      closedApertureFocusShift: { z0: 0, zR: 0 },
      q0DomainLimited: false,
      warnings
    };
  }

  if (focus.domainLimited) {
    warnings.push(
      `The open-aperture fit stalled at q0 = ${focus.q0.toPrecision(6)} on the model domain boundary; the dip is deeper than |q0| < 1 allows.`
    );
  }

  return {
    parameters: { deltaPhi0: closed.deltaPhi0, q0: focus.q0, z0: focus.z0, zR: focus.zR },
    standardErrors: {
      deltaPhi0: closed.standardErrors.deltaPhi0,
      q0: focus.standardErrors.q0,
      z0: focus.standardErrors.z0,
      zR: focus.standardErrors.zR
    },
    residualSumOfSquares: {
      openAperture: focus.residualSumOfSquares,
      closedAperture: closed.residualSumOfSquares
    },
    iterations: { openAperture: focus.iterations, closedAperture: closed.iterations },
    focus: { z0: focus.z0, zR: focus.zR, source: "open-aperture" },
    closedApertureFocusShift: { z0: closed.z0 - focus.z0, zR: closed.zR - focus.zR },
    q0DomainLimited: focus.domainLimited,
    warnings
  };
};
