import type { Matrix } from "./linearAlgebra";
import { choleskySolve, invertNormalMatrix, normalEquations, sumOfSquares } from "./linearAlgebra";

export type LeastSquaresProblem = {
  initial: number[];
  /** Residuals (observed − model); non-finite entries reject the trial point. */
  residuals: (params: number[]) => number[];
  isFeasible?: (params: number[]) => boolean;
};

export type SolverOptions = {
  maxIterations: number;
  tolerance: number;
  initialDamping: number;
};

export type SolverOutcome = {
  converged: boolean;
  params: number[];
  residualSumOfSquares: number;
  iterations: number;
  /** s²(JᵀJ)⁻¹ at the solution; null when JᵀJ is singular or there are no spare degrees of freedom. */
  covariance: Matrix | null;
  /**
   * The undamped step from the final point would leave the feasible domain:
   * the solution sits on the domain boundary rather than at an interior minimum.
   */
  blockedByDomain: boolean;
};

const MAX_DAMPING = 1e12;
const MIN_DAMPING = 1e-12;
const NEGLIGIBLE_RSS = 1e-28;

const allFinite = (values: number[]): boolean => values.every((value) => Number.isFinite(value));

const jacobianAt = (
  problem: LeastSquaresProblem,
  params: number[],
  residuals: number[]
): Matrix => {
  const feasible = problem.isFeasible ?? (() => true);
  const evaluate = (candidate: number[]): number[] | null => {
    if (!feasible(candidate)) {
      return null;
    }
    const values = problem.residuals(candidate);
    return allFinite(values) ? values : null;
  };

  return params.map((value, j) => {
    const h = 1e-6 * (Math.abs(value) + 1e-3);
    const plus = [...params];
    plus[j] = value + h;
    const minus = [...params];
    minus[j] = value - h;
    const rPlus = evaluate(plus);
    const rMinus = evaluate(minus);
    if (rPlus && rMinus) {
      return rPlus.map((r, k) => (r - rMinus[k]) / (2 * h));
    }
    if (rPlus) {
      return rPlus.map((r, k) => (r - residuals[k]) / h);
    }
    if (rMinus) {
      return rMinus.map((r, k) => (residuals[k] - r) / h);
    }
    return residuals.map(() => 0);
  });
};

/**
 * Levenberg–Marquardt with Marquardt's diagonal scaling and a numerical
 * Jacobian. Purely deterministic: the same problem always takes the same path.
 *
 * Stops as converged when an accepted step lowers the RSS by at most
 * `tolerance` relative to the previous RSS, when the RSS is negligible, or when
 * no damping up to 1e12 finds a lower RSS. Otherwise it stops unconverged
 * after `maxIterations` Jacobian evaluations.
 */
export const levenbergMarquardt = (
  problem: LeastSquaresProblem,
  options: SolverOptions
): SolverOutcome => {
  const feasible = problem.isFeasible ?? (() => true);
  let params = [...problem.initial];
  let residuals = problem.residuals(params);
  if (!feasible(params) || !allFinite(residuals)) {
    return {
      converged: false,
      params,
      residualSumOfSquares: Number.NaN,
      iterations: 0,
      covariance: null,
      blockedByDomain: false
    };
  }
  let rss = sumOfSquares(residuals);
  let damping = options.initialDamping;
  let iterations = 0;
  let converged = rss <= NEGLIGIBLE_RSS;

  while (!converged && iterations < options.maxIterations) {
    iterations += 1;
    const jacobian = jacobianAt(problem, params, residuals);
    const { jtj, jtr } = normalEquations(jacobian, residuals);
    const diagonalFloor = 1e-30 * Math.max(1, ...jtj.map((row, i) => row[i]));

    let accepted: { params: number[]; residuals: number[]; rss: number } | null = null;
    while (damping <= MAX_DAMPING) {
      const damped = jtj.map((row, i) =>
        row.map((value, j) => (i === j ? value + damping * Math.max(value, diagonalFloor) : value))
      );
      const step = choleskySolve(
        damped,
        jtr.map((value) => -value)
      );
      if (!step) {
        damping *= 10;
        continue;
      }
      const candidate = params.map((value, j) => value + step[j]);
      if (!feasible(candidate)) {
        damping *= 10;
        continue;
      }
      const candidateResiduals = problem.residuals(candidate);
      if (!allFinite(candidateResiduals)) {
        damping *= 10;
        continue;
      }
      const candidateRss = sumOfSquares(candidateResiduals);
      if (candidateRss < rss) {
        accepted = { params: candidate, residuals: candidateResiduals, rss: candidateRss };
        break;
      }
      damping *= 10;
    }

    if (!accepted) {
      converged = true;
      break;
    }

    const improvement = rss - accepted.rss;
    const previousRss = rss;
    params = accepted.params;
    residuals = accepted.residuals;
    rss = accepted.rss;
    damping = Math.max(damping / 10, MIN_DAMPING);

    if (improvement <= options.tolerance * previousRss || rss <= NEGLIGIBLE_RSS) {
      converged = true;
    }
  }

  const { jtj, jtr } = normalEquations(jacobianAt(problem, params, residuals), residuals);

  const diagonalFloor = 1e-30 * Math.max(1, ...jtj.map((row, i) => row[i]));
  const undampedStep = choleskySolve(
    jtj.map((row, i) =>
      row.map((value, j) => (i === j ? value + MIN_DAMPING * Math.max(value, diagonalFloor) : value))
    ),
    jtr.map((value) => -value)
  );
  const blockedByDomain =
    undampedStep !== null && !feasible(params.map((value, j) => value + undampedStep[j]));

  const degreesOfFreedom = residuals.length - params.length;
  let covariance: Matrix | null = null;
  if (degreesOfFreedom > 0) {
    const inverse = invertNormalMatrix(jtj);
    if (inverse) {
      const variance = rss / degreesOfFreedom;
      covariance = inverse.map((row) => row.map((value) => value * variance));
    }
  }

  return { converged, params, residualSumOfSquares: rss, iterations, covariance, blockedByDomain };
};

export const standardErrorsFrom = (covariance: Matrix): number[] =>
  covariance.map((row, i) => Math.sqrt(Math.max(row[i], 0)));
