import type { NormalizationConfig } from "../config";
import { NormalizationError } from "../errors";
import type { ChannelSlot, MeasurementRecord } from "../import/types";
import { buildRoleLookup, readSlot, samplePositions } from "../import/types";
import { medianFilter } from "./medianFilter";

export type CurveChannel = "ClosedAperture" | "OpenAperture";

export type CurvePoint = {
  index: number;
  position: number;
  transmittance: number;
};

export type NormalizedCurve = {
  readonly channel: CurveChannel;
  readonly points: readonly Readonly<CurvePoint>[];
};

export type NormalizedRecord = {
  closedAperture: NormalizedCurve;
  openAperture: NormalizedCurve;
  /** Sample indices left out of both curves because the reference was ≈ 0. */
  droppedIndices: number[];
  baselines: Record<CurveChannel, number>;
};

/** Number of samples at each end treated as far field. */
export const farFieldCount = (sampleCount: number, fraction: number): number =>
  Math.min(Math.floor(sampleCount / 2), Math.max(1, Math.floor(sampleCount * fraction)));

const buildCurve = (
  channel: CurveChannel,
  record: MeasurementRecord,
  positions: number[],
  ratios: (number | null)[],
  config: NormalizationConfig
): { curve: NormalizedCurve; baseline: number } => {
  const valid: number[] = [];
  ratios.forEach((ratio, sampleIndex) => {
    if (ratio !== null) {
      valid.push(sampleIndex);
    }
  });

  const filtered = medianFilter(
    valid.map((sampleIndex) => ratios[sampleIndex] ?? Number.NaN),
    config.medianFilterSize
  );

  const n = record.samples.length;
  const edge = farFieldCount(n, config.baselineFraction);
  let sum = 0;
  let count = 0;
  valid.forEach((sampleIndex, position) => {
    if (sampleIndex < edge || sampleIndex >= n - edge) {
      sum += filtered[position];
      count += 1;
    }
  });
  const baseline = count > 0 ? sum / count : Number.NaN;
  if (!Number.isFinite(baseline) || baseline <= 0) {
    throw new NormalizationError(
      `The ${channel} far-field baseline is ${count === 0 ? "empty" : baseline}; cannot normalize.`,
      "BASELINE_UNDEFINED"
    );
  }

  const points = valid.map((sampleIndex, position) =>
    Object.freeze({
      index: record.samples[sampleIndex].index,
      position: positions[sampleIndex],
      transmittance: filtered[position] / baseline
    })
  );

  return { curve: Object.freeze({ channel, points: Object.freeze(points) }), baseline };
};

/**
 * Turns raw voltages into closed- and open-aperture transmittance curves.
 * Each channel is divided by the reference and then by its own far-field
 * level, so the pooled far-field mean of each curve is 1.
 */
export const normalizeRecord = (
  record: MeasurementRecord,
  config: NormalizationConfig
): NormalizedRecord => {
  const roles = buildRoleLookup(record.channelRoles);
  const { samples } = record;

  const emptyPeak = samples.reduce(
    (peak, sample) => Math.max(peak, Math.abs(readSlot(sample, roles.Empty))),
    0
  );
  if (!(emptyPeak <= config.emptyChannelNoiseThreshold)) {
    throw new NormalizationError(
      `Channel ${roles.Empty} is declared empty but carries up to ${emptyPeak} V; channel roles are likely misconfigured.`,
      "EMPTY_CHANNEL_SIGNAL"
    );
  }

  const references = samples.map((sample) => readSlot(sample, roles.Reference));
  const zeroReferenceCount = references.filter(
    (value) => Math.abs(value) <= config.referenceEpsilon
  ).length;
  const zeroFraction = zeroReferenceCount / samples.length;
  if (zeroFraction > config.maxZeroReferenceFraction) {
    throw new NormalizationError(
      `Reference channel ${roles.Reference} is zero for ${zeroReferenceCount} of ${samples.length} samples.`,
      "REFERENCE_DROPOUT"
    );
  }

  const ratiosFor = (slot: ChannelSlot): (number | null)[] =>
    samples.map((sample, sampleIndex) => {
      const reference = references[sampleIndex];
      if (Math.abs(reference) <= config.referenceEpsilon) {
        return null;
      }
      const ratio = readSlot(sample, slot) / reference;
      return Number.isFinite(ratio) ? ratio : null;
    });

  const closedRatios = ratiosFor(roles.ClosedAperture);
  const openRatios = ratiosFor(roles.OpenAperture);
  const usable = closedRatios.map(
    (ratio, sampleIndex) => ratio !== null && openRatios[sampleIndex] !== null
  );
  const droppedIndices = samples
    .filter((_, sampleIndex) => !usable[sampleIndex])
    .map((sample) => sample.index);
  const keep = (ratios: (number | null)[]) =>
    ratios.map((ratio, sampleIndex) => (usable[sampleIndex] ? ratio : null));

  const positions = samplePositions(record);
  const closed = buildCurve("ClosedAperture", record, positions, keep(closedRatios), config);
  const open = buildCurve("OpenAperture", record, positions, keep(openRatios), config);

  return {
    closedAperture: closed.curve,
    openAperture: open.curve,
    droppedIndices,
    baselines: {
      ClosedAperture: closed.baseline,
      OpenAperture: open.baseline
    }
  };
};
