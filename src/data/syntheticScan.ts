import type { ChannelAssignment, MeasurementRecord, Sample } from "../lib/import/types";
import type { ZScanParameters } from "../lib/model/zscanModel";
import {
  closedApertureTransmittance,
  openApertureTransmittance
} from "../lib/model/zscanModel";
import type { NormalizedRecord } from "../lib/normalization/normalizeChannels";

export type SyntheticScanOptions = {
  parameters: ZScanParameters;
  code?: string;
  concentration?: number;
  wavelengthNm?: number;
  startPos?: number;
  endPos?: number;
  count?: number;
  referenceVolts?: number;
  silicaThicknessMm?: number | null;
};

const defaultRoles: ChannelAssignment[] = [
  { slot: "CH1", role: "ClosedAperture" },
  { slot: "CH2", role: "Reference" },
  { slot: "CH3", role: "OpenAperture" },
  { slot: "CH4", role: "Empty" }
];

export const scanPositions = (startPos: number, endPos: number, count: number): number[] =>
  Array.from({ length: count }, (_, index) => startPos + ((endPos - startPos) * index) / (count - 1));

/** Noise-free record whose channel/reference ratios follow the forward model. */
export const buildSyntheticRecord = (options: SyntheticScanOptions): MeasurementRecord => {
  const startPos = options.startPos ?? 29;
  const endPos = options.endPos ?? 69;
  const count = options.count ?? 201;
  const reference = options.referenceVolts ?? 2;
  const samples: Sample[] = scanPositions(startPos, endPos, count).map((z, index) => {
    // Slow laser drift; it cancels in the channel/reference ratio.
    const ch2 = reference * (1 + 0.02 * Math.sin(index / 15));
    return {
      index,
      ch1: ch2 * closedApertureTransmittance(z, options.parameters),
      ch2,
      ch3: ch2 * openApertureTransmittance(z, options.parameters),
      ch4: 0
    };
  });

  return {
    code: options.code ?? "SYNTH-1",
    concentration: options.concentration ?? 0,
    wavelengthNm: options.wavelengthNm ?? 532,
    startPos,
    endPos,
    silicaThicknessMm: options.silicaThicknessMm ?? null,
    description: "",
    channelRoles: defaultRoles,
    samples
  };
};

/**
 * Refractive scan (ΔΦ0 0.5, focus 49 mm, zR 3 mm) whose open aperture dips as
 * 1 − depth/(1 + x²). Depths above about 0.235 need a q0 outside (−1, 1).
 */
export const buildDeepDipRecord = (depth: number): MeasurementRecord => {
  const z0 = 49;
  const zR = 3;
  const base = buildSyntheticRecord({ parameters: { deltaPhi0: 0.5, q0: 0, z0, zR } });
  const positions = scanPositions(base.startPos, base.endPos, base.samples.length);
  return {
    ...base,
    samples: base.samples.map((sample, index) => {
      const x = (positions[index] - z0) / zR;
      const dip = 1 - depth / (1 + x * x);
      return { ...sample, ch1: sample.ch1 * dip, ch3: sample.ch2 * dip };
    })
  };
};

/** Normalized curves taken straight from the model, bypassing the far-field baseline. */
export const buildNormalizedRecord = (
  parameters: ZScanParameters,
  positions: number[]
): NormalizedRecord => ({
  closedAperture: {
    channel: "ClosedAperture",
    points: positions.map((position, index) => ({
      index,
      position,
      transmittance: closedApertureTransmittance(position, parameters)
    }))
  },
  openAperture: {
    channel: "OpenAperture",
    points: positions.map((position, index) => ({
      index,
      position,
      transmittance: openApertureTransmittance(position, parameters)
    }))
  },
  droppedIndices: [],
  baselines: { ClosedAperture: 1, OpenAperture: 1 }
});

/** Renders a record in the instrument's text layout. */
export const renderMeasurementText = (record: MeasurementRecord): string => {
  const roleLabel: Record<ChannelAssignment["role"], string> = {
    ClosedAperture: "Closed aperture",
    Reference: "Reference",
    OpenAperture: "Open aperture",
    Empty: "Empty channel"
  };
  const header = [
    "Z-scan measurement",
    `Code: ${record.code}`,
    ...(record.silicaThicknessMm === null ? [] : [`Silica thickness: ${record.silicaThicknessMm} mm`]),
    `Concentration: ${record.concentration.toFixed(2)} %`,
    `Wavelength: ${record.wavelengthNm.toFixed(1)} nm`,
    ...(record.description ? record.description.split("\n") : []),
    "-".repeat(40),
    `Starting pos: ${record.startPos.toFixed(1)} mm`,
    `Ending pos: ${record.endPos.toFixed(1)} mm`,
    ...record.channelRoles.map((entry) => `${entry.slot}: ${roleLabel[entry.role]}`),
    "-".repeat(40),
    "SNo.    CH1        CH2        CH3        CH4",
    "-".repeat(40)
  ];
  const rows = record.samples.map((sample) =>
    [sample.index, sample.ch1, sample.ch2, sample.ch3, sample.ch4]
      .map((value) => String(value))
      .join("   ")
  );
  return `${[...header, ...rows].join("\n")}\n`;
};
