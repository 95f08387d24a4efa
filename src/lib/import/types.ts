export type ChannelSlot = "CH1" | "CH2" | "CH3" | "CH4";

export type ChannelRole = "ClosedAperture" | "Reference" | "OpenAperture" | "Empty";

export const CHANNEL_SLOTS: readonly ChannelSlot[] = ["CH1", "CH2", "CH3", "CH4"];

export type ChannelAssignment = {
  slot: ChannelSlot;
  role: ChannelRole;
};

export type Sample = {
  index: number;
  ch1: number;
  ch2: number;
  ch3: number;
  ch4: number;
};

export type MeasurementRecord = {
  readonly code: string;
  readonly concentration: number;
  readonly wavelengthNm: number;
  readonly startPos: number;
  readonly endPos: number;
  readonly silicaThicknessMm: number | null;
  readonly description: string;
  readonly channelRoles: readonly Readonly<ChannelAssignment>[];
  readonly samples: readonly Readonly<Sample>[];
};

export type RecordKey = {
  code: string;
  concentration: number;
  wavelengthNm: number;
};

export const recordKeyOf = (record: MeasurementRecord): RecordKey => ({
  code: record.code,
  concentration: record.concentration,
  wavelengthNm: record.wavelengthNm
});

export const formatRecordKey = (key: RecordKey): string =>
  `${key.code}|${key.concentration}|${key.wavelengthNm}`;

const slotField = (slot: ChannelSlot): "ch1" | "ch2" | "ch3" | "ch4" => {
  switch (slot) {
    case "CH1":
      return "ch1";
    case "CH2":
      return "ch2";
    case "CH3":
      return "ch3";
    case "CH4":
      return "ch4";
  }
};

export const readSlot = (sample: Readonly<Sample>, slot: ChannelSlot): number =>
  sample[slotField(slot)];

/**
 * Role lookup built from the record's own channel table. Throws when a role
 * is missing, which a parsed record never allows.
 */
export const buildRoleLookup = (
  channelRoles: readonly Readonly<ChannelAssignment>[]
): Record<ChannelRole, ChannelSlot> => {
  const find = (role: ChannelRole): ChannelSlot => {
    const assignment = channelRoles.find((entry) => entry.role === role);
    if (!assignment) {
      throw new Error(`No channel is assigned the ${role} role.`);
    }
    return assignment.slot;
  };
  return {
    ClosedAperture: find("ClosedAperture"),
    Reference: find("Reference"),
    OpenAperture: find("OpenAperture"),
    Empty: find("Empty")
  };
};

export const readRole = (
  record: MeasurementRecord,
  role: ChannelRole
): number[] => {
  const slot = buildRoleLookup(record.channelRoles)[role];
  return record.samples.map((sample) => readSlot(sample, slot));
};

export const samplePositions = (record: MeasurementRecord): number[] => {
  const { samples, startPos, endPos } = record;
  const first = samples[0].index;
  const last = samples[samples.length - 1].index;
  const span = last - first;
  return samples.map(
    (sample) => startPos + ((endPos - startPos) * (sample.index - first)) / span
  );
};
