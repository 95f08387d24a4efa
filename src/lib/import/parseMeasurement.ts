import { ParseError } from "../errors";
import type {
  ChannelAssignment,
  ChannelRole,
  ChannelSlot,
  MeasurementRecord,
  Sample
} from "./types";
import { CHANNEL_SLOTS } from "./types";

type HeaderField =
  | "code"
  | "silicaThickness"
  | "concentration"
  | "wavelength"
  | "startPos"
  | "endPos";

const headerPatterns: { field: HeaderField; label: string; pattern: RegExp }[] = [
  { field: "code", label: "Code", pattern: /^code\s*:(.*)$/i },
  { field: "silicaThickness", label: "Silica thickness", pattern: /^silica thickness\s*:(.*)$/i },
  { field: "concentration", label: "Concentration", pattern: /^concentration\s*:(.*)$/i },
  { field: "wavelength", label: "Wavelength", pattern: /^wavelength\s*:(.*)$/i },
  { field: "startPos", label: "Starting pos", pattern: /^starting pos(?:ition)?\s*:(.*)$/i },
  { field: "endPos", label: "Ending pos", pattern: /^ending pos(?:ition)?\s*:(.*)$/i }
];

const channelPattern = /^CH([1-4])\s*:(.*)$/i;
const titlePattern = /^z-?scan measurement$/i;
const separatorPattern = /^[-=_]{3,}$/;
const tableHeaderPattern = /^sno\.?(?:\s|$)/i;
const numericPattern = /^[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?$/;
const leadingNumberPattern = /[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?/;

const roleLabels: Record<string, ChannelRole> = {
  "closed aperture": "ClosedAperture",
  reference: "Reference",
  "open aperture": "OpenAperture",
  "empty channel": "Empty",
  empty: "Empty"
};

const sanitizeText = (text: string): string =>
  text.replace(/^\uFEFF/, "").replace(/\r\n/g, "\n").replace(/\r/g, "\n");

const extractNumber = (
  raw: string,
  label: string,
  line: number
): number => {
  const normalized = raw.replace(/(\d),(\d)/g, "$1.$2");
  const match = normalized.match(leadingNumberPattern);
  if (!match) {
    throw new ParseError(`${label} has no numeric value.`, { field: label, line });
  }
  const value = Number(match[0]);
  if (!Number.isFinite(value)) {
    throw new ParseError(`${label} is not a finite number.`, { field: label, line });
  }
  return value;
};

const parseRole = (raw: string, slot: ChannelSlot, line: number): ChannelRole => {
  const label = raw.trim().toLowerCase().replace(/\s+/g, " ");
  const role = roleLabels[label];
  if (!role) {
    throw new ParseError(`${slot} has an unknown channel role "${raw.trim()}".`, {
      field: slot,
      line
    });
  }
  return role;
};

const parseSampleRow = (trimmed: string, line: number): Sample => {
  const tokens = trimmed.split(/\s+/);
  if (tokens.length !== 5) {
    throw new ParseError(
      `Sample row has ${tokens.length} fields, expected 5 (index and four channels).`,
      { field: "samples", line }
    );
  }
  const values = tokens.map((token) => {
    if (!numericPattern.test(token)) {
      throw new ParseError(`Sample row contains a non-numeric value "${token}".`, {
        field: "samples",
        line
      });
    }
    return Number(token);
  });
  const [index, ch1, ch2, ch3, ch4] = values;
  if (!Number.isInteger(index)) {
    throw new ParseError(`Sample index "${tokens[0]}" is not an integer.`, {
      field: "samples",
      line
    });
  }
  return { index, ch1, ch2, ch3, ch4 };
};

/**
 * Parses one instrument scan file. The channel role table is read from the
 * header of every file; the table body is whitespace-delimited so column
 * width drift between instrument versions does not matter.
 */
export const parseMeasurementText = (text: string): MeasurementRecord => {
  const lines = sanitizeText(text).split("\n");

  const fields = new Map<HeaderField, { raw: string; line: number }>();
  const channels = new Map<ChannelSlot, ChannelAssignment>();
  const description: string[] = [];
  const samples: Sample[] = [];
  let tableHeaderLine: number | null = null;

  for (let lineIndex = 0; lineIndex < lines.length; lineIndex += 1) {
    const line = lineIndex + 1;
    const trimmed = lines[lineIndex].trim();
    if (!trimmed || separatorPattern.test(trimmed)) {
      continue;
    }

    if (tableHeaderLine !== null) {
      const sample = parseSampleRow(trimmed, line);
      const previous = samples[samples.length - 1];
      if (previous && sample.index <= previous.index) {
        throw new ParseError(
          `Sample index ${sample.index} does not increase after ${previous.index}.`,
          { field: "samples", line }
        );
      }
      samples.push(sample);
      continue;
    }

    if (tableHeaderPattern.test(trimmed)) {
      tableHeaderLine = line;
      continue;
    }

    if (titlePattern.test(trimmed)) {
      continue;
    }

    const channelMatch = trimmed.match(channelPattern);
    if (channelMatch) {
      const slot = CHANNEL_SLOTS[Number(channelMatch[1]) - 1];
      if (channels.has(slot)) {
        throw new ParseError(`${slot} is declared more than once.`, { field: slot, line });
      }
      channels.set(slot, { slot, role: parseRole(channelMatch[2], slot, line) });
      continue;
    }

    const header = headerPatterns.find(({ pattern }) => pattern.test(trimmed));
    if (header) {
      if (fields.has(header.field)) {
        throw new ParseError(`${header.label} appears more than once.`, {
          field: header.label,
          line
        });
      }
      const match = trimmed.match(header.pattern);
      fields.set(header.field, { raw: match?.[1]?.trim() ?? "", line });
      continue;
    }

    description.push(trimmed);
  }

  const requireField = (field: HeaderField): { raw: string; line: number } => {
    const entry = fields.get(field);
    const label = headerPatterns.find((pattern) => pattern.field === field)?.label ?? field;
    if (!entry || entry.raw === "") {
      throw new ParseError(`Header field "${label}" is missing.`, { field: label });
    }
    return entry;
  };

  const code = requireField("code").raw;
  const concentrationEntry = requireField("concentration");
  const concentration = extractNumber(concentrationEntry.raw, "Concentration", concentrationEntry.line);
  const wavelengthEntry = requireField("wavelength");
  const wavelengthNm = extractNumber(wavelengthEntry.raw, "Wavelength", wavelengthEntry.line);
  if (wavelengthNm <= 0) {
    throw new ParseError("Wavelength must be positive.", {
      field: "Wavelength",
      line: wavelengthEntry.line
    });
  }
  const startEntry = requireField("startPos");
  const startPos = extractNumber(startEntry.raw, "Starting pos", startEntry.line);
  const endEntry = requireField("endPos");
  const endPos = extractNumber(endEntry.raw, "Ending pos", endEntry.line);

  const thicknessEntry = fields.get("silicaThickness");
  const silicaThicknessMm =
    thicknessEntry && thicknessEntry.raw !== ""
      ? extractNumber(thicknessEntry.raw, "Silica thickness", thicknessEntry.line)
      : null;

  const channelRoles = CHANNEL_SLOTS.map((slot) => {
    const assignment = channels.get(slot);
    if (!assignment) {
      throw new ParseError(`Channel role for ${slot} is missing.`, { field: slot });
    }
    return assignment;
  });
  const seenRoles = new Set<ChannelRole>();
  channelRoles.forEach((assignment) => {
    if (seenRoles.has(assignment.role)) {
      throw new ParseError(`The ${assignment.role} role is assigned to more than one channel.`, {
        field: assignment.slot
      });
    }
    seenRoles.add(assignment.role);
  });

  if (tableHeaderLine === null) {
    throw new ParseError('Sample table header ("SNo.") is missing.', { field: "SNo." });
  }
  if (samples.length < 2) {
    throw new ParseError(`Sample table has ${samples.length} rows, at least 2 are required.`, {
      field: "samples",
      line: tableHeaderLine
    });
  }

  return Object.freeze({
    code,
    concentration,
    wavelengthNm,
    startPos,
    endPos,
    silicaThicknessMm,
    description: description.join("\n"),
    channelRoles: Object.freeze(channelRoles.map((assignment) => Object.freeze(assignment))),
    samples: Object.freeze(samples.map((sample) => Object.freeze(sample)))
  });
};
