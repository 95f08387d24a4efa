import { readFile } from "node:fs/promises";

import { ParseError } from "../errors";
import { parseMeasurementText } from "./parseMeasurement";
import type { MeasurementRecord } from "./types";

const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Reads one scan file as UTF-8 and parses it. Read failures, including the
 * timeout, surface as ParseError so a batch records them against the file.
 */
export const loadMeasurementFile = async (
  path: string,
  options: { timeoutMs?: number; signal?: AbortSignal } = {}
): Promise<MeasurementRecord> => {
  const timeout = AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
  const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

  let text: string;
  try {
    text = await readFile(path, { encoding: "utf8", signal });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ParseError(`Unable to read ${path}: ${reason}`, { field: "file" });
  }
  return parseMeasurementText(text);
};
