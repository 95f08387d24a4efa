import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildDeepDipRecord, buildSyntheticRecord } from "../data/syntheticScan";
import { assessReliability } from "../lib/batch/reliability";
import { runBatch } from "../lib/batch/runBatch";
import { InvalidConstantsError } from "../lib/errors";

const fixturePath = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
const readFixture = (name: string) => readFileSync(fixturePath(name), "utf8");

const constants = { sampleLengthMm: 1, linearTransmittance: 0.9, peakIrradiance: 1e13 };

const corrupt = (text: string) => text.replace(/\n50\s.*\n/, "\n50 0.1 0.2\n");

describe("batch orchestration", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reduces a concentration series and keeps going past a corrupted file", async () => {
    const result = await runBatch(
      [
        { id: "0.00", text: readFixture("rio3biff-p_0.00.txt") },
        { id: "0.50", text: corrupt(readFixture("rio3biff-p_0.50.txt")) },
        { id: "1.00", text: readFixture("rio3biff-p_1.00.txt") }
      ],
      constants
    );

    expect(result.entries.map((entry) => entry.id)).toEqual(["0.00", "1.00"]);
    expect(result.entries.map((entry) => entry.key)).toEqual([
      { code: "RIO3BiFF-P", concentration: 0, wavelengthNm: 475 },
      { code: "RIO3BiFF-P", concentration: 1, wavelengthNm: 475 }
    ]);
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0].id).toBe("0.50");
    expect(result.failures[0].code).toBe("PARSE_ERROR");
    expect(result.failures[0].key).toBeNull();
    expect(result.summary).toEqual({
      succeeded: ["0.00", "1.00"],
      unreliable: [],
      failed: ["0.50"],
      skipped: []
    });
    expect(result.cancelled).toBe(false);
    expect(result.warnings).toEqual([]);
    expect(console.info).toHaveBeenCalledWith("[zscan-batch] start", { inputs: 3, concurrency: 4 });
  });

  it("recovers a self-defocusing phase shift that grows with concentration", async () => {
    const result = await runBatch(
      [
        { id: "0.00", text: readFixture("rio3biff-p_0.00.txt") },
        { id: "0.50", path: fixturePath("rio3biff-p_0.50.txt") },
        { id: "1.00", text: readFixture("rio3biff-p_1.00.txt") }
      ],
      constants,
      { batch: { concurrency: 2 } }
    );
    const phases = result.entries.map((entry) => entry.result?.parameters.deltaPhi0 ?? Number.NaN);
    const absorption = result.entries.map((entry) => entry.result?.parameters.q0 ?? Number.NaN);

    expect(result.entries.every((entry) => entry.status === "reliable")).toBe(true);
    expect(phases[0]).toBeGreaterThan(-0.7);
    expect(phases[0]).toBeLessThan(-0.55);
    expect(phases[1]).toBeLessThan(phases[0]);
    expect(phases[2]).toBeLessThan(phases[1]);
    expect(absorption[0]).toBeCloseTo(0.05, 2);
    expect(absorption[2]).toBeCloseTo(0.2, 1);
    result.entries.forEach((entry) => {
      expect(Math.abs((entry.result?.focus.z0 ?? 0) - 49.2)).toBeLessThan(0.1);
      expect(entry.result?.derived.n2).toBeLessThan(0);
      expect(entry.result?.derived.beta).toBeGreaterThan(0);
      expect(entry.validation.status).toBe("clean");
    });
  });

  it("rejects the whole batch for invalid constants", async () => {
    await expect(
      runBatch([{ id: "0.00", text: readFixture("rio3biff-p_0.00.txt") }], {
        ...constants,
        linearTransmittance: 1.5
      })
    ).rejects.toBeInstanceOf(InvalidConstantsError);
    expect(console.info).not.toHaveBeenCalled();
  });

  it("marks ill-conditioned fits unreliable with a partial estimate", async () => {
    const flat = buildSyntheticRecord({ parameters: { deltaPhi0: 0, q0: 0, z0: 49, zR: 3 } });
    const result = await runBatch([{ id: "flat", record: flat }], constants);

    expect(result.entries).toHaveLength(1);
    const [entry] = result.entries;
    expect(entry.status).toBe("unreliable");
    expect(entry.result).toBeNull();
    expect(entry.flags.map((flag) => flag.code)).toEqual(["ILL_CONDITIONED"]);
    expect(entry.partial?.stage).toBe("closed-aperture");
    expect(result.summary.unreliable).toEqual(["flat"]);
  });

  it("records normalization failures against the input", async () => {
    const record = buildSyntheticRecord({ parameters: { deltaPhi0: 0.4, q0: 0.1, z0: 49, zR: 3 } });
    const result = await runBatch(
      [{ id: "no-reference", record: { ...record, samples: record.samples.map((sample) => ({ ...sample, ch2: 0 })) } }],
      constants
    );

    expect(result.failures).toEqual([
      {
        id: "no-reference",
        key: { code: "SYNTH-1", concentration: 0, wavelengthNm: 532 },
        code: "REFERENCE_DROPOUT",
        message: "Reference channel CH2 is zero for 201 of 201 samples."
      }
    ]);
  });

  it("keeps reducing the other records when one carries an unusable wavelength", async () => {
    const good = buildSyntheticRecord({ parameters: { deltaPhi0: 0.4, q0: 0.1, z0: 49, zR: 3 } });
    const result = await runBatch(
      [
        { id: "good", record: good },
        { id: "bad", record: { ...good, wavelengthNm: 0 } }
      ],
      constants
    );

    expect(result.summary.succeeded).toEqual(["good"]);
    expect(result.entries.map((entry) => entry.id)).toEqual(["good"]);
    expect(result.failures).toEqual([
      {
        id: "bad",
        key: { code: "SYNTH-1", concentration: 0, wavelengthNm: 0 },
        code: "INVALID_WAVELENGTH",
        message: "Record wavelength 0 nm is not positive and no wavelength is configured."
      }
    ]);
  });

  it("uses the configured wavelength over a missing header value", async () => {
    const good = buildSyntheticRecord({ parameters: { deltaPhi0: 0.4, q0: 0.1, z0: 49, zR: 3 } });
    const result = await runBatch([{ id: "override", record: { ...good, wavelengthNm: 0 } }], {
      ...constants,
      wavelengthNm: 532
    });

    expect(result.failures).toEqual([]);
    expect(result.entries[0].result?.derived.wavelengthNm).toBe(532);
  });

  it("marks a fit pinned to the q0 boundary unreliable", async () => {
    const result = await runBatch([{ id: "deep", record: buildDeepDipRecord(0.45) }], constants);

    expect(result.entries).toHaveLength(1);
    const [entry] = result.entries;
    expect(entry.status).toBe("unreliable");
    expect(entry.flags.map((flag) => flag.code)).toContain("Q0_OUT_OF_DOMAIN");
    expect(entry.result?.q0DomainLimited).toBe(true);
    expect(result.summary.succeeded).toEqual([]);
    expect(result.summary.unreliable).toEqual(["deep"]);
  });

  it("warns when records carry different sample codes", async () => {
    const result = await runBatch(
      [
        { id: "fixture", text: readFixture("rio3biff-p_0.00.txt") },
        { id: "synthetic", record: buildSyntheticRecord({ parameters: { deltaPhi0: 0.4, q0: 0.1, z0: 49, zR: 3 } }) }
      ],
      constants
    );

    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0].code).toBe("MIXED_SAMPLE_CODES");
    expect(result.warnings[0].codes).toEqual(["RIO3BiFF-P", "SYNTH-1"]);
  });

  it("skips every record once the run is cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const result = await runBatch(
      [
        { id: "a", text: readFixture("rio3biff-p_0.00.txt") },
        { id: "b", text: readFixture("rio3biff-p_1.00.txt") }
      ],
      constants,
      {},
      { signal: controller.signal }
    );

    expect(result.cancelled).toBe(true);
    expect(result.entries).toEqual([]);
    expect(result.summary.skipped).toEqual(["a", "b"]);
  });

  it("returns an empty result for no inputs", async () => {
    const result = await runBatch([], constants);
    expect(result.entries).toEqual([]);
    expect(result.cancelled).toBe(false);
  });
});

describe("reliability flags", () => {
  const parameters = { deltaPhi0: 0.5, q0: 0.2, z0: 50, zR: 3 };

  it("accepts well-determined parameters", () => {
    const standardErrors = { deltaPhi0: 0.01, q0: 0.01, z0: 0.1, zR: 0.1 };
    expect(assessReliability({ parameters, standardErrors, q0DomainLimited: false }, 0.5)).toEqual([]);
  });

  it("flags a large relative standard error and skips parameters held at zero", () => {
    const flags = assessReliability(
      {
        parameters: { ...parameters, q0: 0 },
        standardErrors: { deltaPhi0: 0.01, q0: 0, z0: 0.1, zR: 0.1 },
        q0DomainLimited: false
      },
      0.5
    );
    expect(flags).toHaveLength(0);

    const noisy = assessReliability(
      {
        parameters,
        standardErrors: { deltaPhi0: 0.3, q0: 0.01, z0: 0.1, zR: 0.1 },
        q0DomainLimited: false
      },
      0.5
    );
    expect(noisy.map((flag) => [flag.code, flag.parameter])).toEqual([["HIGH_RELATIVE_ERROR", "deltaPhi0"]]);
  });

  it("flags q0 outside the model domain without clamping it", () => {
    const flags = assessReliability(
      {
        parameters: { ...parameters, q0: 1.2 },
        standardErrors: { deltaPhi0: 0.01, q0: 0.01, z0: 0.1, zR: 0.1 },
        q0DomainLimited: false
      },
      0.5
    );
    expect(flags.map((flag) => flag.code)).toEqual(["Q0_OUT_OF_DOMAIN"]);
    expect(flags[0].message).toBe("q0 = 1.2 lies outside (−1, 1).");
  });

  it("flags q0 held on the domain edge by the solver", () => {
    const flags = assessReliability(
      {
        parameters: { ...parameters, q0: 0.9999999 },
        standardErrors: { deltaPhi0: 0.01, q0: 0.01, z0: 0.1, zR: 0.1 },
        q0DomainLimited: true
      },
      0.5
    );
    expect(flags).toEqual([
      {
        code: "Q0_OUT_OF_DOMAIN",
        parameter: "q0",
        message: "q0 = 0.9999999 is pinned to the edge of (−1, 1); the data call for a value outside it."
      }
    ]);
  });
});
