import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import handler from "../../api/fit-batch";

const fixtureText = readFileSync(
  fileURLToPath(new URL("./fixtures/rio3biff-p_0.00.txt", import.meta.url)),
  "utf8"
);

const constants = { sampleLengthMm: 1, linearTransmittance: 0.9, peakIrradiance: 1e13 };

const createResponse = () => {
  const headers: Record<string, string> = {};
  let body = "";
  const res = {
    statusCode: 0,
    setHeader: (name: string, value: string) => {
      headers[name] = value;
    },
    end: (payload: string) => {
      body = payload;
    }
  };
  return { res, headers, json: (): unknown => JSON.parse(body) };
};

describe("fit-batch handler", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("rejects methods other than POST", async () => {
    const { res, json } = createResponse();
    await handler({ method: "GET" }, res);

    expect(res.statusCode).toBe(405);
    expect(json()).toMatchObject({ ok: false, error: "Method not allowed" });
    expect(json()).toHaveProperty("requestId", expect.stringMatching(/^fit-[0-9a-f-]{36}$/));
  });

  it("rejects malformed JSON", async () => {
    const { res, json } = createResponse();
    await handler({ method: "POST", body: "{" }, res);

    expect(res.statusCode).toBe(400);
    expect(json()).toMatchObject({ ok: false, error: "Invalid JSON body" });
  });

  it("rejects a payload without files", async () => {
    const { res, json } = createResponse();
    await handler({ method: "POST", body: { files: [], constants } }, res);

    expect(res.statusCode).toBe(400);
    expect(json()).toMatchObject({ ok: false, error: "Invalid payload" });
  });

  it("answers 422 for invalid physical constants", async () => {
    const { res, json } = createResponse();
    await handler(
      {
        method: "POST",
        body: { files: [{ name: "scan.txt", text: fixtureText }], constants: { sampleLengthMm: 1 } }
      },
      res
    );

    expect(res.statusCode).toBe(422);
    expect(json()).toMatchObject({ ok: false });
    expect(console.error).toHaveBeenCalledWith(
      "[fit-batch] fail",
      expect.objectContaining({ stage: "batch", name: "InvalidConstantsError" })
    );
  });

  it("reduces the posted files", async () => {
    const { res, headers, json } = createResponse();
    await handler(
      {
        method: "POST",
        body: JSON.stringify({
          files: [
            { name: " scan-0.txt ", text: fixtureText },
            { name: "broken.txt", text: "Z-scan measurement\nCode: X" }
          ],
          constants,
          config: { fit: { maxIterations: 100 } }
        })
      },
      res
    );

    expect(res.statusCode).toBe(200);
    expect(headers["Content-Type"]).toBe("application/json");
    expect(json()).toMatchObject({
      ok: true,
      result: {
        entries: [{ id: "scan-0.txt", status: "reliable" }],
        summary: { succeeded: ["scan-0.txt"], failed: ["broken.txt"] }
      },
      failures: [{ id: "broken.txt", code: "PARSE_ERROR" }]
    });
  });

  it("reads a streamed request body", async () => {
    const payload = JSON.stringify({ files: [{ name: "scan.txt", text: fixtureText }], constants });
    const { res, json } = createResponse();
    await handler(
      {
        method: "POST",
        async *[Symbol.asyncIterator]() {
          yield Buffer.from(payload.slice(0, 100));
          yield payload.slice(100);
        }
      },
      res
    );

    expect(res.statusCode).toBe(200);
    expect(json()).toMatchObject({ ok: true, failures: [] });
  });
});
