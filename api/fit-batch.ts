import { randomUUID } from "crypto";
import { z } from "zod";

import { runBatch } from "../src/lib/batch/runBatch";
import { analysisConfigSchema } from "../src/lib/config";
import { InvalidConstantsError } from "../src/lib/errors";

export const config = {
  runtime: "nodejs"
};

const fileSchema = z
  .object({
    name: z.string().min(1).transform((value) => value.trim()),
    text: z.string().min(1)
  })
  .strict();

const requestSchema = z
  .object({
    files: z.array(fileSchema).min(1).max(200),
    constants: z.unknown(),
    config: analysisConfigSchema.optional()
  })
  .strict();

type ApiRequest = {
  method?: string;
  body?: unknown;
} & Partial<AsyncIterable<Buffer | string>>;

type ApiResponse = {
  statusCode: number;
  setHeader: (name: string, value: string) => void;
  end: (body: string) => void;
};

const jsonResponse = (res: ApiResponse, statusCode: number, payload: Record<string, unknown>) => {
  res.statusCode = statusCode;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(payload));
};

const readRequestBody = async (req: ApiRequest): Promise<unknown> => {
  if (req.body !== undefined && req.body !== null) {
    if (typeof req.body === "string") {
      return JSON.parse(req.body);
    }
    if (Buffer.isBuffer(req.body)) {
      return JSON.parse(req.body.toString("utf8"));
    }
    return req.body;
  }

  const iterate = req[Symbol.asyncIterator];
  if (typeof iterate !== "function") {
    return null;
  }
  const chunks: Buffer[] = [];
  for await (const chunk of { [Symbol.asyncIterator]: () => iterate.call(req) }) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  if (chunks.length === 0) {
    return null;
  }
  return JSON.parse(Buffer.concat(chunks).toString("utf8"));
};

const logStart = (payload: { requestId: string; method: string | undefined; fileCount: number }) => {
  console.info("[fit-batch] start", payload);
};

const logSuccess = (requestId: string, summary: { entries: number; failures: number }) => {
  console.info("[fit-batch] success", { requestId, ...summary });
};

const logFailure = (requestId: string, stage: "body" | "batch", error: unknown) => {
  console.error("[fit-batch] fail", {
    requestId,
    stage,
    name: error instanceof Error ? error.name : typeof error,
    message: error instanceof Error ? error.message : String(error)
  });
};

export default async function handler(req: ApiRequest, res: ApiResponse) {
  const requestId = `fit-${randomUUID()}`;

  if (req.method && req.method !== "POST") {
    jsonResponse(res, 405, { ok: false, requestId, error: "Method not allowed" });
    return;
  }

  let body: unknown;
  try {
    body = await readRequestBody(req);
  } catch (error) {
    logFailure(requestId, "body", error);
    jsonResponse(res, 400, { ok: false, requestId, error: "Invalid JSON body" });
    return;
  }

  const parsed = requestSchema.safeParse(body);
  if (!parsed.success) {
    jsonResponse(res, 400, {
      ok: false,
      requestId,
      error: "Invalid payload",
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    });
    return;
  }

  const { files, constants, config: analysisConfig } = parsed.data;
  logStart({ requestId, method: req.method, fileCount: files.length });

  try {
    const result = await runBatch(
      files.map((file) => ({ id: file.name, text: file.text })),
      constants,
      analysisConfig
    );
    logSuccess(requestId, { entries: result.entries.length, failures: result.failures.length });
    jsonResponse(res, 200, { ok: true, requestId, result, failures: result.failures });
  } catch (error) {
    logFailure(requestId, "batch", error);
    if (error instanceof InvalidConstantsError) {
      jsonResponse(res, 422, { ok: false, requestId, error: error.message, issues: error.issues });
      return;
    }
    jsonResponse(res, 500, {
      ok: false,
      requestId,
      error: error instanceof Error ? error.message : "Batch failed"
    });
  }
}
