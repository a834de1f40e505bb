import Fastify, { type FastifyReply, type FastifyRequest } from "fastify";
import { z } from "zod";
import fs from "node:fs/promises";
import crypto from "node:crypto";
import type { ServiceConfig } from "./config.js";
import { InputError, PipelineError, SettingsPersistError, describeError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { PipelineOrchestrator } from "./pipeline/orchestrator.js";
import { PreferencesPatchSchema, loadPreferences, updatePreferences } from "./store/preferences.js";
import type { SettingsStore } from "./store/settingsStore.js";
import type { DeliverableFile, Deliverer, PipelineRequest, RequestSource } from "./types.js";
import { PLATFORMS, classify } from "./utils/url.js";

declare module "fastify" {
  interface FastifyRequest {
    callerId: number;
  }
}

export interface AppDeps {
  config: ServiceConfig;
  settings: SettingsStore;
  orchestrator: Pick<PipelineOrchestrator, "run">;
  logger?: Logger;
}

interface DeliveredFile {
  filename: string;
  caption: string;
  contentType: string;
  data: string;
}

const CreateSchema = z.object({
  url: z.string().trim().min(1),
});

const CallerIdSchema = z
  .string()
  .trim()
  .regex(/^-?\d+$/)
  .transform(Number)
  .refine(Number.isSafeInteger, "caller id out of range");

// Raw upload bodies; other video types get Fastify's 415
const UPLOAD_CONTENT_TYPES = [/^audio\/[\w.+-]+/, "video/webm", "application/octet-stream"];

/** Keeps delivered files in memory so they can be returned in the response body. */
class ResponseDeliverer implements Deliverer {
  readonly files: DeliveredFile[] = [];

  async deliver(file: DeliverableFile): Promise<void> {
    const bytes = await fs.readFile(file.path);
    this.files.push({
      filename: file.filename,
      caption: file.caption,
      contentType: file.contentType,
      data: bytes.toString("base64"),
    });
  }
}

function urlSource(url: string): Extract<RequestSource, { kind: "url" }> {
  const descriptor = classify(url);
  if (!descriptor) {
    const supported = Object.values(PLATFORMS).map((p) => p.displayName);
    throw new InputError(`Unsupported URL. Supported platforms: ${supported.join(", ")}`);
  }
  return { kind: "url", url, descriptor };
}

function failureStatus(err: PipelineError): number {
  return err.stage === "scratch" || err.stage === "render" ? 500 : 502;
}

export function buildApp({ config, settings, orchestrator, logger = silentLogger }: AppDeps) {
  const app = Fastify({
    logger,
    bodyLimit: config.uploadLimitBytes,
    connectionTimeout: 0,
    keepAliveTimeout: 0,
    requestTimeout: 0, // pipelines run for minutes
  });

  app.decorateRequest("callerId", 0);

  app.setErrorHandler((err, request, reply) => {
    if (err instanceof InputError) {
      return reply.code(400).send({ error: err.message });
    }
    if ((err.statusCode ?? 500) >= 500) {
      request.log.error({ err }, "Request failed");
    }
    return reply.send(err);
  });

  for (const contentType of UPLOAD_CONTENT_TYPES) {
    app.addContentTypeParser(contentType, { parseAs: "buffer" }, (_req, body, done) => {
      done(null, body);
    });
  }

  // API key, caller identity and allow-list for every /v1 route
  app.addHook("preHandler", async (request, reply) => {
    if (!request.url.startsWith("/v1/")) return;

    if (config.apiKey && request.headers["x-api-key"] !== config.apiKey) {
      return reply.code(401).send({ error: "Unauthorized: Invalid or missing API key" });
    }

    const caller = CallerIdSchema.safeParse(request.headers["x-caller-id"]);
    if (!caller.success) {
      return reply.code(400).send({ error: "Missing or invalid x-caller-id header" });
    }
    if (config.allowedCallerIds.length > 0 && !config.allowedCallerIds.includes(caller.data)) {
      request.log.warn({ callerId: caller.data }, "Rejected caller not in allow-list");
      return reply.code(403).send({ error: "Forbidden" });
    }
    request.callerId = caller.data;
  });

  async function runPipeline(request: FastifyRequest, reply: FastifyReply, source: RequestSource) {
    const pipelineRequest: PipelineRequest = {
      requestId: crypto.randomUUID(),
      callerId: request.callerId,
      source,
    };
    const status: string[] = [];
    const deliverer = new ResponseDeliverer();

    try {
      const result = await orchestrator.run(pipelineRequest, deliverer, (message) => status.push(message));
      return reply.send({ ...result, status, files: deliverer.files });
    } catch (err) {
      if (err instanceof PipelineError) {
        return reply
          .code(failureStatus(err))
          .send({ requestId: pipelineRequest.requestId, error: err.message, stage: err.stage, status });
      }
      throw err;
    }
  }

  app.get("/healthz", async () => ({ ok: true }));

  app.post("/v1/transcripts", async (request, reply) => {
    const parsed = CreateSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.issues });
    }
    const source = urlSource(parsed.data.url);
    request.log.info({ platform: source.descriptor.platform, id: source.descriptor.stableId }, "Transcript requested");
    return runPipeline(request, reply, source);
  });

  app.post("/v1/transcripts/upload", async (request, reply) => {
    const body = request.body;
    if (!Buffer.isBuffer(body) || body.length === 0) {
      return reply.code(400).send({ error: "Request body must be a non-empty audio file" });
    }
    const fileNameHeader = request.headers["x-file-name"];
    const fileName = typeof fileNameHeader === "string" ? decodeURIComponentSafe(fileNameHeader) : undefined;
    const mimeType = request.headers["content-type"];

    request.log.info({ fileName, mimeType, size: body.length }, "Upload received");
    return runPipeline(request, reply, {
      kind: "upload",
      file: {
        fileName,
        mimeType,
        copyTo: (destination) => fs.writeFile(destination, body),
      },
    });
  });

  app.get("/v1/preferences", async (request) => loadPreferences(settings, request.callerId));

  app.patch("/v1/preferences", async (request, reply) => {
    const parsed = PreferencesPatchSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.issues });
    }
    try {
      return await updatePreferences(settings, request.callerId, parsed.data);
    } catch (err) {
      if (err instanceof SettingsPersistError) {
        request.log.error({ err }, "Failed to save preferences");
        return reply.code(500).send({ error: describeError(err) });
      }
      throw err;
    }
  });

  return app;
}

export type App = ReturnType<typeof buildApp>;

function decodeURIComponentSafe(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
