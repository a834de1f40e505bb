import fs from "node:fs/promises";
import path from "node:path";
import { fetch } from "undici";
import { z } from "zod";
import { THINKING_BUDGETS } from "../constants.js";
import type { ModelConfig } from "../config.js";
import { EmptyResultError } from "../errors.js";

/** The subset of `fetch` the client uses; undici's fetch satisfies it. */
export type FetchLike = (
  url: string,
  init: {
    method: string;
    headers: Record<string, string>;
    body?: string | Uint8Array;
    signal?: AbortSignal;
  }
) => Promise<{
  ok: boolean;
  status: number;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
}>;

export interface GeminiFile {
  name: string;
  uri: string;
  mimeType: string;
}

export type GeminiPart =
  | { text: string }
  | { file_data: { mime_type: string; file_uri: string } };

export interface GenerateRequest {
  parts: GeminiPart[];
  systemInstruction?: string;
}

const FileResponseSchema = z.object({
  file: z.object({
    name: z.string(),
    uri: z.string(),
    mimeType: z.string(),
    state: z.string().optional(),
  }),
});

const GenerateResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z
              .array(z.object({ text: z.string().optional(), thought: z.boolean().optional() }))
              .optional(),
          })
          .optional(),
        finishReason: z.string().optional(),
      })
    )
    .optional(),
  promptFeedback: z.object({ blockReason: z.string().optional() }).optional(),
});

export class GeminiApiError extends Error {
  override readonly name = "GeminiApiError";

  constructor(
    readonly status: number,
    readonly responseBody: string
  ) {
    super(`Gemini API error (${status}): ${responseBody.slice(0, 500)}`);
  }
}

/**
 * Minimal REST client for the Gemini File API and generateContent.
 * One instance per request config; holds no connection state.
 */
export class GeminiClient {
  constructor(
    private readonly config: ModelConfig,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  private url(pathname: string): string {
    return `${this.config.baseUrl.replace(/\/+$/, "")}${pathname}`;
  }

  /** Sends one call and reads its body; the timeout covers both. */
  private async request(
    url: string,
    init: { method: string; headers?: Record<string, string>; body?: string | Uint8Array }
  ): Promise<{ headers: { get(name: string): string | null }; body: string }> {
    if (!this.config.apiKey) {
      throw new Error("GEMINI_API_KEY is not configured");
    }
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);
    try {
      const response = await this.fetchImpl(url, {
        method: init.method,
        headers: { "x-goog-api-key": this.config.apiKey, ...init.headers },
        body: init.body,
        signal: controller.signal,
      });
      const body = await response.text();
      if (!response.ok) {
        throw new GeminiApiError(response.status, body);
      }
      return { headers: response.headers, body };
    } finally {
      clearTimeout(timeout);
    }
  }

  async uploadFile(filePath: string, mimeType: string): Promise<GeminiFile> {
    const bytes = await fs.readFile(filePath);
    const start = await this.request(this.url("/upload/v1beta/files"), {
      method: "POST",
      headers: {
        "content-type": "application/json",
        "x-goog-upload-protocol": "resumable",
        "x-goog-upload-command": "start",
        "x-goog-upload-header-content-length": String(bytes.byteLength),
        "x-goog-upload-header-content-type": mimeType,
      },
      body: JSON.stringify({ file: { display_name: path.basename(filePath) } }),
    });
    const uploadUrl = start.headers.get("x-goog-upload-url");
    if (!uploadUrl) {
      throw new Error("Gemini upload did not return an upload URL");
    }

    const finish = await this.request(uploadUrl, {
      method: "POST",
      headers: {
        "x-goog-upload-offset": "0",
        "x-goog-upload-command": "upload, finalize",
      },
      body: bytes,
    });
    const parsed = FileResponseSchema.parse(JSON.parse(finish.body));
    if (parsed.file.state === "FAILED") {
      throw new Error(`Gemini rejected uploaded file ${parsed.file.name}`);
    }
    return { name: parsed.file.name, uri: parsed.file.uri, mimeType: parsed.file.mimeType };
  }

  async deleteFile(name: string): Promise<void> {
    await this.request(this.url(`/v1beta/${name}`), { method: "DELETE" });
  }

  /**
   * Runs one generateContent call and returns the joined answer text.
   * Thought parts are dropped; a blank answer is an EmptyResultError.
   */
  async generateText({ parts, systemInstruction }: GenerateRequest): Promise<string> {
    const payload = {
      contents: [{ role: "user", parts }],
      ...(systemInstruction ? { systemInstruction: { parts: [{ text: systemInstruction }] } } : {}),
      generationConfig: {
        temperature: this.config.temperature,
        thinkingConfig: { thinkingBudget: THINKING_BUDGETS[this.config.thinkingLevel] },
      },
    };
    const response = await this.request(
      this.url(`/v1beta/models/${encodeURIComponent(this.config.model)}:generateContent`),
      {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(payload),
      }
    );
    const data = GenerateResponseSchema.parse(JSON.parse(response.body));
    const text = (data.candidates ?? [])
      .flatMap((candidate) => candidate.content?.parts ?? [])
      .filter((part) => !part.thought)
      .map((part) => part.text ?? "")
      .join("");

    if (!text.trim()) {
      const blockReason = data.promptFeedback?.blockReason;
      throw new EmptyResultError(
        `Model ${this.config.model} returned an empty result${blockReason ? ` (block reason: ${blockReason})` : ""}`
      );
    }
    return text;
  }
}
