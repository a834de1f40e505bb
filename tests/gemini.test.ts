import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfig } from "../src/config.js";
import { EmptyResultError } from "../src/errors.js";
import { GeminiEditor, composeEditorInstructions } from "../src/pipeline/edit.js";
import { loadPrompt } from "../src/pipeline/prompts.js";
import { GeminiTranscriber, cleanupRepetitiveCharacters } from "../src/pipeline/transcribe_gemini.js";
import { GeminiApiError, GeminiClient, type FetchLike } from "../src/utils/gemini.js";

interface CannedResponse {
  status?: number;
  headers?: Record<string, string>;
  body?: unknown;
}

interface RecordedCall {
  url: string;
  method: string;
  headers: Record<string, string>;
  body?: string | Uint8Array;
}

function fakeFetch(responses: CannedResponse[]) {
  const calls: RecordedCall[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    calls.push({ url, method: init.method, headers: init.headers, body: init.body });
    const next = responses.shift();
    if (!next) throw new Error(`unexpected request to ${url}`);
    const status = next.status ?? 200;
    const headers = next.headers ?? {};
    return {
      ok: status < 400,
      status,
      headers: { get: (name: string) => headers[name.toLowerCase()] ?? null },
      text: async () => (typeof next.body === "string" ? next.body : JSON.stringify(next.body ?? {})),
    };
  };
  return { calls, fetchImpl };
}

function jsonBody(call: RecordedCall | undefined): unknown {
  return typeof call?.body === "string" ? JSON.parse(call.body) : undefined;
}

const config = loadConfig({ GEMINI_API_KEY: "test-secret", GEMINI_BASE_URL: "https://gemini.test/" });

const UPLOAD_RESPONSES: CannedResponse[] = [
  { headers: { "x-goog-upload-url": "https://upload.gemini.test/session-1" } },
  {
    body: {
      file: { name: "files/abc", uri: "https://gemini.test/files/abc", mimeType: "audio/mpeg", state: "ACTIVE" },
    },
  },
];

let dir: string;
let audioPath: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "gemini-"));
  audioPath = path.join(dir, "clip.mp3");
  await fs.writeFile(audioPath, "abc");
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe("cleanupRepetitiveCharacters", () => {
  it("collapses runs longer than ten characters", () => {
    expect(cleanupRepetitiveCharacters(`好${"的".repeat(11)}`)).toBe("好的");
    expect(cleanupRepetitiveCharacters("a".repeat(10))).toBe("a".repeat(10));
    expect(cleanupRepetitiveCharacters("")).toBe("");
  });
});

describe("GeminiTranscriber", () => {
  it("uploads, generates, deletes and cleans the text", async () => {
    const { calls, fetchImpl } = fakeFetch([
      ...UPLOAD_RESPONSES,
      {
        body: {
          candidates: [
            { content: { parts: [{ text: "let me think", thought: true }, { text: `你好${"啊".repeat(15)}` }] } },
          ],
        },
      },
      { body: {} },
    ]);

    const text = await new GeminiTranscriber({ fetchImpl }).transcribe({ audioPath, config: config.transcriber });

    expect(text).toBe("你好啊");
    expect(calls.map((c) => [c.method, c.url])).toEqual([
      ["POST", "https://gemini.test/upload/v1beta/files"],
      ["POST", "https://upload.gemini.test/session-1"],
      ["POST", "https://gemini.test/v1beta/models/gemini-3-flash-preview:generateContent"],
      ["DELETE", "https://gemini.test/v1beta/files/abc"],
    ]);
    expect(calls[0]?.headers).toMatchObject({
      "x-goog-api-key": "test-secret",
      "x-goog-upload-protocol": "resumable",
      "x-goog-upload-command": "start",
      "x-goog-upload-header-content-length": "3",
      "x-goog-upload-header-content-type": "audio/mpeg",
    });
    expect(calls[1]?.headers["x-goog-upload-command"]).toBe("upload, finalize");

    const prompt = (await loadPrompt("transcription.txt")).trim();
    expect(jsonBody(calls[2])).toEqual({
      contents: [
        {
          role: "user",
          parts: [
            { text: prompt },
            { file_data: { mime_type: "audio/mpeg", file_uri: "https://gemini.test/files/abc" } },
          ],
        },
      ],
      generationConfig: { temperature: 1, thinkingConfig: { thinkingBudget: 1024 } },
    });
  });

  it("deletes the uploaded file when generation fails", async () => {
    const { calls, fetchImpl } = fakeFetch([...UPLOAD_RESPONSES, { status: 500, body: "overloaded" }, { body: {} }]);

    await expect(
      new GeminiTranscriber({ fetchImpl }).transcribe({ audioPath, config: config.transcriber })
    ).rejects.toBeInstanceOf(GeminiApiError);
    expect(calls.at(-1)?.method).toBe("DELETE");
  });

  it("rejects a rejected upload", async () => {
    const { fetchImpl } = fakeFetch([
      UPLOAD_RESPONSES[0] ?? {},
      { body: { file: { name: "files/bad", uri: "u", mimeType: "audio/mpeg", state: "FAILED" } } },
    ]);

    await expect(
      new GeminiTranscriber({ fetchImpl }).transcribe({ audioPath, config: config.transcriber })
    ).rejects.toThrow("Gemini rejected uploaded file files/bad");
  });
});

describe("GeminiClient", () => {
  it("reports an empty answer with its block reason", async () => {
    const { fetchImpl } = fakeFetch([{ body: { candidates: [], promptFeedback: { blockReason: "SAFETY" } } }]);
    const client = new GeminiClient(config.transcriber, fetchImpl);

    const error = await client.generateText({ parts: [{ text: "hi" }] }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(EmptyResultError);
    expect(error instanceof Error ? error.message : "").toBe(
      "Model gemini-3-flash-preview returned an empty result (block reason: SAFETY)"
    );
  });

  it("refuses to call the API without a key", async () => {
    const { calls, fetchImpl } = fakeFetch([]);
    const client = new GeminiClient({ ...config.transcriber, apiKey: "" }, fetchImpl);

    await expect(client.generateText({ parts: [{ text: "hi" }] })).rejects.toThrow(
      "GEMINI_API_KEY is not configured"
    );
    expect(calls).toEqual([]);
  });

  it("times out a response whose body stalls", async () => {
    const fetchImpl: FetchLike = async (_url, init) => ({
      ok: true,
      status: 200,
      headers: { get: () => null },
      text: () =>
        new Promise<string>((_resolve, reject) => {
          init.signal?.addEventListener("abort", () => reject(new Error("body aborted")));
        }),
    });
    const client = new GeminiClient({ ...config.transcriber, timeoutMs: 20 }, fetchImpl);

    await expect(client.generateText({ parts: [{ text: "hi" }] })).rejects.toThrow("body aborted");
  });

  it("reads the error body before reporting a failed status", async () => {
    const { fetchImpl } = fakeFetch([{ status: 429, body: "quota exceeded" }]);
    const client = new GeminiClient(config.transcriber, fetchImpl);

    const error = await client.generateText({ parts: [{ text: "hi" }] }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(GeminiApiError);
    expect(error instanceof GeminiApiError ? error.responseBody : "").toBe("quota exceeded");
  });
});

describe("GeminiEditor", () => {
  it("sends the transcript with the system instructions", async () => {
    const { calls, fetchImpl } = fakeFetch([
      { body: { candidates: [{ content: { parts: [{ text: "# 标题\n\n内容" }] } }] } },
    ]);

    const markdown = await new GeminiEditor({ fetchImpl }).reformat({
      transcript: "原始文本",
      config: config.editor,
      systemInstructions: "SYSTEM",
    });

    expect(markdown).toBe("# 标题\n\n内容");
    expect(calls[0]?.url).toBe("https://gemini.test/v1beta/models/gemini-3-pro-preview:generateContent");
    expect(jsonBody(calls[0])).toEqual({
      contents: [{ role: "user", parts: [{ text: "Here's the transcript:\n\n原始文本" }] }],
      systemInstruction: { parts: [{ text: "SYSTEM" }] },
      generationConfig: { temperature: 1, thinkingConfig: { thinkingBudget: 8192 } },
    });
  });
});

describe("composeEditorInstructions", () => {
  it("appends the translation block only when translation is on", async () => {
    const base = (await loadPrompt("editor-system.md")).trimEnd();
    const translation = (await loadPrompt("translation.md")).trimEnd();

    expect(await composeEditorInstructions(false)).toBe(base);
    expect(await composeEditorInstructions(true)).toBe(`${base}\n${translation}`);
  });
});
