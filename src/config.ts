import path from "node:path";
import os from "node:os";
import {
  isThinkingLevel,
  MODEL_TIERS,
  DEFAULT_EDITOR_TIER,
  DEFAULT_TRANSCRIBER_TIER,
  type ThinkingLevel,
} from "./constants.js";

export interface ModelConfig {
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly model: string;
  readonly temperature: number;
  readonly thinkingLevel: ThinkingLevel;
  readonly timeoutMs: number;
}

export interface SyncConfig {
  readonly rcloneCmd: string;
  readonly remotePath: string | null; // e.g. dropbox:Transcripts
  readonly enabledCallerIds: readonly number[];
}

export interface ServiceConfig {
  readonly port: number;
  readonly host: string;
  readonly logLevel: string;
  readonly apiKey: string | null;
  readonly allowedCallerIds: readonly number[]; // empty: everyone
  readonly tempDir: string;
  readonly settingsFile: string;
  readonly uploadLimitBytes: number;
  readonly ytdlpCmd: string;
  readonly ffmpegCmd: string | null;
  readonly pdfRenderCmd: string;
  readonly transcriber: ModelConfig;
  readonly editor: ModelConfig;
  readonly sync: SyncConfig;
}

type Env = Record<string, string | undefined>;

const rootDir = path.resolve(process.cwd());

const DEFAULT_GEMINI_BASE_URL = "https://generativelanguage.googleapis.com";

/**
 * Parses a comma separated list of integer ids. Entries that are not integers
 * are skipped and reported through `onInvalid`.
 */
export function parseIdList(raw: string | undefined, onInvalid?: (entry: string) => void): number[] {
  if (!raw) return [];
  const ids: number[] = [];
  for (const part of raw.split(",")) {
    const entry = part.trim();
    if (!entry) continue;
    if (/^-?\d+$/.test(entry)) {
      ids.push(Number(entry));
    } else {
      onInvalid?.(entry);
    }
  }
  return ids;
}

function parseNumber(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

function parseThinkingLevel(raw: string | undefined, fallback: ThinkingLevel): ThinkingLevel {
  const value = raw?.trim().toLowerCase();
  return value && isThinkingLevel(value) ? value : fallback;
}

function emptyToNull(raw: string | undefined): string | null {
  const value = raw?.trim();
  return value ? value : null;
}

export function loadConfig(
  env: Env = process.env,
  onWarning: (message: string) => void = () => {}
): ServiceConfig {
  const geminiApiKey = env.GEMINI_API_KEY ?? "";
  const baseUrl = env.GEMINI_BASE_URL || DEFAULT_GEMINI_BASE_URL;
  const timeoutMs = Math.max(10000, parseNumber(env.REMOTE_TIMEOUT_MS, 600000));

  const transcriber: ModelConfig = Object.freeze({
    apiKey: geminiApiKey,
    baseUrl,
    model: MODEL_TIERS[DEFAULT_TRANSCRIBER_TIER],
    temperature: parseNumber(env.TRANSCRIBER_TEMPERATURE, 1.0),
    thinkingLevel: parseThinkingLevel(env.TRANSCRIBER_THINKING_LEVEL, "low"),
    timeoutMs,
  });

  const editor: ModelConfig = Object.freeze({
    apiKey: geminiApiKey,
    baseUrl,
    model: MODEL_TIERS[DEFAULT_EDITOR_TIER],
    temperature: parseNumber(env.EDITOR_TEMPERATURE, 1.0),
    thinkingLevel: parseThinkingLevel(env.EDITOR_THINKING_LEVEL, "high"),
    timeoutMs,
  });

  const warnInvalid = (name: string) => (entry: string) =>
    onWarning(`Ignoring invalid id in ${name}: ${entry}`);

  const sync: SyncConfig = Object.freeze({
    rcloneCmd: env.RCLONE_CMD || "rclone",
    remotePath: emptyToNull(env.RCLONE_REMOTE_PATH)?.replace(/\/+$/, "") ?? null,
    enabledCallerIds: Object.freeze(
      parseIdList(env.RCLONE_ENABLED_CALLER_IDS, warnInvalid("RCLONE_ENABLED_CALLER_IDS"))
    ),
  });

  return Object.freeze({
    port: parseInt(env.PORT || "5688", 10),
    host: env.HOST || "0.0.0.0",
    logLevel: env.LOG_LEVEL || "info",
    apiKey: emptyToNull(env.API_KEY),
    allowedCallerIds: Object.freeze(
      parseIdList(env.ALLOWED_CALLER_IDS, warnInvalid("ALLOWED_CALLER_IDS"))
    ),
    tempDir: env.TEMP_DIR || path.join(os.tmpdir(), "media_transcriber"),
    settingsFile: path.resolve(rootDir, env.SETTINGS_FILE || path.join("data", "user_settings.json")),
    uploadLimitBytes: Math.max(1, parseNumber(env.UPLOAD_LIMIT_MB, 50)) * 1024 * 1024,
    ytdlpCmd: env.YTDLP_CMD || "yt-dlp",
    ffmpegCmd: emptyToNull(env.FFMPEG_CMD),
    pdfRenderCmd: env.PDF_RENDER_CMD || "weasyprint",
    transcriber,
    editor,
    sync,
  });
}

/** Request-scoped variant of a model config; the shared value is never mutated. */
export function withModel(config: ModelConfig, model: string): ModelConfig {
  if (config.model === model) return config;
  return Object.freeze({ ...config, model });
}

export function isSyncEnabledFor(sync: SyncConfig, callerId: number): boolean {
  return sync.remotePath !== null && sync.enabledCallerIds.includes(callerId);
}
