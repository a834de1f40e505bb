/**
 * Model tiers and preference defaults.
 * Callers pick a tier, never a raw model name.
 */

export const MODEL_TIERS = {
  flash: "gemini-3-flash-preview",
  pro: "gemini-3-pro-preview",
} as const;

export type ModelTier = keyof typeof MODEL_TIERS;

export const MODEL_TIER_NAMES = ["flash", "pro"] as const satisfies readonly ModelTier[];

export const DEFAULT_TRANSCRIBER_TIER: ModelTier = "flash"; // faster/cheaper
export const DEFAULT_EDITOR_TIER: ModelTier = "pro"; // higher quality

export const PREFERENCE_KEYS = {
  translation: "translation",
  transcriberModel: "transcriber_model",
  editorModel: "editor_model",
} as const;

export type ThinkingLevel = "low" | "high";

export const THINKING_BUDGETS: Record<ThinkingLevel, number> = {
  low: 1024,
  high: 8192,
};

export function isThinkingLevel(value: string): value is ThinkingLevel {
  return value === "low" || value === "high";
}

// Upload MIME type -> file extension, used when the upload carries no usable name
export const AUDIO_MIME_EXTENSIONS: Record<string, string> = {
  "audio/mpeg": ".mp3",
  "audio/mp3": ".mp3",
  "audio/mp4": ".m4a",
  "audio/x-m4a": ".m4a",
  "audio/wav": ".wav",
  "audio/x-wav": ".wav",
  "audio/webm": ".webm",
  "video/webm": ".webm",
  "audio/ogg": ".ogg",
  "audio/flac": ".flac",
  "audio/aac": ".aac",
};

// File extension -> MIME type sent with the transcription upload
export const AUDIO_EXTENSION_MIME: Record<string, string> = {
  ".mp3": "audio/mpeg",
  ".m4a": "audio/mp4",
  ".wav": "audio/wav",
  ".webm": "audio/webm",
  ".ogg": "audio/ogg",
  ".flac": "audio/flac",
  ".aac": "audio/aac",
};

export const DEFAULT_AUDIO_EXTENSION = ".mp3";

// Retry budget shared by fetch, transcribe and reformat
export const REMOTE_MAX_ATTEMPTS = 3;
export const REMOTE_BASE_DELAY_MS = 1000;

// Output filename title length
export const TITLE_MAX_LENGTH = 30;
