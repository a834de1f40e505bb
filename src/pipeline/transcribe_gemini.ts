import path from "node:path";
import { AUDIO_EXTENSION_MIME } from "../constants.js";
import { EmptyResultError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { TranscribeRequest, Transcriber } from "../types.js";
import { GeminiClient, type FetchLike } from "../utils/gemini.js";
import { loadPrompt } from "./prompts.js";

const DEFAULT_MAX_REPEATS = 10;

/**
 * Collapses any character repeated more than `maxRepeats` times in a row to a
 * single occurrence. Speech models sometimes loop on one glyph.
 */
export function cleanupRepetitiveCharacters(text: string, maxRepeats = DEFAULT_MAX_REPEATS): string {
  if (!text) return text;
  const pattern = new RegExp(`(.)\\1{${maxRepeats},}`, "gsu");
  return text.replace(pattern, "$1");
}

export function audioMimeType(filePath: string): string {
  return AUDIO_EXTENSION_MIME[path.extname(filePath).toLowerCase()] ?? "audio/mpeg";
}

export interface GeminiTranscriberOptions {
  fetchImpl?: FetchLike;
  logger?: Logger;
}

/**
 * One transcription attempt: upload the audio to the File API, ask the model
 * for a plain transcript, and always delete the uploaded file afterwards.
 */
export class GeminiTranscriber implements Transcriber {
  private readonly log: Logger;

  constructor(private readonly options: GeminiTranscriberOptions = {}) {
    this.log = (options.logger ?? silentLogger).child({ module: "transcriber" });
  }

  async transcribe({ audioPath, config }: TranscribeRequest): Promise<string> {
    const client = new GeminiClient(config, this.options.fetchImpl);
    const prompt = (await loadPrompt("transcription.txt")).trim();

    this.log.info({ model: config.model }, "Uploading audio");
    const file = await client.uploadFile(audioPath, audioMimeType(audioPath));

    let text: string;
    try {
      text = await client.generateText({
        parts: [{ text: prompt }, { file_data: { mime_type: file.mimeType, file_uri: file.uri } }],
      });
    } finally {
      await client.deleteFile(file.name).catch((err: unknown) => {
        this.log.warn({ err, file: file.name }, "Failed to delete uploaded audio; it may remain on the server");
      });
    }

    const cleaned = cleanupRepetitiveCharacters(text);
    if (cleaned.length < text.length) {
      this.log.info({ removed: text.length - cleaned.length }, "Collapsed repetitive characters");
    }
    if (!cleaned.trim()) {
      throw new EmptyResultError("Transcription returned an empty result");
    }
    this.log.info({ length: cleaned.length }, "Transcription completed");
    return cleaned;
  }
}
