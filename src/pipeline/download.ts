import path from "node:path";
import fs from "node:fs/promises";
import { AUDIO_MIME_EXTENSIONS, DEFAULT_AUDIO_EXTENSION } from "../constants.js";
import { DownloadError, describeError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { MediaFetcher, UploadedFile } from "../types.js";
import { fileExtension, sanitizeFilename } from "../utils/filename.js";
import { runCommand, type CommandRunner } from "../utils/process.js";
import type { SourceDescriptor } from "../utils/url.js";

const YTDLP_TIMEOUT_MS = 30 * 60 * 1000;
// Order in which produced files are picked when yt-dlp could not convert to mp3
const AUDIO_OUTPUT_EXTENSIONS = [".mp3", ".m4a", ".webm", ".opus", ".wav"];

export interface YtDlpFetcherOptions {
  ytdlpCmd: string;
  ffmpegCmd?: string | null;
  runner?: CommandRunner;
  logger?: Logger;
}

/**
 * Downloads the audio track of a classified URL with the yt-dlp CLI and
 * extracts it to mp3 as `<stableId>.mp3` inside the output directory.
 */
export class YtDlpFetcher implements MediaFetcher {
  private readonly runner: CommandRunner;
  private readonly log: Logger;

  constructor(private readonly options: YtDlpFetcherOptions) {
    this.runner = options.runner ?? runCommand;
    this.log = (options.logger ?? silentLogger).child({ module: "download" });
  }

  async fetch(
    source: { url: string; descriptor: SourceDescriptor },
    outputDir: string
  ): Promise<string> {
    const baseName = sanitizeFilename(source.descriptor.stableId);
    // leftovers of a previous attempt would be picked up as output
    await removeOutputs(outputDir, baseName);

    const args = [
      "--format", "bestaudio/best",
      "--extract-audio",
      "--audio-format", "mp3",
      "--audio-quality", "128K",
      "--no-playlist",
      "--no-progress",
      "--no-warnings",
      "--quiet",
      "--output", path.join(outputDir, `${baseName}.%(ext)s`),
    ];
    if (this.options.ffmpegCmd) {
      args.push("--ffmpeg-location", this.options.ffmpegCmd);
    }
    args.push(source.url);

    this.log.info({ platform: source.descriptor.platform, id: source.descriptor.stableId }, "Downloading audio");
    try {
      await this.runner(this.options.ytdlpCmd, args, { timeoutMs: YTDLP_TIMEOUT_MS });
    } catch (err) {
      throw new DownloadError(`Failed to download audio: ${describeError(err)}`, { cause: err });
    }

    const audioPath = await findOutput(outputDir, baseName);
    if (!audioPath) {
      throw new DownloadError(`Downloaded file not found for ${source.descriptor.stableId}`);
    }
    this.log.info({ audioPath }, "Audio downloaded");
    return audioPath;
  }
}

async function findOutput(outputDir: string, baseName: string): Promise<string | null> {
  const entries = new Set(await fs.readdir(outputDir));
  for (const ext of AUDIO_OUTPUT_EXTENSIONS) {
    const name = `${baseName}${ext}`;
    if (entries.has(name)) return path.join(outputDir, name);
  }
  return null;
}

async function removeOutputs(outputDir: string, baseName: string): Promise<void> {
  const entries = await fs.readdir(outputDir);
  await Promise.all(
    entries
      .filter((name) => name.startsWith(`${baseName}.`))
      .map((name) => fs.rm(path.join(outputDir, name), { force: true }))
  );
}

/** Extension for an upload: sanitized original, else from the MIME type, else mp3. */
export function uploadExtension(file: Pick<UploadedFile, "fileName" | "mimeType">): string {
  const fromName = file.fileName ? fileExtension(file.fileName) : "";
  if (fromName) return fromName;
  const mime = file.mimeType?.split(";")[0]?.trim().toLowerCase();
  return (mime && AUDIO_MIME_EXTENSIONS[mime]) || DEFAULT_AUDIO_EXTENSION;
}

/** Copies an inbound upload into the scratch directory as `input<ext>`. */
export async function copyUploadedFile(file: UploadedFile, outputDir: string): Promise<string> {
  const destination = path.join(outputDir, `input${uploadExtension(file)}`);
  await fs.rm(destination, { force: true });
  await file.copyTo(destination);
  const stat = await fs.stat(destination).catch(() => null);
  if (!stat || stat.size === 0) {
    throw new DownloadError("Uploaded file is empty or could not be saved");
  }
  return destination;
}
