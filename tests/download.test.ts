import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CommandError, DownloadError } from "../src/errors.js";
import { YtDlpFetcher, copyUploadedFile, uploadExtension } from "../src/pipeline/download.js";
import type { CommandRunner } from "../src/utils/process.js";

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "download-"));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

const source = {
  url: "https://youtu.be/dQw4w9WgXcQ",
  descriptor: { platform: "youtube" as const, stableId: "dQw4w9WgXcQ" },
};

/** Fake yt-dlp that writes `<output template>` with the given extension. */
function fakeYtDlp(ext: string | null) {
  return vi.fn<CommandRunner>(async (_command, args) => {
    const template = args[args.indexOf("--output") + 1] ?? "";
    if (ext) await fs.writeFile(template.replace("%(ext)s", ext), "audio");
    return { stdout: "", stderr: "" };
  });
}

describe("YtDlpFetcher", () => {
  it("runs yt-dlp without a shell and returns the mp3", async () => {
    const runner = fakeYtDlp("mp3");
    const fetcher = new YtDlpFetcher({ ytdlpCmd: "yt-dlp", ffmpegCmd: "/opt/ffmpeg", runner });

    const audioPath = await fetcher.fetch(source, dir);

    expect(audioPath).toBe(path.join(dir, "dQw4w9WgXcQ.mp3"));
    const [command, args] = runner.mock.calls[0] ?? ["", []];
    expect(command).toBe("yt-dlp");
    expect(args).toEqual([
      "--format", "bestaudio/best",
      "--extract-audio",
      "--audio-format", "mp3",
      "--audio-quality", "128K",
      "--no-playlist",
      "--no-progress",
      "--no-warnings",
      "--quiet",
      "--output", path.join(dir, "dQw4w9WgXcQ.%(ext)s"),
      "--ffmpeg-location", "/opt/ffmpeg",
      "https://youtu.be/dQw4w9WgXcQ",
    ]);
  });

  it("falls back to other audio containers", async () => {
    const fetcher = new YtDlpFetcher({ ytdlpCmd: "yt-dlp", runner: fakeYtDlp("m4a") });
    await expect(fetcher.fetch(source, dir)).resolves.toBe(path.join(dir, "dQw4w9WgXcQ.m4a"));
  });

  it("removes leftovers of an earlier attempt", async () => {
    await fs.writeFile(path.join(dir, "dQw4w9WgXcQ.mp3"), "stale");
    const fetcher = new YtDlpFetcher({ ytdlpCmd: "yt-dlp", runner: fakeYtDlp("webm") });

    await expect(fetcher.fetch(source, dir)).resolves.toBe(path.join(dir, "dQw4w9WgXcQ.webm"));
  });

  it("wraps command failures in DownloadError", async () => {
    const runner = vi.fn<CommandRunner>(async () => {
      throw new CommandError("yt-dlp", 1, "ERROR: Video unavailable");
    });
    const fetcher = new YtDlpFetcher({ ytdlpCmd: "yt-dlp", runner });

    const error = await fetcher.fetch(source, dir).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(DownloadError);
    expect(error instanceof Error ? error.message : "").toBe(
      "Failed to download audio: yt-dlp exited with code 1: ERROR: Video unavailable"
    );
  });

  it("fails when yt-dlp produced nothing", async () => {
    const fetcher = new YtDlpFetcher({ ytdlpCmd: "yt-dlp", runner: fakeYtDlp(null) });
    await expect(fetcher.fetch(source, dir)).rejects.toThrow("Downloaded file not found for dQw4w9WgXcQ");
  });
});

describe("uploads", () => {
  it("picks the extension from the name, then the MIME type, then mp3", () => {
    expect(uploadExtension({ fileName: "Voice Memo.M4A" })).toBe(".m4a");
    expect(uploadExtension({ fileName: "recording", mimeType: "audio/ogg; codecs=opus" })).toBe(".ogg");
    expect(uploadExtension({ mimeType: "application/octet-stream" })).toBe(".mp3");
    expect(uploadExtension({})).toBe(".mp3");
  });

  it("copies the upload as input<ext>", async () => {
    const copied = await copyUploadedFile(
      { fileName: "../../evil.wav", copyTo: (destination) => fs.writeFile(destination, "RIFF") },
      dir
    );
    expect(copied).toBe(path.join(dir, "input.wav"));
    expect(await fs.readFile(copied, "utf-8")).toBe("RIFF");
  });

  it("rejects an empty upload", async () => {
    await expect(
      copyUploadedFile({ fileName: "a.mp3", copyTo: (destination) => fs.writeFile(destination, "") }, dir)
    ).rejects.toBeInstanceOf(DownloadError);
  });
});
