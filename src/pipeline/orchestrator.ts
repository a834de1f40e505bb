import fs from "node:fs/promises";
import path from "node:path";
import { MODEL_TIERS } from "../constants.js";
import { isSyncEnabledFor, withModel, type ServiceConfig } from "../config.js";
import { EmptyResultError, PipelineError, describeError, type PipelineStage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { loadPreferences } from "../store/preferences.js";
import type { SettingsStore } from "../store/settingsStore.js";
import type {
  Deliverer,
  MediaFetcher,
  PipelineRequest,
  PipelineResult,
  PipelineState,
  Reformatter,
  RequestSource,
  Renderer,
  StatusSink,
  Syncer,
  Transcriber,
} from "../types.js";
import { deriveOutputName, sanitizeFilename } from "../utils/filename.js";
import { runWithRetry, type RetryOptions } from "../utils/retry.js";
import { PLATFORMS } from "../utils/url.js";
import { copyUploadedFile } from "./download.js";
import { composeEditorInstructions } from "./edit.js";
import { allocateScratch, removeScratch, UPLOAD_SCRATCH_PREFIX, type ScratchArea } from "./scratch.js";

const MARKDOWN_FILE = "transcript.md";
const PDF_FILE = "transcript.pdf";

// Stage blamed for a failure raised while the pipeline is in a given state
const STATE_STAGES: Record<PipelineState, PipelineStage> = {
  created: "scratch",
  scratch_allocated: "fetch",
  fetching: "fetch",
  transcribing: "transcribe",
  reformatting: "reformat",
  rendering: "render",
  syncing: "deliver",
  delivering: "deliver",
  cleaned: "deliver",
  failed: "deliver",
};

export interface PipelineDeps {
  config: ServiceConfig;
  settings: SettingsStore;
  fetcher: MediaFetcher;
  transcriber: Transcriber;
  reformatter: Reformatter;
  renderer: Renderer;
  syncer?: Syncer;
  editorInstructions?: (translation: boolean) => Promise<string>;
  logger?: Logger;
  now?: () => Date;
  retry?: Pick<RetryOptions, "maxAttempts" | "baseDelayMs" | "sleep">;
}

function requireText(text: string, what: string): string {
  if (!text.trim()) {
    throw new EmptyResultError(`${what} returned an empty result`);
  }
  return text;
}

function scratchPrefix(source: RequestSource): string {
  return source.kind === "url" ? PLATFORMS[source.descriptor.platform].scratchPrefix : UPLOAD_SCRATCH_PREFIX;
}

/** Name used for the outputs when the edited transcript has no title. */
export function fallbackOutputName(source: RequestSource): string {
  if (source.kind === "url") {
    return source.descriptor.platform === "youtube" ? source.descriptor.stableId : "transcript";
  }
  if (!source.file.fileName) return "audio";
  const safe = sanitizeFilename(source.file.fileName);
  return path.basename(safe, path.extname(safe)) || "audio";
}

/**
 * Runs one request through fetch, transcribe, reformat, render, optional
 * sync and delivery inside a scratch area of its own. The scratch area is
 * removed on every exit path. Failures surface as PipelineError.
 */
export class PipelineOrchestrator {
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly editorInstructions: (translation: boolean) => Promise<string>;

  constructor(private readonly deps: PipelineDeps) {
    this.log = (deps.logger ?? silentLogger).child({ module: "pipeline" });
    this.now = deps.now ?? (() => new Date());
    this.editorInstructions = deps.editorInstructions ?? composeEditorInstructions;
  }

  async run(request: PipelineRequest, deliverer: Deliverer, onStatus: StatusSink): Promise<PipelineResult> {
    const log = this.log.child({ requestId: request.requestId, callerId: request.callerId });
    const { config, settings } = this.deps;

    const progress: { state: PipelineState } = { state: "created" };
    const transition = (next: PipelineState) => {
      log.info({ from: progress.state, to: next }, "Pipeline state change");
      progress.state = next;
    };
    const notify = (message: string) => {
      try {
        onStatus(message);
      } catch (err) {
        log.warn({ err }, "Status sink threw");
      }
    };
    const retry = <T>(label: string, operation: () => Promise<T>): Promise<T> =>
      runWithRetry(operation, { ...this.deps.retry, label, logger: log });

    let scratch: ScratchArea | null = null;
    try {
      scratch = await allocateScratch(config.tempDir, scratchPrefix(request.source));
      const workDir = scratch.dir;
      transition("scratch_allocated");

      const prefs = await loadPreferences(settings, request.callerId);
      const transcriberConfig = withModel(config.transcriber, MODEL_TIERS[prefs.transcriberModel]);
      const editorConfig = withModel(config.editor, MODEL_TIERS[prefs.editorModel]);

      transition("fetching");
      const source = request.source;
      notify(
        source.kind === "url"
          ? `Downloading audio from ${PLATFORMS[source.descriptor.platform].displayName}...`
          : "Downloading audio file..."
      );
      const audioPath = await retry("Download", () =>
        source.kind === "url"
          ? this.deps.fetcher.fetch({ url: source.url, descriptor: source.descriptor }, workDir)
          : copyUploadedFile(source.file, workDir)
      );

      transition("transcribing");
      notify("Transcribing audio...");
      const transcript = await retry("Transcription", async () =>
        requireText(await this.deps.transcriber.transcribe({ audioPath, config: transcriberConfig }), "Transcription")
      );

      transition("reformatting");
      notify("Formatting transcript...");
      const systemInstructions = await this.editorInstructions(prefs.translation);
      const markdown = await retry("Formatting", async () =>
        requireText(
          await this.deps.reformatter.reformat({ transcript, config: editorConfig, systemInstructions }),
          "Formatting"
        )
      );

      transition("rendering");
      notify("Generating output files...");
      const outputName = deriveOutputName(markdown, fallbackOutputName(source), this.now());
      const markdownPath = path.join(workDir, MARKDOWN_FILE);
      await fs.writeFile(markdownPath, markdown, "utf-8");
      const pdfPath = await this.deps.renderer.render(markdown, path.join(workDir, PDF_FILE));

      let synced = false;
      const remotePath = config.sync.remotePath;
      if (this.deps.syncer && remotePath && isSyncEnabledFor(config.sync, request.callerId)) {
        transition("syncing");
        notify("Syncing Markdown...");
        synced = await this.deps.syncer.sync(markdownPath, `${remotePath}/${outputName}.md`);
      }

      transition("delivering");
      notify("Sending files...");
      if (!synced) {
        await deliverer.deliver({
          path: markdownPath,
          filename: `${outputName}.md`,
          caption: "Markdown transcript",
          contentType: "text/markdown",
        });
      }
      await deliverer.deliver({
        path: pdfPath,
        filename: `${outputName}.pdf`,
        caption: "PDF transcript",
        contentType: "application/pdf",
      });

      notify(synced ? "Done! Markdown synced, PDF attached." : "Done!");
      return { requestId: request.requestId, outputName, synced };
    } catch (err) {
      const failure = new PipelineError(STATE_STAGES[progress.state], err);
      transition("failed");
      log.error({ stage: failure.stage, error: describeError(err) }, "Pipeline failed");
      notify(failure.message);
      throw failure;
    } finally {
      if (scratch) {
        await removeScratch(scratch, log);
      }
      if (progress.state !== "failed") transition("cleaned");
    }
  }
}
