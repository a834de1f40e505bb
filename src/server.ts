import "dotenv/config";
import { buildApp } from "./app.js";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { YtDlpFetcher } from "./pipeline/download.js";
import { GeminiEditor } from "./pipeline/edit.js";
import { PipelineOrchestrator } from "./pipeline/orchestrator.js";
import { HtmlPdfRenderer } from "./pipeline/render_pdf.js";
import { sweepScratchRoot } from "./pipeline/scratch.js";
import { RcloneSyncer } from "./pipeline/sync_rclone.js";
import { GeminiTranscriber } from "./pipeline/transcribe_gemini.js";
import { SettingsStore } from "./store/settingsStore.js";

const logger = createLogger(process.env.LOG_LEVEL);
const cfg = loadConfig(process.env, (message) => logger.warn(message));
logger.level = cfg.logLevel;

if (!cfg.transcriber.apiKey) {
  logger.warn("GEMINI_API_KEY is not set; transcription requests will fail");
}

const settings = new SettingsStore(cfg.settingsFile, { logger });

const orchestrator = new PipelineOrchestrator({
  config: cfg,
  settings,
  fetcher: new YtDlpFetcher({ ytdlpCmd: cfg.ytdlpCmd, ffmpegCmd: cfg.ffmpegCmd, logger }),
  transcriber: new GeminiTranscriber({ logger }),
  reformatter: new GeminiEditor({ logger }),
  renderer: new HtmlPdfRenderer({ command: cfg.pdfRenderCmd, logger }),
  syncer: new RcloneSyncer({ rcloneCmd: cfg.sync.rcloneCmd, logger }),
  logger,
});

const app = buildApp({ config: cfg, settings, orchestrator, logger });

const start = async () => {
  try {
    await settings.init();
    await sweepScratchRoot(cfg.tempDir, logger);
    await app.listen({ port: cfg.port, host: cfg.host });
    app.log.info(`listening on ${cfg.host}:${cfg.port}`);
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

const shutdown = (signal: string) => {
  app.log.info(`${signal} received, shutting down`);
  app.close().then(
    () => process.exit(0),
    (err: unknown) => {
      app.log.error(err);
      process.exit(1);
    }
  );
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

await start();
