import type { ModelConfig } from "./config.js";
import type { SourceDescriptor } from "./utils/url.js";

/** An inbound audio file from the transport, not yet on local disk. */
export interface UploadedFile {
  fileName?: string;
  mimeType?: string;
  copyTo(destination: string): Promise<void>;
}

export type RequestSource =
  | { kind: "url"; url: string; descriptor: SourceDescriptor }
  | { kind: "upload"; file: UploadedFile };

export interface PipelineRequest {
  requestId: string;
  callerId: number;
  source: RequestSource;
}

export type PipelineState =
  | "created"
  | "scratch_allocated"
  | "fetching"
  | "transcribing"
  | "reformatting"
  | "rendering"
  | "syncing"
  | "delivering"
  | "cleaned"
  | "failed";

/** Advisory progress messages; must return quickly. */
export type StatusSink = (message: string) => void;

export interface PipelineResult {
  requestId: string;
  outputName: string;
  synced: boolean;
}

export interface DeliverableFile {
  path: string;
  filename: string;
  caption: string;
  contentType: string;
}

export interface Deliverer {
  deliver(file: DeliverableFile): Promise<void>;
}

// Remote capabilities. Each call is a single attempt; the orchestrator retries.

export interface MediaFetcher {
  fetch(source: { url: string; descriptor: SourceDescriptor }, outputDir: string): Promise<string>;
}

export interface TranscribeRequest {
  audioPath: string;
  config: ModelConfig;
}

export interface Transcriber {
  transcribe(request: TranscribeRequest): Promise<string>;
}

export interface ReformatRequest {
  transcript: string;
  config: ModelConfig;
  systemInstructions: string;
}

export interface Reformatter {
  reformat(request: ReformatRequest): Promise<string>;
}

export interface Renderer {
  render(markdown: string, outputPath: string): Promise<string>;
}

export interface Syncer {
  /** Best effort: resolves false on failure, never rejects. */
  sync(localPath: string, remoteDestination: string): Promise<boolean>;
}
