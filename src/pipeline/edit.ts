import { silentLogger, type Logger } from "../logger.js";
import type { ReformatRequest, Reformatter } from "../types.js";
import { GeminiClient, type FetchLike } from "../utils/gemini.js";
import { loadPrompt } from "./prompts.js";

export const USER_PROMPT_PREFIX = "Here's the transcript:\n\n";

/**
 * System instructions for the editor: the formatting prompt, followed by the
 * translation block when translation mode is on. The blocks are concatenated
 * in that order, never merged.
 */
export async function composeEditorInstructions(translation: boolean): Promise<string> {
  const base = (await loadPrompt("editor-system.md")).trimEnd();
  if (!translation) return base;
  const addition = (await loadPrompt("translation.md")).trimEnd();
  return `${base}\n${addition}`;
}

export interface GeminiEditorOptions {
  fetchImpl?: FetchLike;
  logger?: Logger;
}

export class GeminiEditor implements Reformatter {
  private readonly log: Logger;

  constructor(private readonly options: GeminiEditorOptions = {}) {
    this.log = (options.logger ?? silentLogger).child({ module: "editor" });
  }

  async reformat({ transcript, config, systemInstructions }: ReformatRequest): Promise<string> {
    const client = new GeminiClient(config, this.options.fetchImpl);
    this.log.info({ model: config.model, inputLength: transcript.length }, "Editing transcript");
    const edited = await client.generateText({
      parts: [{ text: USER_PROMPT_PREFIX + transcript }],
      systemInstruction: systemInstructions,
    });
    this.log.info({ outputLength: edited.length }, "Editing completed");
    return edited;
  }
}
