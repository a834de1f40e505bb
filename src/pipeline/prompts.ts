import fs from "node:fs/promises";
import { fileURLToPath } from "node:url";

// Resolves to <repo>/prompts from both src/pipeline and dist/pipeline
const PROMPTS_DIR = fileURLToPath(new URL("../../prompts/", import.meta.url));

const cache = new Map<string, Promise<string>>();

export type PromptName = "transcription.txt" | "editor-system.md" | "translation.md";

export function loadPrompt(name: PromptName): Promise<string> {
  let pending = cache.get(name);
  if (!pending) {
    pending = fs.readFile(`${PROMPTS_DIR}${name}`, "utf-8");
    // a failed read is not cached
    pending.catch(() => cache.delete(name));
    cache.set(name, pending);
  }
  return pending;
}
