import { z } from "zod";
import {
  DEFAULT_EDITOR_TIER,
  DEFAULT_TRANSCRIBER_TIER,
  MODEL_TIER_NAMES,
  PREFERENCE_KEYS,
  type ModelTier,
} from "../constants.js";
import type { SettingsStore } from "./settingsStore.js";

export interface Preferences {
  translation: boolean;
  transcriberModel: ModelTier;
  editorModel: ModelTier;
}

export const DEFAULT_PREFERENCES: Readonly<Preferences> = Object.freeze({
  translation: false,
  transcriberModel: DEFAULT_TRANSCRIBER_TIER,
  editorModel: DEFAULT_EDITOR_TIER,
});

const ModelTierSchema = z.enum(MODEL_TIER_NAMES);

export const PreferencesPatchSchema = z
  .object({
    translation: z.boolean().optional(),
    transcriberModel: ModelTierSchema.optional(),
    editorModel: ModelTierSchema.optional(),
  })
  .strict();

export type PreferencesPatch = z.infer<typeof PreferencesPatchSchema>;

/** Stored preferences with defaults for anything missing or no longer valid. */
export async function loadPreferences(store: SettingsStore, callerId: number): Promise<Preferences> {
  const stored = await store.getAll(callerId);

  const translation = z.boolean().safeParse(stored[PREFERENCE_KEYS.translation]);
  const transcriber = ModelTierSchema.safeParse(stored[PREFERENCE_KEYS.transcriberModel]);
  const editor = ModelTierSchema.safeParse(stored[PREFERENCE_KEYS.editorModel]);

  return {
    translation: translation.success ? translation.data : DEFAULT_PREFERENCES.translation,
    transcriberModel: transcriber.success ? transcriber.data : DEFAULT_PREFERENCES.transcriberModel,
    editorModel: editor.success ? editor.data : DEFAULT_PREFERENCES.editorModel,
  };
}

export async function updatePreferences(
  store: SettingsStore,
  callerId: number,
  patch: PreferencesPatch
): Promise<Preferences> {
  if (patch.translation !== undefined) {
    await store.set(callerId, PREFERENCE_KEYS.translation, patch.translation);
  }
  if (patch.transcriberModel !== undefined) {
    await store.set(callerId, PREFERENCE_KEYS.transcriberModel, patch.transcriberModel);
  }
  if (patch.editorModel !== undefined) {
    await store.set(callerId, PREFERENCE_KEYS.editorModel, patch.editorModel);
  }
  return loadPreferences(store, callerId);
}
