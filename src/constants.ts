/**
 * Centralized model configuration
 * This is the single source of truth for model names and defaults
 */

// Target tier: loaded first, degraded from on failure
export const DEFAULT_WHISPER_MODEL = "large-v3";

// Valid standard model names
export const VALID_WHISPER_MODELS = [
  // Multilingual models (support translation and transcription)
  "tiny",
  "base",
  "small",
  "medium",
  "large",
  "large-v2",
  "large-v3",
  "turbo",

  // Distil models (optimized for speed and accuracy)
  "distil-large-v2",
  "distil-large-v3",
  "distil-medium.en",
  "distil-small.en",

  // English-only models (transcription only)
  "base.en",
  "small.en",
  "medium.en",
  "tiny.en",
] as const;

export type WhisperModel = (typeof VALID_WHISPER_MODELS)[number];

// Ordered best → smallest. A failed load moves to the next entry.
export const MODEL_TIERS: readonly WhisperModel[] = [
  "large-v3",
  "medium",
  "base",
  "tiny",
];

// Helper function to validate model names
export function isValidModel(model: string): model is WhisperModel {
  return VALID_WHISPER_MODELS.some((m) => m === model);
}

// Helper function to check if model supports translation
export function supportsTranslation(model: string): boolean {
  return !model.endsWith(".en") && !model.includes(".en.");
}

/**
 * Tiers tried for a given target: the target itself, then every smaller
 * standard tier. A target outside the standard list is tried first and then
 * the whole list.
 */
export function modelFallbackChain(target: WhisperModel): WhisperModel[] {
  const idx = MODEL_TIERS.indexOf(target);
  if (idx >= 0) return MODEL_TIERS.slice(idx);
  return [target, ...MODEL_TIERS];
}

/**
 * Auto-detection routinely confuses romanized Hindi and Tamil lyrics, so a
 * detection of either triggers forced passes for both and a word-count vote.
 */
export const DISAMBIGUATION_PAIR = ["hi", "ta"] as const;

export type DisambiguationLanguage = (typeof DISAMBIGUATION_PAIR)[number];

export const LANGUAGE_INDICATORS: Record<DisambiguationLanguage, readonly string[]> = {
  hi: ["hai", "hoon", "mein", "tum", "kya", "aur", "se", "ko", "ka", "ki", "ke"],
  ta: ["tha", "illa", "enna", "naan", "oru", "alla", "irukku"],
};

export const TRANSLATION_TARGET = "en";

export const AUDIO_FILE_NAME = "audio.mp3";
export const LYRICS_FILE_NAME = "lyrics.json";
export const METADATA_FILE_NAME = "metadata.json";

// Range reads are streamed in chunks of this size
export const MEDIA_CHUNK_BYTES = 8 * 1024;
