import {
  DISAMBIGUATION_PAIR,
  LANGUAGE_INDICATORS,
  type DisambiguationLanguage,
} from "../constants.js";
import type { Logger } from "../logger.js";
import type { ProgressSink, Segment } from "../types.js";
import type {
  ModelManager,
  RecognitionOptions,
  RecognitionResult,
  SpeechModel,
} from "./models.js";

export interface TranscriptionOutcome {
  segments: Segment[];
  language: string;
}

function isConfusable(language: string): language is DisambiguationLanguage {
  return DISAMBIGUATION_PAIR.some((l) => l === language);
}

/**
 * Number of the language's indicator words found anywhere in the text.
 * Each indicator counts once, matched as a case-insensitive substring.
 */
export function indicatorScore(text: string, language: DisambiguationLanguage): number {
  const haystack = text.toLowerCase();
  return LANGUAGE_INDICATORS[language].filter((word) => haystack.includes(word.toLowerCase())).length;
}

function joinedText(result: RecognitionResult): string {
  return result.segments.map((s) => s.text).join(" ");
}

function toSegments(result: RecognitionResult): Segment[] {
  return result.segments.map((s) => ({ start: s.start, end: s.end, text: s.text.trim() }));
}

export class WhisperTranscriber {
  constructor(
    private readonly models: ModelManager,
    private readonly logger: Logger
  ) {}

  transcribe(filePath: string, forcedLanguage: string | undefined, progress: ProgressSink): Promise<TranscriptionOutcome> {
    return this.models.withModel(async (model) => {
      const pass = (label: string, language?: string) =>
        model.recognize(filePath, this.options(label, progress, language));

      progress(`Transcribing audio with ${model.name}...`);
      if (forcedLanguage) {
        const result = await pass("Transcribing audio", forcedLanguage);
        return { segments: toSegments(result), language: result.language ?? forcedLanguage };
      }

      const auto = await pass("Transcribing audio");
      const detected = auto.language ?? "unknown";
      if (!isConfusable(detected) || auto.segments.length === 0) {
        return { segments: toSegments(auto), language: detected };
      }

      return this.disambiguate(model, pass, auto, detected, progress);
    });
  }

  private async disambiguate(
    model: SpeechModel,
    pass: (label: string, language?: string) => Promise<RecognitionResult>,
    auto: RecognitionResult,
    detected: DisambiguationLanguage,
    progress: ProgressSink
  ): Promise<TranscriptionOutcome> {
    const [first, second] = DISAMBIGUATION_PAIR;
    progress(`Verifying language (${first}/${second})...`);
    const firstResult = await pass(`Re-transcribing as ${first}`, first);
    const secondResult = await pass(`Re-transcribing as ${second}`, second);

    const firstScore = indicatorScore(joinedText(firstResult), first);
    const secondScore = indicatorScore(joinedText(secondResult), second);
    this.logger.info(
      { model: model.name, detected, scores: { [first]: firstScore, [second]: secondScore } },
      "Language disambiguation scored"
    );

    if (firstScore > secondScore) {
      return { segments: toSegments(firstResult), language: first };
    }
    if (secondScore > firstScore) {
      return { segments: toSegments(secondResult), language: second };
    }
    return { segments: toSegments(auto), language: detected };
  }

  private options(label: string, progress: ProgressSink, language?: string): RecognitionOptions {
    return {
      task: "transcribe",
      language,
      onProgress: ({ elapsedSeconds }) => progress(`${label}... (${elapsedSeconds}s elapsed)`),
    };
  }
}
