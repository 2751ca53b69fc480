import fs from "node:fs";
import { TRANSLATION_TARGET, supportsTranslation } from "../constants.js";
import type { Logger } from "../logger.js";
import type { ProgressSink, Segment } from "../types.js";
import type { ModelManager, RecognizedSegment } from "./models.js";

/**
 * Pairs every original segment with the English segment whose start time is
 * closest. Ties keep the earlier English segment.
 */
export function alignByStart(original: Segment[], english: RecognizedSegment[]): Segment[] {
  return original.map((segment) => {
    let closest: RecognizedSegment | null = null;
    let minDiff = Infinity;
    for (const candidate of english) {
      const diff = Math.abs(segment.start - candidate.start);
      if (diff < minDiff) {
        minDiff = diff;
        closest = candidate;
      }
    }
    return { ...segment, translated: closest ? closest.text.trim() : segment.text };
  });
}

function identity(segments: Segment[]): Segment[] {
  return segments.map((s) => ({ ...s, translated: s.text }));
}

export class TranslationAligner {
  constructor(
    private readonly models: ModelManager,
    private readonly logger: Logger
  ) {}

  /** Never rejects: any failure degrades to the original text. */
  async align(
    segments: Segment[],
    targetLanguage: string,
    filePath: string,
    progress: ProgressSink
  ): Promise<Segment[]> {
    if (segments.length === 0 || targetLanguage !== TRANSLATION_TARGET) {
      return segments;
    }
    if (!fs.existsSync(filePath)) {
      this.logger.warn({ filePath }, "Translation skipped, audio missing");
      return identity(segments);
    }

    try {
      const english = await this.models.withModel(async (model) => {
        if (!supportsTranslation(model.name)) {
          throw new Error(`Model ${model.name} cannot translate`);
        }
        progress("Translating to English...");
        return model.recognize(filePath, {
          task: "translate",
          onProgress: ({ elapsedSeconds }) =>
            progress(`Translating to English... (${elapsedSeconds}s elapsed)`),
        });
      });
      return alignByStart(segments, english.segments);
    } catch (err) {
      this.logger.warn({ err }, "Translation degraded to original text");
      return identity(segments);
    }
  }
}
