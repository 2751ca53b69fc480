import pLimit from "p-limit";
import type { WhisperModel } from "../constants.js";
import { TranscriptionError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";

export type RecognitionTask = "transcribe" | "translate";

export interface RecognitionOptions {
  task: RecognitionTask;
  language?: string; // forced language; auto-detect when absent
  onProgress?: (progress: { elapsedSeconds: number }) => void;
}

export interface RecognizedSegment {
  start: number;
  end: number;
  text: string;
}

export interface RecognitionResult {
  language?: string;
  segments: RecognizedSegment[];
}

/** A model loaded inside the speech-recognition engine. */
export interface SpeechModel {
  readonly name: WhisperModel;
  recognize(filePath: string, opts: RecognitionOptions): Promise<RecognitionResult>;
  release(): Promise<void>;
}

export interface SpeechEngine {
  load(model: WhisperModel): Promise<SpeechModel>;
  /** Drops downloaded model weights. Resolves false when nothing was cleared. */
  clearCache(): Promise<boolean>;
}

// Corrupt or partial model downloads report a hash mismatch
export function isIntegrityError(err: unknown): boolean {
  const message = errorMessage(err).toLowerCase();
  return message.includes("sha256") || message.includes("checksum");
}

/**
 * Owns the process-wide model instance. The model is loaded on first use,
 * degrading through the configured tiers, and every use runs through a
 * single-slot queue since the engine is not reentrant.
 */
export class ModelManager {
  private model: SpeechModel | null = null;
  private readonly lock = pLimit(1);

  constructor(
    private readonly engine: SpeechEngine,
    private readonly tiers: readonly WhisperModel[],
    private readonly logger: Logger
  ) {
    if (tiers.length === 0) throw new Error("At least one model tier is required");
  }

  get loadedModel(): WhisperModel | null {
    return this.model?.name ?? null;
  }

  withModel<T>(fn: (model: SpeechModel) => Promise<T>): Promise<T> {
    return this.lock(async () => fn(await this.acquire()));
  }

  /** Waits for in-flight work, unloads the model and clears the engine cache. */
  clearCache(): Promise<boolean> {
    return this.lock(async () => {
      await this.unload();
      return this.engine.clearCache();
    });
  }

  release(): Promise<void> {
    return this.lock(() => this.unload());
  }

  private async acquire(): Promise<SpeechModel> {
    if (!this.model) {
      this.model = await this.loadWithFallback();
    }
    return this.model;
  }

  private async loadWithFallback(): Promise<SpeechModel> {
    const failures: string[] = [];
    for (const tier of this.tiers) {
      try {
        const model = await this.engine.load(tier);
        this.logger.info({ model: tier }, "Speech model loaded");
        return model;
      } catch (err) {
        failures.push(`${tier}: ${errorMessage(err)}`);
        this.logger.warn({ err, model: tier }, "Speech model failed to load");
        if (isIntegrityError(err)) {
          await this.clearEngineCache();
        }
      }
    }
    throw new TranscriptionError(`All model tiers failed to load (${failures.join("; ")})`);
  }

  private async clearEngineCache(): Promise<void> {
    try {
      const cleared = await this.engine.clearCache();
      this.logger.info({ cleared }, "Model cache cleared after integrity failure");
    } catch (err) {
      this.logger.warn({ err }, "Model cache clear failed");
    }
  }

  private async unload(): Promise<void> {
    const model = this.model;
    this.model = null;
    if (model) {
      await model.release();
      this.logger.info({ model: model.name }, "Speech model released");
    }
  }
}
