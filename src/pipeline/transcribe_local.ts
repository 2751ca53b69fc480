import fs from "node:fs";
import path from "node:path";
import { fetch, FormData, type Dispatcher } from "undici";
import { z } from "zod";
import type { ServiceConfig } from "../config.js";
import type { WhisperModel } from "../constants.js";
import type { Logger } from "../logger.js";
import type {
  RecognitionOptions,
  RecognitionResult,
  SpeechEngine,
  SpeechModel,
} from "./models.js";

type LocalAsrConfig = Pick<ServiceConfig, "localAsrBaseUrl" | "localTimeoutMs" | "progressIntervalMs">;

// OpenAI-compatible verbose_json returns: text, language, duration? and segments [{ id, start, end, text }]
const VerboseJsonSchema = z.object({
  text: z.string().optional(),
  language: z.string().optional(),
  duration: z.number().optional(),
  segments: z
    .array(
      z.object({
        start: z.number().nullish(),
        end: z.number().nullish(),
        text: z.string().nullish(),
      })
    )
    .default([]),
});

/**
 * Client for the local ASR service. Models are loaded and unloaded
 * explicitly so a load failure can be told apart from a transcription failure.
 */
export class LocalAsrEngine implements SpeechEngine {
  constructor(
    private readonly cfg: LocalAsrConfig,
    private readonly logger: Logger,
    private readonly dispatcher?: Dispatcher
  ) {}

  async load(model: WhisperModel): Promise<SpeechModel> {
    await this.checkHealth();
    await this.post("/models/load", { model }, `Model load failed for ${model}`);
    return {
      name: model,
      recognize: (filePath, opts) => this.recognize(filePath, model, opts),
      release: () => this.post("/models/unload", { model }, `Model unload failed for ${model}`),
    };
  }

  async clearCache(): Promise<boolean> {
    const res = await fetch(`${this.cfg.localAsrBaseUrl}/models/cache/clear`, {
      method: "POST",
      dispatcher: this.dispatcher,
    });
    if (!res.ok) {
      this.logger.warn({ status: res.status, body: await res.text() }, "Local ASR cache clear refused");
      return false;
    }
    return true;
  }

  async recognize(
    filePath: string,
    model: WhisperModel,
    opts: RecognitionOptions
  ): Promise<RecognitionResult> {
    const form = new FormData();
    const fileName = path.basename(filePath);
    const audio = new Blob([fs.readFileSync(filePath)], { type: getAudioMimeType(fileName) });

    form.append("file", audio, fileName);
    form.append("model", model);
    form.append("task", opts.task);
    if (opts.language) {
      form.append("language", opts.language);
    }
    form.append("response_format", "verbose_json");
    form.append("timestamp_granularities[]", "segment");

    // The service reports nothing while it works; emit elapsed time instead
    const startedAt = Date.now();
    const heartbeat = opts.onProgress
      ? setInterval(() => {
          opts.onProgress?.({ elapsedSeconds: Math.round((Date.now() - startedAt) / 1000) });
        }, this.cfg.progressIntervalMs)
      : null;

    try {
      const response = await fetch(
        `${this.cfg.localAsrBaseUrl}/openai/v1/audio/transcriptions`,
        {
          method: "POST",
          body: form,
          signal: AbortSignal.timeout(this.cfg.localTimeoutMs),
          dispatcher: this.dispatcher,
        }
      );

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(
          `Local ASR transcription failed: ${response.status} ${errorText}`
        );
      }

      return normalizeLocalAsrResponse(await response.json());
    } finally {
      if (heartbeat) clearInterval(heartbeat);
    }
  }

  private async checkHealth(): Promise<void> {
    let ok = false;
    try {
      const healthCheck = await fetch(`${this.cfg.localAsrBaseUrl}/healthz`, {
        dispatcher: this.dispatcher,
      });
      ok = healthCheck.ok;
    } catch (err) {
      this.logger.debug({ err }, "Local ASR health check errored");
    }
    if (!ok) {
      throw new Error(
        `Local ASR service is not available at ${this.cfg.localAsrBaseUrl}`
      );
    }
  }

  private async post(route: string, body: unknown, failure: string): Promise<void> {
    const res = await fetch(`${this.cfg.localAsrBaseUrl}${route}`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body),
      dispatcher: this.dispatcher,
    });
    if (!res.ok) {
      throw new Error(`${failure}: ${res.status} ${await res.text()}`);
    }
  }
}

export function normalizeLocalAsrResponse(raw: unknown): RecognitionResult {
  const parsed = VerboseJsonSchema.parse(raw);
  return {
    language: parsed.language,
    segments: parsed.segments.map((s) => ({
      start: s.start ?? 0,
      end: s.end ?? 0,
      text: (s.text ?? "").trim(),
    })),
  };
}

function getAudioMimeType(fileName: string): string {
  const ext = path.extname(fileName).toLowerCase();
  const mimeTypes: Record<string, string> = {
    ".mp3": "audio/mpeg",
    ".wav": "audio/wav",
    ".m4a": "audio/mp4",
    ".aac": "audio/aac",
    ".ogg": "audio/ogg",
    ".flac": "audio/flac",
  };
  return mimeTypes[ext] || "audio/wav";
}
