import Fastify from "fastify";
import { z } from "zod";
import type { JobOrchestrator } from "./async/orchestrator.js";
import { PipelineError, RangeNotSatisfiableError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { RangeMediaServer } from "./media/rangeServer.js";
import type { ModelManager } from "./pipeline/models.js";
import type { LibraryIndex } from "./store/library.js";
import type { SongStore } from "./store/songStore.js";
import { renderTranscript } from "./utils/subtitles.js";

export interface AppDeps {
  logger: Logger;
  orchestrator: JobOrchestrator;
  library: LibraryIndex;
  songs: SongStore;
  media: RangeMediaServer;
  models: ModelManager;
}

const ProcessSchema = z.object({
  url: z.string().default(""),
  translate: z.boolean().optional().default(false),
  // "" is what an "Auto" language selector sends
  language: z
    .string()
    .nullish()
    .transform((v) => v || undefined),
});

const SubtitleFormatSchema = z.enum(["srt", "vtt"]);

const SUBTITLE_CONTENT_TYPES = {
  srt: "application/x-subrip; charset=utf-8",
  vtt: "text/vtt; charset=utf-8",
} as const;

export function buildApp(deps: AppDeps) {
  const app = Fastify({
    logger: deps.logger,
    connectionTimeout: 0,
    keepAliveTimeout: 0,
    requestTimeout: 0,
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof RangeNotSatisfiableError) {
      return reply
        .code(416)
        .header("Content-Range", `bytes */${error.size}`)
        .send({ error: error.message });
    }
    if (error instanceof PipelineError) {
      return reply.code(error.statusCode).send({ error: error.message });
    }
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, "Request failed");
    }
    return reply.code(statusCode).send({ error: error.message });
  });

  app.post("/api/process", async (req, reply) => {
    const parsed = ProcessSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.issues });
    }
    const { url, translate, language } = parsed.data;

    const outcome = await deps.orchestrator.submit(url, {
      translate,
      language,
    });
    if (outcome.alreadyProcessed) {
      return reply.code(200).send({
        success: true,
        song_id: outcome.songId,
        metadata: outcome.metadata,
        already_processed: true,
        message: "This video has already been processed. Loading existing data...",
      });
    }
    return reply.code(202).send({
      success: true,
      song_id: outcome.songId,
      processing: true,
    });
  });

  app.get<{ Params: { songId: string } }>("/api/process-status/:songId", async (req) => {
    const job = deps.orchestrator.status(req.params.songId);
    if (job.status === "unknown") {
      return { status: job.status, step: job.step };
    }
    return {
      status: job.status,
      step: job.step,
      ...(job.errorDetail !== undefined ? { error: job.errorDetail } : {}),
      ...(job.result !== undefined ? { metadata: job.result } : {}),
    };
  });

  app.get("/api/library", async () => deps.library.list());

  app.get<{ Params: { songId: string } }>("/api/song/:songId", async (req) => {
    return deps.songs.readSong(req.params.songId);
  });

  app.get<{ Params: { songId: string; format: string } }>(
    "/api/song/:songId/subtitles/:format",
    async (req, reply) => {
      const format = SubtitleFormatSchema.safeParse(req.params.format);
      if (!format.success) {
        return reply.code(400).send({ error: `Unsupported subtitle format: ${req.params.format}` });
      }
      const { lyrics } = deps.songs.readSong(req.params.songId);
      return reply
        .type(SUBTITLE_CONTENT_TYPES[format.data])
        .send(renderTranscript(lyrics, format.data));
    }
  );

  app.get<{ Params: { songId: string } }>("/api/audio/:songId", async (req, reply) => {
    const media = deps.media.serve(req.params.songId, req.headers.range);
    return reply.code(media.statusCode).headers(media.headers).send(media.stream);
  });

  app.post("/api/clear-cache", async (req, reply) => {
    try {
      const success = await deps.models.clearCache();
      return { success, message: success ? "Cache cleared" : "Failed to clear cache" };
    } catch (err) {
      req.log.error({ err }, "Model cache clear failed");
      return reply.code(500).send({ success: false, message: errorMessage(err) });
    }
  });

  app.get("/healthz", async () => ({ ok: true }));

  return app;
}
