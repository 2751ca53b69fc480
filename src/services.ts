import { JobOrchestrator } from "./async/orchestrator.js";
import type { ServiceConfig } from "./config.js";
import type { Logger } from "./logger.js";
import { RangeMediaServer } from "./media/rangeServer.js";
import { AudioAcquirer, YtDlpDownloader } from "./pipeline/download.js";
import { ModelManager } from "./pipeline/models.js";
import { WhisperTranscriber } from "./pipeline/transcribe.js";
import { LocalAsrEngine } from "./pipeline/transcribe_local.js";
import { TranslationAligner } from "./pipeline/translate.js";
import { LibraryIndex } from "./store/library.js";
import { SongStore } from "./store/songStore.js";

export function createServices(cfg: ServiceConfig, logger: Logger) {
  const songs = new SongStore(cfg.songsDir);
  const library = new LibraryIndex(cfg.libraryPath);
  const models = new ModelManager(
    new LocalAsrEngine(cfg, logger.child({ component: "asr" })),
    cfg.modelTiers,
    logger.child({ component: "models" })
  );
  const transcriber = new WhisperTranscriber(models, logger.child({ component: "transcribe" }));
  const translator = new TranslationAligner(models, logger.child({ component: "translate" }));
  const orchestrator = new JobOrchestrator({
    audio: new AudioAcquirer(new YtDlpDownloader(cfg), songs, logger.child({ component: "download" })),
    transcriber,
    translator,
    songs,
    library,
    logger,
  });

  return {
    logger,
    songs,
    library,
    models,
    transcriber,
    translator,
    orchestrator,
    media: new RangeMediaServer(songs),
  };
}
