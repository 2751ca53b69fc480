#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { loadConfig } from "../config.js";
import { TRANSLATION_TARGET } from "../constants.js";
import { errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import { createServices } from "../services.js";
import { renderTranscript } from "../utils/subtitles.js";

// Transcribes a local audio file and prints timed lyrics to stdout
async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("audio", { type: "string", demandOption: true, describe: "Path to the audio file" })
    .option("format", { choices: ["json", "srt", "vtt"] as const, default: "json" as const })
    .option("language", { type: "string", describe: "Force the source language, e.g. hi" })
    .option("translate", { type: "boolean", default: false, describe: "Attach an English translation" })
    .strict()
    .parse();

  const audioPath = path.resolve(argv.audio);
  if (!fs.existsSync(audioPath)) {
    throw new Error(`Audio file '${audioPath}' not found`);
  }

  const cfg = loadConfig();
  // Logs and progress go to stderr so stdout carries only the transcript
  const logger = createLogger(cfg.logLevel, 2);
  const { models, transcriber, translator } = createServices(cfg, logger);
  const progress = (step: string) => process.stderr.write(`${step}\n`);

  try {
    const { segments, language } = await transcriber.transcribe(audioPath, argv.language, progress);
    const finalSegments =
      argv.translate && language !== TRANSLATION_TARGET
        ? await translator.align(segments, TRANSLATION_TARGET, audioPath, progress)
        : segments;
    progress(`Detected language: ${language}`);
    process.stdout.write(`${renderTranscript(finalSegments, argv.format)}\n`);
  } finally {
    await models.release();
  }
}

main().catch((err: unknown) => {
  process.stderr.write(`Error: ${errorMessage(err)}\n`);
  process.exit(1);
});
