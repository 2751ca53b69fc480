import type { Segment } from "../types.js";

export type TranscriptFormat = "json" | "srt" | "vtt";

export function renderTranscript(segments: Segment[], format: TranscriptFormat): string {
  switch (format) {
    case "srt":
      return toSrt(segments);
    case "vtt":
      return toVtt(segments);
    case "json":
      return JSON.stringify(segments, null, 2);
  }
}

// Translated text, when present, goes on a second cue line
function cueText(s: Segment): string {
  return s.translated && s.translated !== s.text ? `${s.text}\n${s.translated}` : s.text;
}

export function toSrt(segments: Segment[]): string {
  return segments
    .map((s, i) => `${i + 1}\n${fmtSrtTime(toMs(s.start))} --> ${fmtSrtTime(toMs(s.end))}\n${cueText(s)}\n`)
    .join("\n");
}

export function toVtt(segments: Segment[]): string {
  return `WEBVTT\n\n${segments
    .map((s) => `${fmtVttTime(toMs(s.start))} --> ${fmtVttTime(toMs(s.end))}\n${cueText(s)}\n`)
    .join("\n")}`;
}

function toMs(seconds: number): number {
  return Math.round(seconds * 1000);
}

function fmtSrtTime(ms: number): string {
  const h = Math.floor(ms / 3600000);
  const m = Math.floor((ms % 3600000) / 60000);
  const s = Math.floor((ms % 60000) / 1000);
  const msPart = ms % 1000;
  return `${pad2(h)}:${pad2(m)}:${pad2(s)},${pad3(msPart)}`;
}

function fmtVttTime(ms: number): string {
  const h = Math.floor(ms / 3600000);
  const m = Math.floor((ms % 3600000) / 60000);
  const s = Math.floor((ms % 60000) / 1000);
  const msPart = ms % 1000;
  return `${pad2(h)}:${pad2(m)}:${pad2(s)}.${pad3(msPart)}`;
}

function pad2(n: number) { return n.toString().padStart(2, "0"); }
function pad3(n: number) { return n.toString().padStart(3, "0"); }
