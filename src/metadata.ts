// Copyright (c) 2025 [Your Name]
// SPDX-License-Identifier: MIT

import type { FfprobeData, ProbeService } from "./probe.js";
import type { MediaMetadata, SourceFile, StreamMetadata, VideoSummary } from "./types.js";

type Fields = Record<string, unknown>;

function isFields(v: unknown): v is Fields {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** ffprobe prints "N/A" for unknown values; treat those as absent. */
function toNumber(v: unknown): number | undefined {
  if (typeof v === "number") return Number.isFinite(v) ? v : undefined;
  if (typeof v !== "string") return undefined;
  const s = v.trim();
  if (s === "" || s.toUpperCase() === "N/A") return undefined;
  const n = Number(s);
  return Number.isFinite(n) ? n : undefined;
}

function toInteger(v: unknown): number | undefined {
  const n = toNumber(v);
  return n === undefined ? undefined : Math.trunc(n);
}

function toText(v: unknown): string | undefined {
  if (typeof v === "number" && Number.isFinite(v)) return String(v);
  if (typeof v !== "string") return undefined;
  const s = v.trim();
  if (s === "" || s.toUpperCase() === "N/A" || s === "unknown") return undefined;
  return s;
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

/**
 * "30000/1001" -> 29.97; "25" -> 25; "0/0" -> undefined
 */
export function parseFrameRate(raw: unknown): number | undefined {
  if (typeof raw === "number") return raw > 0 && Number.isFinite(raw) ? round2(raw) : undefined;
  const s = toText(raw);
  if (!s) return undefined;
  if (s.includes("/")) {
    const [num, den] = s.split("/").map(Number);
    if (!Number.isFinite(num) || !Number.isFinite(den) || den === 0 || num <= 0) return undefined;
    return round2(num / den);
  }
  const n = Number(s);
  return Number.isFinite(n) && n > 0 ? round2(n) : undefined;
}

/**
 * Creation tags come in several shapes; keep the raw text when it is not a
 * date we can normalise.
 */
export function normalizeCreationTime(raw: unknown): string | undefined {
  const s = toText(raw);
  if (!s) return undefined;
  const t = Date.parse(s);
  return Number.isNaN(t) ? s : new Date(t).toISOString();
}

function tagsOf(block: unknown): Fields {
  if (!isFields(block)) return {};
  const tags = block.tags;
  return isFields(tags) ? tags : {};
}

function firstTag(sources: Fields[], keys: string[]): unknown {
  for (const tags of sources) {
    for (const key of keys) {
      if (tags[key] !== undefined && tags[key] !== null) return tags[key];
    }
  }
  return undefined;
}

function rotationOf(stream: Fields): number | undefined {
  const fromTag = toNumber(tagsOf(stream).rotate);
  if (fromTag !== undefined) return fromTag;
  const fromField = toNumber(stream.rotation);
  if (fromField !== undefined) return fromField;
  const sideData = stream.side_data_list;
  if (Array.isArray(sideData)) {
    for (const entry of sideData) {
      if (isFields(entry)) {
        const r = toNumber(entry.rotation);
        if (r !== undefined) return r;
      }
    }
  }
  return undefined;
}

/** Drop keys whose value is undefined so JSON and equality checks agree. */
function compact<T extends object>(obj: T): T {
  for (const [key, value] of Object.entries(obj)) {
    if (value === undefined) Reflect.deleteProperty(obj, key);
  }
  return obj;
}

function parseStream(stream: Fields, position: number): StreamMetadata {
  return compact<StreamMetadata>({
    index: toInteger(stream.index) ?? position,
    codecType: toText(stream.codec_type),
    codecName: toText(stream.codec_name),
    codecLongName: toText(stream.codec_long_name),
    width: toInteger(stream.width),
    height: toInteger(stream.height),
    frameRate: stream.codec_type === "video"
      ? parseFrameRate(stream.avg_frame_rate) ?? parseFrameRate(stream.r_frame_rate)
      : undefined,
    pixelFormat: toText(stream.pix_fmt),
    sampleRate: toInteger(stream.sample_rate),
    channels: toInteger(stream.channels)
  });
}

/**
 * Turn raw ffprobe output into MediaMetadata. Any subset of fields may be
 * missing; what the probe did not report stays undefined.
 */
export function parseProbeData(data: FfprobeData): MediaMetadata {
  const format: Fields = isFields(data.format) ? data.format : {};
  const rawStreams: Fields[] = Array.isArray(data.streams) ? data.streams.filter(isFields) : [];
  const streams = rawStreams.map(parseStream);

  const videoIdx = rawStreams.findIndex(s => s.codec_type === "video");
  const videoRaw = videoIdx >= 0 ? rawStreams[videoIdx] : undefined;
  const formatTags = tagsOf(format);
  const videoTags = videoRaw ? tagsOf(videoRaw) : {};

  let video: VideoSummary | undefined;
  if (videoRaw) {
    const width = toInteger(videoRaw.width);
    const height = toInteger(videoRaw.height);
    video = compact<VideoSummary>({
      codec: toText(videoRaw.codec_long_name) ?? toText(videoRaw.codec_name),
      width,
      height,
      resolution: width && height ? `${width}x${height}` : undefined,
      frameRate: streams[videoIdx].frameRate,
      rotationDegrees: rotationOf(videoRaw)
    });
  }

  const make = toText(firstTag([videoTags, formatTags], ["com.apple.quicktime.make", "make"]));
  const model = toText(firstTag([videoTags, formatTags], ["com.apple.quicktime.model", "model"]));

  return compact<MediaMetadata>({
    formatName: toText(format.format_name),
    formatLongName: toText(format.format_long_name),
    durationSeconds: toNumber(format.duration) ?? (videoRaw ? toNumber(videoRaw.duration) : undefined),
    sizeBytes: toInteger(format.size),
    bitRate: toInteger(format.bit_rate),
    creationTime: normalizeCreationTime(
      firstTag([formatTags, videoTags], ["creation_time", "com.apple.quicktime.creationdate"])
    ),
    streamCount: toInteger(format.nb_streams) ?? (rawStreams.length > 0 ? rawStreams.length : undefined),
    streams,
    video,
    device: make || model ? compact({ make, model }) : undefined,
    gpsRaw: toText(firstTag([videoTags, formatTags], ["com.apple.quicktime.location.ISO6709", "location"]))
  });
}

/**
 * Metadata stage: probe the source through the injected service, then parse.
 */
export class MetadataExtractor {
  constructor(private readonly probe: ProbeService) {}

  async extractMetadata(sourceFile: SourceFile, signal?: AbortSignal): Promise<MediaMetadata> {
    const data = await this.probe.probe(sourceFile.path, signal);
    return parseProbeData(data);
  }
}
