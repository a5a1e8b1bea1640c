import { PipelineError } from "../errors/PipelineError";

export const outputFormats = ["mp3", "m4a", "ogg", "opus", "wav", "flac", "mp4", "webm", "gif", "jpg"] as const;

export type OutputFormat = (typeof outputFormats)[number];

type FormatProfile = {
  extension: string;
  muxer: string;
  // null when the codec is lossless or the bitrate is not user-selectable
  defaultBitrateKbps: number | null;
  codecArgs: (bitrateKbps: number | null) => string[];
};

const audioOnly = (codec: string) => (bitrateKbps: number | null): string[] => {
  const args = ["-vn", "-c:a", codec];
  if (bitrateKbps != null) args.push("-b:a", `${bitrateKbps}k`);
  return args;
};

const profiles: Record<OutputFormat, FormatProfile> = {
  mp3: { extension: "mp3", muxer: "mp3", defaultBitrateKbps: 192, codecArgs: audioOnly("libmp3lame") },
  m4a: { extension: "m4a", muxer: "ipod", defaultBitrateKbps: 192, codecArgs: audioOnly("aac") },
  ogg: { extension: "ogg", muxer: "ogg", defaultBitrateKbps: 160, codecArgs: audioOnly("libvorbis") },
  opus: { extension: "opus", muxer: "opus", defaultBitrateKbps: 128, codecArgs: audioOnly("libopus") },
  wav: { extension: "wav", muxer: "wav", defaultBitrateKbps: null, codecArgs: audioOnly("pcm_s16le") },
  flac: { extension: "flac", muxer: "flac", defaultBitrateKbps: null, codecArgs: audioOnly("flac") },
  mp4: {
    extension: "mp4",
    muxer: "mp4",
    defaultBitrateKbps: null,
    codecArgs: () => [
      "-c:v", "libx264", "-preset", "veryfast", "-crf", "23", "-pix_fmt", "yuv420p",
      "-c:a", "aac", "-b:a", "128k", "-movflags", "+faststart"
    ]
  },
  webm: {
    extension: "webm",
    muxer: "webm",
    defaultBitrateKbps: null,
    codecArgs: () => ["-c:v", "libvpx-vp9", "-b:v", "0", "-crf", "33", "-c:a", "libopus", "-b:a", "128k"]
  },
  gif: {
    extension: "gif",
    muxer: "gif",
    defaultBitrateKbps: null,
    codecArgs: () => ["-an", "-vf", "fps=10,scale=480:-1:flags=lanczos"]
  },
  jpg: {
    extension: "jpg",
    muxer: "image2",
    defaultBitrateKbps: null,
    codecArgs: () => ["-an", "-frames:v", "1", "-q:v", "2"]
  }
};

export const bitrateCaps = { min: 32, max: 320 } as const;

export type OutputTarget = {
  format: OutputFormat;
  extension: string;
  bitrateKbps: number | null;
};

export const isOutputFormat = (value: string): value is OutputFormat =>
  outputFormats.some((format) => format === value);

export const resolveOutputTarget = (format: string, bitrateKbps?: number): OutputTarget => {
  const normalized = format.trim().toLowerCase().replace(/^\./, "");
  if (!isOutputFormat(normalized)) {
    throw new PipelineError({
      code: "UnsupportedFormat",
      message: `Unsupported output format "${format}". Supported: ${outputFormats.join(", ")}`
    });
  }

  const profile = profiles[normalized];
  if (bitrateKbps == null) {
    return { format: normalized, extension: profile.extension, bitrateKbps: profile.defaultBitrateKbps };
  }

  if (profile.defaultBitrateKbps == null) {
    throw new PipelineError({
      code: "UnsupportedFormat",
      message: `Output format "${normalized}" does not take a bitrate`
    });
  }
  if (!Number.isInteger(bitrateKbps) || bitrateKbps < bitrateCaps.min || bitrateKbps > bitrateCaps.max) {
    throw new PipelineError({
      code: "UnsupportedFormat",
      message: `bitrateKbps=${String(bitrateKbps)} is out of allowed range [${bitrateCaps.min}..${bitrateCaps.max}]`
    });
  }

  return { format: normalized, extension: profile.extension, bitrateKbps };
};

/**
 * Codec and muxer arguments placed between the input and the output path.
 */
export const buildFormatArgs = (target: OutputTarget): string[] => {
  const profile = profiles[target.format];
  return [...profile.codecArgs(target.bitrateKbps), "-f", profile.muxer];
};
