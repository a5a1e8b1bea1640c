import type { OutputTarget } from "../core/media/formats";

export type TranscodeResult = {
  path: string;
  extension: string;
};

export interface Transcoder {
  transcode(inputPath: string, target: OutputTarget, request: { jobId: string }): Promise<TranscodeResult>;
}
