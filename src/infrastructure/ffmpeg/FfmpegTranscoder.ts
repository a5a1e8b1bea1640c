import ffmpeg from "fluent-ffmpeg";
import { mkdir, rm } from "fs/promises";
import path from "path";
import { PipelineError } from "../../core/errors/PipelineError";
import { assertSafeJobId } from "../../core/jobs/jobId";
import { buildFormatArgs, type OutputTarget } from "../../core/media/formats";
import type { TranscodeResult, Transcoder } from "../../ports/Transcoder";

export type FfmpegTranscoderOptions = {
  ffmpegPath: string;
  workDir: string;
  timeoutMs: number;
  killGraceMs?: number;
  maxDiagnosticsChars?: number;
};

export type FfmpegProbe = {
  available: boolean;
  muxerCount?: number;
  error?: string;
};

type RunOutcome =
  | { kind: "done" }
  | { kind: "timeout"; stderr: string }
  | { kind: "error"; error: Error; stderr: string };

const inputOptions = ["-hide_banner", "-nostdin", "-loglevel", "error"];

/**
 * Keeps only the end of a stream; ffmpeg prints the actual failure last.
 */
const createTailBuffer = (maxChars: number) => {
  let tail = "";
  return {
    push: (line: string) => {
      tail += `${line}\n`;
      if (tail.length > maxChars) tail = tail.slice(tail.length - maxChars);
    },
    value: () => tail.trim()
  };
};

const isSpawnError = (error: Error): boolean => "code" in error && typeof error.code === "string";

const describeFailure = (error: Error): { message: string; exitCode?: number } => {
  const exited = /ffmpeg exited with code (\d+)/.exec(error.message);
  if (exited) return { message: `ffmpeg failed with exit code ${exited[1]}`, exitCode: Number(exited[1]) };
  const killed = /ffmpeg was killed with signal (\w+)/.exec(error.message);
  if (killed) return { message: `ffmpeg failed with signal ${killed[1]}` };
  return { message: `ffmpeg failed: ${error.message}` };
};

export class FfmpegTranscoder implements Transcoder {
  constructor(private readonly options: FfmpegTranscoderOptions) {}

  async transcode(inputPath: string, target: OutputTarget, request: { jobId: string }): Promise<TranscodeResult> {
    const jobId = assertSafeJobId(request.jobId);
    const jobDir = path.join(this.options.workDir, jobId);
    await mkdir(jobDir, { recursive: true });

    const outputPath = path.join(jobDir, `output.${target.extension}`);
    const outcome = await this.run(path.resolve(inputPath), target, outputPath);

    if (outcome.kind === "done") {
      return { path: outputPath, extension: target.extension };
    }

    await rm(outputPath, { force: true });

    if (outcome.kind === "timeout") {
      throw new PipelineError({
        code: "TranscodeTimeout",
        message: `ffmpeg did not finish within ${this.options.timeoutMs}ms`,
        context: { jobId, timeoutMs: this.options.timeoutMs },
        diagnostics: outcome.stderr || undefined
      });
    }
    if (isSpawnError(outcome.error)) {
      throw new PipelineError({
        code: "TranscodeFailed",
        message: `Could not start ${this.options.ffmpegPath}: ${outcome.error.message}`,
        context: { jobId },
        cause: outcome.error
      });
    }

    const failure = describeFailure(outcome.error);
    throw new PipelineError({
      code: "TranscodeFailed",
      message: failure.message,
      context: failure.exitCode != null ? { jobId, exitCode: failure.exitCode } : { jobId },
      diagnostics: outcome.stderr || undefined,
      cause: outcome.error
    });
  }

  /**
   * Lists the binary's muxers. fluent-ffmpeg caches a successful listing for the
   * life of the process.
   */
  probe(): Promise<FfmpegProbe> {
    ffmpeg.setFfmpegPath(this.options.ffmpegPath);
    return new Promise<FfmpegProbe>((resolve) => {
      ffmpeg.getAvailableFormats((error, formats) => {
        if (error) {
          resolve({ available: false, error: error.message });
          return;
        }
        const muxerCount = Object.values(formats).filter((format) => format.canMux).length;
        resolve({ available: true, muxerCount });
      });
    });
  }

  private run(inputPath: string, target: OutputTarget, outputPath: string): Promise<RunOutcome> {
    const { killGraceMs = 2000, maxDiagnosticsChars = 4096, timeoutMs } = this.options;
    const stderr = createTailBuffer(maxDiagnosticsChars);

    return new Promise<RunOutcome>((resolve) => {
      let settled = false;
      let timedOut = false;
      let killTimer: NodeJS.Timeout | undefined;

      // argv is handed to spawn as an array; no shell is involved
      const command = ffmpeg(inputPath)
        .setFfmpegPath(this.options.ffmpegPath)
        .inputOptions(inputOptions)
        .outputOptions(buildFormatArgs(target))
        .output(outputPath);

      const settle = (outcome: RunOutcome) => {
        if (settled) return;
        settled = true;
        clearTimeout(deadline);
        if (killTimer) clearTimeout(killTimer);
        resolve(outcome);
      };

      const deadline = setTimeout(() => {
        timedOut = true;
        command.kill("SIGTERM");
        killTimer = setTimeout(() => command.kill("SIGKILL"), killGraceMs);
      }, timeoutMs);

      command
        .on("stderr", (line: string) => stderr.push(line))
        .on("end", () => settle({ kind: "done" }))
        .on("error", (error: Error) => {
          if (timedOut) {
            settle({ kind: "timeout", stderr: stderr.value() });
            return;
          }
          settle({ kind: "error", error, stderr: stderr.value() });
        })
        .run();
    });
  }
}
