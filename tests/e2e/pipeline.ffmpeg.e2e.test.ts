import ffmpeg from "fluent-ffmpeg";
import { mkdtemp, readFile, rm, stat } from "fs/promises";
import os from "os";
import path from "path";
import { defaultPipelineConfig } from "../../src/application/pipeline/pipeline.config";
import { createPipeline, type Pipeline } from "../../src/composition/root";
import { silentLogger } from "../../src/shared/logging/logger";
import { waitFor } from "../helpers/pipelineHarness";
import { startServer, type TestServer } from "../helpers/testServer";

const run = process.env.REQUIRE_FFMPEG_E2E === "1";
const ffmpegPath = process.env.FFMPEG_PATH ?? "ffmpeg";

(run ? describe : describe.skip)("pipeline (ffmpeg e2e)", () => {
  let root: string;
  let server: TestServer;
  let pipeline: Pipeline;

  beforeAll(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "pipeline-e2e-"));
    const tonePath = path.join(root, "tone.wav");
    await new Promise<void>((resolve, reject) => {
      ffmpeg("sine=frequency=440:duration=1")
        .setFfmpegPath(ffmpegPath)
        .inputFormat("lavfi")
        .output(tonePath)
        .on("end", () => resolve())
        .on("error", (error: Error) => reject(new Error(`could not generate test tone: ${error.message}`)))
        .run();
    });
    const tone = await readFile(tonePath);

    server = await startServer((req, res) => {
      if (req.url === "/tone.wav") {
        res.writeHead(200, { "content-type": "audio/wav", "content-length": String(tone.length) });
        res.end(tone);
        return;
      }
      res.writeHead(404);
      res.end();
    });

    pipeline = await createPipeline({
      env: {
        PORT: 8000,
        DOWNLOAD_DIR: path.join(root, "downloads"),
        WORK_DIR: path.join(root, "work"),
        FFMPEG_PATH: ffmpegPath,
        JOB_ARCHIVE: "memory",
        MONGO_URI: "mongodb://localhost:27017/media_pipeline"
      },
      config: { ...defaultPipelineConfig, fetchMinDelayMs: 10, fetchMaxDelayMs: 20 },
      logger: silentLogger
    });
  });

  afterAll(async () => {
    await pipeline.stop();
    await server.close();
    await rm(root, { recursive: true, force: true });
  });

  it("converts a served wav file to mp3", async () => {
    const jobId = pipeline.gateway.request(`${server.baseUrl}/tone.wav`, "mp3", { bitrateKbps: 64 });
    await waitFor(() => pipeline.registry.get(jobId)?.status === "done", 30_000);

    const artifact = pipeline.registry.get(jobId)?.result;
    expect(artifact?.fileName).toBe(`${jobId}.mp3`);
    const info = await stat(path.join(root, "downloads", `${jobId}.mp3`));
    expect(info.size).toBeGreaterThan(0);
    expect(pipeline.gateway.health().ffmpegAvailable).toBe(true);
  }, 40_000);

  it("fails a job whose source is missing", async () => {
    const jobId = pipeline.gateway.request(`${server.baseUrl}/missing.wav`, "ogg");
    await waitFor(() => pipeline.registry.get(jobId)?.status === "failed", 30_000);

    expect(pipeline.registry.get(jobId)?.error).toEqual({
      code: "FetchFailed",
      message: "Fetch failed after attempt 1/3: HTTP 404"
    });
  }, 40_000);
});
