import type { Job } from "../../src/core/jobs/Job";
import { createHarness, type Harness } from "../helpers/pipelineHarness";

const archivedJob = (id: string): Job => ({
  id,
  sourceUrl: "https://media.test/old.mp4",
  format: "mp3",
  status: "done",
  createdAt: new Date("2026-01-01T00:00:00.000Z"),
  updatedAt: new Date("2026-01-01T00:01:00.000Z"),
  completedAt: new Date("2026-01-01T00:01:00.000Z")
});

describe("RequestGateway", () => {
  let h: Harness;

  afterEach(async () => {
    await h.dispose();
  });

  it("validates the output format before creating a job", async () => {
    h = await createHarness();
    expect(() => h.gateway.request("https://media.test/a.mp4", "mp3", { bitrateKbps: 500 })).toThrow(
      "bitrateKbps=500 is out of allowed range [32..320]"
    );
    expect(h.registry.counts()).toEqual({ queued: 0, fetching: 0, transcoding: 0, done: 0, failed: 0 });
  });

  it("stores the normalized source url and requested bitrate", async () => {
    h = await createHarness();
    const jobId = h.gateway.request("www.media.test/a.mp4", "MP3", { bitrateKbps: 128 });

    expect(h.registry.get(jobId)).toMatchObject({
      sourceUrl: "https://www.media.test/a.mp4",
      format: "mp3",
      bitrateKbps: 128
    });
    await h.waitForTerminal([jobId]);
  });

  it("carries a validated referer through to the fetcher", async () => {
    h = await createHarness();
    const jobId = h.gateway.request("https://media.test/a.mp4", "mp3", { referer: "https://media.test/watch?v=1" });

    expect(h.registry.get(jobId)?.referer).toBe("https://media.test/watch?v=1");
    await h.waitForTerminal([jobId]);
    expect(h.fetcher.referers.get(jobId)).toBe("https://media.test/watch?v=1");
  });

  it("rejects a non-http referer before creating a job", async () => {
    h = await createHarness();

    expect(() => h.gateway.request("https://media.test/a.mp4", "mp3", { referer: "ftp://media.test/page" })).toThrow(
      "Source scheme ftp: is not allowed"
    );
    expect(h.registry.counts()).toEqual({ queued: 0, fetching: 0, transcoding: 0, done: 0, failed: 0 });
  });

  it("returns the live job for a repeated source and output", async () => {
    h = await createHarness();
    const first = h.gateway.request("https://media.test/a.mp4", "mp3");

    expect(h.gateway.request("https://media.test/a.mp4", "mp3", { bitrateKbps: 192 })).toBe(first);
    const otherBitrate = h.gateway.request("https://media.test/a.mp4", "mp3", { bitrateKbps: 128 });
    const otherFormat = h.gateway.request("https://media.test/a.mp4", "ogg");
    expect(new Set([first, otherBitrate, otherFormat]).size).toBe(3);

    await h.waitForTerminal([first, otherBitrate, otherFormat]);
    expect(h.gateway.request("https://media.test/a.mp4", "mp3")).toBe(first);
    expect(h.gateway.requestFromText("again: https://media.test/a.mp4", "mp3")).toEqual({ jobIds: [first] });
    expect(h.fetcher.calls).toEqual(expect.arrayContaining([first, otherBitrate, otherFormat]));
    expect(h.fetcher.calls).toHaveLength(3);
    expect(h.logger.events()).toContain("job.duplicate");
  });

  it("accepts a fresh job once the previous one for the same source failed", async () => {
    h = await createHarness();
    const failed = h.gateway.request("https://media.test/fail/a.mp4", "mp3");
    await h.waitForTerminal([failed]);

    const retried = h.gateway.request("https://media.test/fail/a.mp4", "mp3");
    expect(retried).not.toBe(failed);
    await h.waitForTerminal([retried]);
  });

  it("submits every link found in a message", async () => {
    h = await createHarness();
    const result = h.gateway.requestFromText("see https://media.test/a.mp4 and www.media.test/b.webm.", "mp3");

    expect(result.rejected).toBeUndefined();
    expect(result.jobIds).toHaveLength(2);
    expect(result.jobIds.map((id) => h.registry.get(id)?.sourceUrl)).toEqual([
      "https://media.test/a.mp4",
      "https://www.media.test/b.webm"
    ]);
    await h.waitForTerminal(result.jobIds);
  });

  it("stops at the first rejected link", async () => {
    h = await createHarness({ workers: 1, capacity: 1 });
    const text = "https://media.test/gate/g/1.mp4 https://media.test/gate/g/2.mp4 https://media.test/gate/g/3.mp4";

    const result = h.gateway.requestFromText(text, "mp3");

    expect(result.jobIds).toHaveLength(2);
    expect(result.rejected).toEqual({
      url: "https://media.test/gate/g/3.mp4",
      error: { code: "QueueFull", message: "Job queue is full (capacity 1)" }
    });
  });

  it("rejects a message without links", async () => {
    h = await createHarness();
    expect(() => h.gateway.requestFromText("hello there", "mp3")).toThrow("No http(s) or www. links found in text");
  });

  it("falls back to the archive for jobs no longer live", async () => {
    h = await createHarness();
    await h.archive.save(archivedJob("archived-1"));

    await expect(h.gateway.status("archived-1")).resolves.toMatchObject({ id: "archived-1", status: "done" });
    await expect(h.gateway.cancel("archived-1")).resolves.toMatchObject({ status: "done" });
    await expect(h.gateway.status("unknown")).resolves.toBeNull();
  });

  it("reports unknown jobs on cancel", async () => {
    h = await createHarness();
    await expect(h.gateway.cancel("unknown")).rejects.toMatchObject({
      code: "JobNotFound",
      message: "Job unknown not found"
    });
  });

  it("reports health while accepting work", async () => {
    h = await createHarness();

    expect(h.gateway.health()).toEqual({
      status: "ok",
      accepting: true,
      timestamp: expect.any(String),
      queueDepth: 0,
      queueCapacity: 100,
      activeWorkers: 0,
      idleWorkers: 2,
      workerCount: 2,
      lastFailureAt: null,
      jobs: { queued: 0, fetching: 0, transcoding: 0, done: 0, failed: 0 },
      storage: { usedBytes: 0, quotaBytes: 1_000_000 },
      ffmpegAvailable: true
    });
  });

  it("reports the last failure and degrades once stopped", async () => {
    h = await createHarness();
    const jobId = h.gateway.request("https://media.test/fail/a.mp4", "mp3");
    await h.waitForTerminal([jobId]);
    await h.pool.stop();

    const health = h.gateway.health();
    expect(health.status).toBe("degraded");
    expect(health.accepting).toBe(false);
    expect(health.idleWorkers).toBe(0);
    expect(health.lastFailureAt).toBe(h.registry.get(jobId)?.completedAt?.toISOString());
    expect(health.jobs.failed).toBe(1);
  });
});
