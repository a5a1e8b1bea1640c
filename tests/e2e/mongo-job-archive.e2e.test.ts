import { MongoJobArchive } from "../../src/infrastructure/mongo/MongoJobArchive";
import type { Job } from "../../src/core/jobs/Job";

const run = process.env.REQUIRE_MONGO_E2E === "1";

(run ? describe : describe.skip)("MongoJobArchive (mongo e2e)", () => {
  const mongoUri = process.env.MONGO_URI ?? "mongodb://127.0.0.1:27017/media_pipeline";
  const archive = new MongoJobArchive(mongoUri, "media_pipeline_e2e", "jobs");

  afterAll(async () => {
    await archive.close();
  });

  it("stores and replaces a finished job", async () => {
    const job: Job = {
      id: `e2e-${Date.now()}`,
      sourceUrl: "https://media.test/a.mp4",
      format: "mp3",
      status: "failed",
      createdAt: new Date("2026-01-01T00:00:00.000Z"),
      updatedAt: new Date("2026-01-01T00:00:01.000Z"),
      completedAt: new Date("2026-01-01T00:00:01.000Z"),
      error: { code: "FetchFailed", message: "HTTP 404" }
    };

    await archive.save(job);
    await archive.save({ ...job, error: { code: "FetchFailed", message: "HTTP 410" } });

    await expect(archive.get(job.id)).resolves.toMatchObject({ id: job.id, error: { message: "HTTP 410" } });
  });
});
