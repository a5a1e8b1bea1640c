import type { Job } from "../../src/core/jobs/Job";
import { fromJobDoc, MongoJobArchive, toJobDoc, type JobDoc } from "../../src/infrastructure/mongo/MongoJobArchive";
import { mongoIndexes } from "../../src/infrastructure/mongo/mongo.indexes";

const doneJob: Job = {
  id: "job-1",
  sourceUrl: "https://media.test/a.mp4",
  format: "mp3",
  status: "done",
  createdAt: new Date("2026-01-01T00:00:00.000Z"),
  updatedAt: new Date("2026-01-01T00:01:00.000Z"),
  completedAt: new Date("2026-01-01T00:01:00.000Z"),
  workerId: "worker-1",
  fetchAttempts: 1,
  result: {
    jobId: "job-1",
    fileName: "job-1.mp3",
    path: "/srv/downloads/job-1.mp3",
    sizeBytes: 42,
    createdAt: new Date("2026-01-01T00:01:00.000Z")
  }
};

type FakeCollection = {
  replaceOne: jest.Mock;
  findOne: jest.Mock;
};

const withCollection = (archive: MongoJobArchive, collection: FakeCollection) => {
  (archive as unknown as { getCollection: () => Promise<FakeCollection> }).getCollection = async () => collection;
};

describe("MongoJobArchive", () => {
  it("keys documents by job id and strips storage fields on the way out", () => {
    const archivedAt = new Date("2026-01-02T00:00:00.000Z");
    const doc = toJobDoc(doneJob, archivedAt);

    expect(doc._id).toBe("job-1");
    expect(doc.archivedAt).toBe(archivedAt);
    expect(fromJobDoc(doc)).toEqual(doneJob);
  });

  it("upserts by id so a repeated save replaces the record", async () => {
    const archive = new MongoJobArchive("mongodb://localhost:27017/media_pipeline");
    const collection: FakeCollection = { replaceOne: jest.fn().mockResolvedValue({}), findOne: jest.fn() };
    withCollection(archive, collection);

    await archive.save(doneJob);

    expect(collection.replaceOne).toHaveBeenCalledTimes(1);
    const [filter, doc, options] = collection.replaceOne.mock.calls[0];
    expect(filter).toEqual({ _id: "job-1" });
    expect(doc).toMatchObject({ _id: "job-1", id: "job-1", status: "done" });
    expect(options).toEqual({ upsert: true });
  });

  it("maps a stored document back to a job", async () => {
    const archive = new MongoJobArchive("mongodb://localhost:27017/media_pipeline");
    const stored: JobDoc = toJobDoc(doneJob, new Date());
    const collection: FakeCollection = {
      replaceOne: jest.fn(),
      findOne: jest.fn().mockImplementation(async (filter: { _id: string }) => (filter._id === "job-1" ? stored : null))
    };
    withCollection(archive, collection);

    await expect(archive.get("job-1")).resolves.toEqual(doneJob);
    await expect(archive.get("missing")).resolves.toBeNull();
  });

  it("returns cached collection without reconnecting", async () => {
    const archive = new MongoJobArchive("mongodb://localhost:27017/media_pipeline");
    const cached = { findOne: jest.fn() };
    (archive as unknown as { collection?: typeof cached }).collection = cached;

    const col = await (archive as unknown as { getCollection: () => Promise<typeof cached> }).getCollection();
    expect(col).toBe(cached);
  });

  it("closes cleanly when it never connected", async () => {
    const archive = new MongoJobArchive("mongodb://localhost:27017/media_pipeline");
    await expect(archive.close()).resolves.toBeUndefined();
  });

  it("declares the retention indexes", () => {
    expect(mongoIndexes.jobArchive.map((idx) => idx.options.name)).toEqual(["completedAt_1", "status_1_completedAt_-1"]);
  });
});
