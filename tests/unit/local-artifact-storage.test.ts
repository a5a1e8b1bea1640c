import { mkdir, mkdtemp, readdir, readFile, rm, stat, utimes, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { LocalArtifactStorage } from "../../src/infrastructure/fs/LocalArtifactStorage";

describe("LocalArtifactStorage", () => {
  let root: string;
  let downloads: string;
  let scratch: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "storage-test-"));
    downloads = path.join(root, "downloads");
    scratch = path.join(root, "scratch");
    await mkdir(scratch, { recursive: true });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  const tempFile = async (name: string, content: string) => {
    const filePath = path.join(scratch, name);
    await writeFile(filePath, content);
    return filePath;
  };

  it("moves a finished file into place under the job id", async () => {
    const createdAt = new Date("2026-01-01T00:00:00.000Z");
    const storage = new LocalArtifactStorage({ directory: downloads, quotaBytes: 1000, now: () => createdAt });
    await storage.init();

    const source = await tempFile("output.mp3", "audio");
    const artifact = await storage.publish(source, "job-1", "mp3");

    expect(artifact).toEqual({
      jobId: "job-1",
      fileName: "job-1.mp3",
      path: path.join(downloads, "job-1.mp3"),
      sizeBytes: 5,
      createdAt
    });
    await expect(readFile(artifact.path, "utf8")).resolves.toBe("audio");
    await expect(stat(source)).rejects.toMatchObject({ code: "ENOENT" });
    expect(storage.usage()).toEqual({ usedBytes: 5, quotaBytes: 1000, artifacts: 1 });
    expect(storage.get("job-1")).toEqual(artifact);
  });

  it("refuses a publish that would exceed the quota and leaves the file where it was", async () => {
    const storage = new LocalArtifactStorage({ directory: downloads, quotaBytes: 8 });
    await storage.init();
    await storage.publish(await tempFile("a.mp3", "12345"), "job-a", "mp3");

    const source = await tempFile("b.mp3", "67890");
    await expect(storage.publish(source, "job-b", "mp3")).rejects.toMatchObject({
      code: "StorageFull",
      message: "Publishing 5 bytes would exceed the disk quota (5/8 bytes used)"
    });
    await expect(stat(source)).resolves.toBeDefined();
    expect(await readdir(downloads)).toEqual(["job-a.mp3"]);
  });

  it("never lets concurrent publishes overrun the quota", async () => {
    const storage = new LocalArtifactStorage({ directory: downloads, quotaBytes: 10 });
    await storage.init();

    const sources = await Promise.all([1, 2, 3, 4].map((n) => tempFile(`f${n}`, "xxxx")));
    const results = await Promise.allSettled(sources.map((source, i) => storage.publish(source, `job-${i}`, "ogg")));

    expect(results.filter((r) => r.status === "fulfilled")).toHaveLength(2);
    expect(storage.usage().usedBytes).toBe(8);
  });

  it("reports capacity while usage is below the quota", async () => {
    const storage = new LocalArtifactStorage({ directory: downloads, quotaBytes: 4 });
    await storage.init();
    expect(storage.hasCapacity()).toBe(true);

    await storage.publish(await tempFile("full", "abcd"), "job-full", "wav");
    expect(storage.hasCapacity()).toBe(false);
  });

  it("removes old artifacts that are not retained", async () => {
    let now = new Date("2026-01-01T00:00:00.000Z");
    const storage = new LocalArtifactStorage({ directory: downloads, quotaBytes: 1000, now: () => now });
    await storage.init();
    await storage.publish(await tempFile("old", "old"), "job-old", "mp3");
    await storage.publish(await tempFile("kept", "kept"), "job-kept", "mp3");
    now = new Date("2026-01-02T00:00:00.000Z");
    await storage.publish(await tempFile("new", "new"), "job-new", "mp3");

    const removed = await storage.cleanup(new Date("2026-01-01T12:00:00.000Z"), (jobId) => jobId === "job-kept");

    expect(removed.map((artifact) => artifact.jobId)).toEqual(["job-old"]);
    expect((await readdir(downloads)).sort()).toEqual(["job-kept.mp3", "job-new.mp3"]);
    expect(storage.usage().usedBytes).toBe(7);
  });

  it("removes a single artifact by job id", async () => {
    const storage = new LocalArtifactStorage({ directory: downloads, quotaBytes: 1000 });
    await storage.init();
    await storage.publish(await tempFile("x", "data"), "job-x", "flac");

    await expect(storage.remove("job-x")).resolves.toMatchObject({ fileName: "job-x.flac" });
    await expect(storage.remove("job-x")).resolves.toBeUndefined();
    expect(await readdir(downloads)).toEqual([]);
    expect(storage.usage().usedBytes).toBe(0);
  });

  it("re-indexes existing artifacts and drops leftover partial files on init", async () => {
    await mkdir(downloads, { recursive: true });
    await writeFile(path.join(downloads, "job-1.mp3"), "abc");
    await writeFile(path.join(downloads, ".job-2.mp3.partial"), "half");
    await writeFile(path.join(downloads, "notes.txt.bak"), "ignored");
    const mtime = new Date("2026-02-01T00:00:00.000Z");
    await utimes(path.join(downloads, "job-1.mp3"), mtime, mtime);

    const storage = new LocalArtifactStorage({ directory: downloads, quotaBytes: 1000 });
    await storage.init();

    expect(storage.get("job-1")).toEqual({
      jobId: "job-1",
      fileName: "job-1.mp3",
      path: path.join(downloads, "job-1.mp3"),
      sizeBytes: 3,
      createdAt: mtime
    });
    expect(storage.usage()).toEqual({ usedBytes: 3, quotaBytes: 1000, artifacts: 1 });
    expect((await readdir(downloads)).sort()).toEqual(["job-1.mp3", "notes.txt.bak"]);
  });

  it("rejects unsafe names", async () => {
    const storage = new LocalArtifactStorage({ directory: downloads, quotaBytes: 1000 });
    await storage.init();
    const source = await tempFile("y", "data");

    await expect(storage.publish(source, "../escape", "mp3")).rejects.toThrow('Unsafe job id: "../escape"');
    await expect(storage.publish(source, "job-y", "mp3/../x")).rejects.toThrow('Unsafe artifact extension: "mp3/../x"');
  });
});
