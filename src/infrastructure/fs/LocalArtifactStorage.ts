import { copyFile, mkdir, readdir, rename, rm, stat } from "fs/promises";
import path from "path";
import { PipelineError } from "../../core/errors/PipelineError";
import type { StoredArtifact } from "../../core/jobs/Job";
import { assertSafeJobId } from "../../core/jobs/jobId";
import type { ArtifactStorage, StorageUsage } from "../../ports/ArtifactStorage";
import { createSerialSection } from "../../shared/concurrency/limiter";

export type LocalArtifactStorageOptions = {
  directory: string;
  quotaBytes: number;
  now?: () => Date;
};

const artifactNamePattern = /^([A-Za-z0-9][A-Za-z0-9_-]*)\.([a-z0-9]+)$/;

const isCrossDeviceError = (err: unknown): boolean =>
  typeof err === "object" && err !== null && "code" in err && err.code === "EXDEV";

/**
 * Owns the public downloads directory.
 * Every change to the directory and to the usage counter runs inside one serial section.
 */
export class LocalArtifactStorage implements ArtifactStorage {
  private readonly artifacts = new Map<string, StoredArtifact>();
  private readonly serial = createSerialSection();
  private usedBytes = 0;

  constructor(private readonly options: LocalArtifactStorageOptions) {
    if (!Number.isInteger(options.quotaBytes) || options.quotaBytes < 1) {
      throw new Error("quotaBytes must be an integer >= 1");
    }
  }

  get directory(): string {
    return this.options.directory;
  }

  async init(): Promise<void> {
    await this.serial(async () => {
      await mkdir(this.options.directory, { recursive: true });
      this.artifacts.clear();
      this.usedBytes = 0;

      for (const entry of await readdir(this.options.directory, { withFileTypes: true })) {
        if (!entry.isFile()) continue;
        if (entry.name.endsWith(".partial")) {
          await rm(path.join(this.options.directory, entry.name), { force: true });
          continue;
        }
        const match = artifactNamePattern.exec(entry.name);
        if (!match) continue;

        const fullPath = path.join(this.options.directory, entry.name);
        const info = await stat(fullPath);
        this.track({
          jobId: match[1],
          fileName: entry.name,
          path: fullPath,
          sizeBytes: info.size,
          createdAt: info.mtime
        });
      }
    });
  }

  hasCapacity(): boolean {
    return this.usedBytes < this.options.quotaBytes;
  }

  usage(): StorageUsage {
    return { usedBytes: this.usedBytes, quotaBytes: this.options.quotaBytes, artifacts: this.artifacts.size };
  }

  get(jobId: string): StoredArtifact | undefined {
    return this.artifacts.get(jobId);
  }

  async publish(tempPath: string, jobId: string, extension: string): Promise<StoredArtifact> {
    assertSafeJobId(jobId);
    if (!/^[a-z0-9]+$/.test(extension)) {
      throw new Error(`Unsafe artifact extension: ${JSON.stringify(extension)}`);
    }

    return this.serial(async () => {
      const { size } = await stat(tempPath);
      const previous = this.artifacts.get(jobId);
      const projected = this.usedBytes - (previous?.sizeBytes ?? 0) + size;
      if (projected > this.options.quotaBytes) {
        throw new PipelineError({
          code: "StorageFull",
          message: `Publishing ${size} bytes would exceed the disk quota (${this.usedBytes}/${this.options.quotaBytes} bytes used)`,
          context: { jobId }
        });
      }

      const fileName = `${jobId}.${extension}`;
      const finalPath = path.join(this.options.directory, fileName);
      await this.moveIntoPlace(tempPath, finalPath);

      if (previous && previous.path !== finalPath) {
        await rm(previous.path, { force: true });
      }

      const artifact: StoredArtifact = {
        jobId,
        fileName,
        path: finalPath,
        sizeBytes: size,
        createdAt: this.now()
      };
      this.track(artifact);
      return artifact;
    });
  }

  async remove(jobId: string): Promise<StoredArtifact | undefined> {
    return this.serial(async () => {
      const artifact = this.artifacts.get(jobId);
      if (!artifact) return undefined;
      await rm(artifact.path, { force: true });
      this.untrack(artifact);
      return artifact;
    });
  }

  async cleanup(olderThan: Date, isRetained: (jobId: string) => boolean = () => false): Promise<StoredArtifact[]> {
    return this.serial(async () => {
      const removed: StoredArtifact[] = [];
      for (const artifact of Array.from(this.artifacts.values())) {
        if (artifact.createdAt.getTime() >= olderThan.getTime()) continue;
        if (isRetained(artifact.jobId)) continue;
        await rm(artifact.path, { force: true });
        this.untrack(artifact);
        removed.push(artifact);
      }
      return removed;
    });
  }

  private async moveIntoPlace(tempPath: string, finalPath: string): Promise<void> {
    try {
      await rename(tempPath, finalPath);
      return;
    } catch (err) {
      if (!isCrossDeviceError(err)) throw err;
    }

    // different filesystem: copy next to the target under a hidden name, then rename atomically
    const staging = path.join(path.dirname(finalPath), `.${path.basename(finalPath)}.partial`);
    try {
      await copyFile(tempPath, staging);
      await rename(staging, finalPath);
    } catch (err) {
      await rm(staging, { force: true });
      throw err;
    }
    await rm(tempPath, { force: true });
  }

  private track(artifact: StoredArtifact) {
    const existing = this.artifacts.get(artifact.jobId);
    if (existing) this.untrack(existing);
    this.artifacts.set(artifact.jobId, artifact);
    this.usedBytes += artifact.sizeBytes;
  }

  private untrack(artifact: StoredArtifact) {
    this.artifacts.delete(artifact.jobId);
    this.usedBytes -= artifact.sizeBytes;
  }

  private now(): Date {
    return this.options.now ? this.options.now() : new Date();
  }
}
