import type { StoredArtifact } from "../core/jobs/Job";

export type StorageUsage = {
  usedBytes: number;
  quotaBytes: number;
  artifacts: number;
};

export interface ArtifactStorage {
  init(): Promise<void>;
  /**
   * Moves a finished temp file into the downloads directory as `<jobId>.<extension>`.
   */
  publish(tempPath: string, jobId: string, extension: string): Promise<StoredArtifact>;
  cleanup(olderThan: Date, isRetained?: (jobId: string) => boolean): Promise<StoredArtifact[]>;
  remove(jobId: string): Promise<StoredArtifact | undefined>;
  get(jobId: string): StoredArtifact | undefined;
  hasCapacity(): boolean;
  usage(): StorageUsage;
}
