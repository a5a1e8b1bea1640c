import { MongoClient, type Collection } from "mongodb";
import type { Job } from "../../core/jobs/Job";
import type { JobArchive } from "../../ports/JobArchive";
import { mongoIndexes } from "./mongo.indexes";

export type JobDoc = Job & {
  _id: string;
  archivedAt: Date;
};

export const toJobDoc = (job: Job, archivedAt: Date): JobDoc => ({ ...job, _id: job.id, archivedAt });

export const fromJobDoc = (doc: JobDoc): Job => {
  const { _id, archivedAt, ...job } = doc;
  return job;
};

/**
 * Mongo archive keyed by job id; saving the same job twice replaces the stored record.
 */
export class MongoJobArchive implements JobArchive {
  private client?: MongoClient;
  private collection?: Collection<JobDoc>;

  constructor(
    private readonly mongoUri: string,
    private readonly dbName = "media_pipeline",
    private readonly collectionName = "jobs"
  ) {}

  private async getCollection(): Promise<Collection<JobDoc>> {
    if (this.collection) return this.collection;

    this.client = new MongoClient(this.mongoUri, { ignoreUndefined: true });
    await this.client.connect();

    const db = this.client.db(this.dbName);
    const col = db.collection<JobDoc>(this.collectionName);

    for (const idx of mongoIndexes.jobArchive) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collection = col;
    return col;
  }

  async save(job: Job): Promise<void> {
    const col = await this.getCollection();
    await col.replaceOne({ _id: job.id }, toJobDoc(job, new Date()), { upsert: true });
  }

  async get(jobId: string): Promise<Job | null> {
    const col = await this.getCollection();
    const doc = await col.findOne({ _id: jobId });
    return doc ? fromJobDoc(doc) : null;
  }

  async close(): Promise<void> {
    await this.client?.close();
    this.client = undefined;
    this.collection = undefined;
  }
}
