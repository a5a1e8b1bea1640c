import type { CreateIndexesOptions, IndexSpecification } from "mongodb";

/**
 * Index plan for the job archive (applied lazily on first use):
 * - _id is the job id, so lookups by id need no extra index
 * - { completedAt: 1 } for retention reporting
 * - { status: 1, completedAt: -1 } for "latest failures" style queries
 */
export type IndexPlanEntry = {
  keys: IndexSpecification;
  options: CreateIndexesOptions;
};

export const mongoIndexes: { jobArchive: IndexPlanEntry[] } = {
  jobArchive: [
    { keys: { completedAt: 1 }, options: { name: "completedAt_1" } },
    { keys: { status: 1, completedAt: -1 }, options: { name: "status_1_completedAt_-1" } }
  ]
};
