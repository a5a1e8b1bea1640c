export type FetchedMedia = {
  path: string;
  sizeBytes: number;
  contentType?: string;
  attempts: number;
};

export type FetchRequest = {
  jobId: string;
  referer?: string;
};

export interface MediaFetcher {
  /**
   * Downloads `url` into the job's private work directory. Never writes into the downloads directory.
   */
  fetch(url: string, request: FetchRequest): Promise<FetchedMedia>;
}
