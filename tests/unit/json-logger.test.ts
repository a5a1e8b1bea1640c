import { createJsonLogger } from "../../src/shared/logging/logger";

describe("createJsonLogger", () => {
  it("writes one JSON object per line to the matching console method", () => {
    const sink = { log: jest.fn(), warn: jest.fn(), error: jest.fn() };
    const logger = createJsonLogger(sink);

    logger.info("job.queued", { jobId: "job-1", queueDepth: 3 });
    logger.warn("fetch.retry", { attempt: 1 });
    logger.error("http.unhandled_error");

    expect(sink.log).toHaveBeenCalledWith('{"event":"job.queued","jobId":"job-1","queueDepth":3}');
    expect(sink.warn).toHaveBeenCalledWith('{"event":"fetch.retry","attempt":1}');
    expect(sink.error).toHaveBeenCalledWith('{"event":"http.unhandled_error"}');
  });
});
