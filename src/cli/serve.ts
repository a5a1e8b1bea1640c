import type { EventEmitter } from "events";
import { startService, type RunningService } from "../composition/root";
import { toErrorReport } from "../core/errors/PipelineError";
import { createJsonLogger, type Logger } from "../shared/logging/logger";

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const installShutdownHandlers = (
  service: Pick<RunningService, "stop">,
  exit: (code: number) => void,
  signals: EventEmitter = process,
  logger: Logger = createJsonLogger()
) => {
  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    void service
      .stop()
      .then(() => exit(0))
      .catch((err: unknown) => {
        logger.error("service.failed", { ...toErrorReport(err, { includeStack: isDebugMode() }), signal });
        exit(1);
      });
  };

  signals.once("SIGINT", () => shutdown("SIGINT"));
  signals.once("SIGTERM", () => shutdown("SIGTERM"));
};

export const executeServeCli = async (): Promise<void> => {
  try {
    const service = await startService();
    installShutdownHandlers(service, (code) => process.exit(code));
  } catch (err) {
    createJsonLogger().error("service.failed", toErrorReport(err, { includeStack: isDebugMode() }));
    process.exit(1);
  }
};

if (require.main === module) {
  void executeServeCli();
}
