export type LogFields = Record<string, unknown>;

export type Logger = {
  info: (event: string, fields?: LogFields) => void;
  warn: (event: string, fields?: LogFields) => void;
  error: (event: string, fields?: LogFields) => void;
};

/**
 * One JSON object per line: `{ "event": "...", ...fields }`.
 */
export const createJsonLogger = (sink: Pick<Console, "log" | "warn" | "error"> = console): Logger => ({
  info: (event, fields = {}) => {
    sink.log(JSON.stringify({ event, ...fields }));
  },
  warn: (event, fields = {}) => {
    sink.warn(JSON.stringify({ event, ...fields }));
  },
  error: (event, fields = {}) => {
    sink.error(JSON.stringify({ event, ...fields }));
  }
});

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
