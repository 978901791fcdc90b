export type LogData = Record<string, unknown>;

type LogMethod = (message: string, data?: LogData) => void;

/** The part of the Apify `log` instance the patches below rewrite in place. */
export interface PatchableLog {
  debug: LogMethod;
  info: LogMethod;
  warning: LogMethod;
  error: LogMethod;
  exception: (exception: Error, message: string, data?: LogData) => void;
}

const MESSAGE_METHODS = ["debug", "info", "warning", "error"] as const;

/** Rewrites the data argument of every log method; existing imports of `log` see the change. */
export const patchLogData = (target: PatchableLog, transform: (data: LogData | undefined) => LogData | undefined): void => {
  for (const method of MESSAGE_METHODS) {
    const original = target[method].bind(target);
    target[method] = (message, data) => {
      original(message, transform(data));
    };
  }

  const exception = target.exception.bind(target);
  target.exception = (error, message, data) => {
    exception(error, message, transform(data));
  };
};
