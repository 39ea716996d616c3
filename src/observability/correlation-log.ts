import type { Log } from "@apify/log";
import { correlationFields, getRequestContext } from "./request-context";

export type LogData = Parameters<Log["info"]>[1];
type CorrelatedLog = Pick<Log, "debug" | "info" | "warning" | "error" | "exception">;

export const withCorrelation = (data: LogData): LogData => {
  const ctx = getRequestContext();
  if (!ctx) return data;
  return { ...(data ?? {}), ...correlationFields(ctx) };
};

/**
 * Wraps the logger so every call made inside an HTTP request carries that
 * request's correlation fields. Outside a request the data passes through.
 */
export const installCorrelationLogging = (logger: CorrelatedLog, enabled: boolean): void => {
  if (!enabled) return;

  for (const method of ["debug", "info", "warning", "error"] as const) {
    const original = logger[method].bind(logger);
    logger[method] = (message: string, data?: LogData): void => {
      original(message, withCorrelation(data));
    };
  }

  const exception = logger.exception.bind(logger);
  logger.exception = (error: Error, message: string, data?: LogData): void => {
    exception(error, message, withCorrelation(data));
  };
};
