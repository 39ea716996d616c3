import { AsyncLocalStorage } from "node:async_hooks";

export interface RequestContext {
  request_id: string;
  trace_id: string;
  http_method: string;
  http_path: string;
  client_ip: string | null;
  client_key_present: boolean;
  client_key_id: string | null;
  /** Set once an extract body validates; null on every other route. */
  requester_id: string | null;
  source_url: string | null;
  started_at_ms: number;
}

export type CorrelationFields = Omit<RequestContext, "started_at_ms">;

const storage = new AsyncLocalStorage<RequestContext>();

export const runWithRequestContext = <T>(context: RequestContext, fn: () => T): T =>
  storage.run(context, fn);

export const getRequestContext = (): RequestContext | undefined => storage.getStore();

/** Ties the current request to the extraction it asked for. No-op outside a request. */
export const annotateExtraction = (requesterId: string, sourceUrl: string): void => {
  const ctx = storage.getStore();
  if (!ctx) return;
  ctx.requester_id = requesterId;
  ctx.source_url = sourceUrl;
};

export const correlationFields = (ctx: RequestContext): CorrelationFields => {
  const { started_at_ms: _startedAt, ...fields } = ctx;
  return fields;
};
