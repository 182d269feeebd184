/** One line per upstream request, written as JSON. */
export interface RequestLogEntry {
  api: string;
  endpoint: string;
  ms: number;
  ok: boolean;
  status?: number;
  error?: string;
}

export type LogSink = (line: string) => void;

/** stderr keeps stdout free for callers that pipe results. */
export const stderrSink: LogSink = (line) => console.error(line);

/**
 * Wrap a request function so each call is timed and logged, success or
 * failure. Errors are rethrown unchanged after logging.
 */
export function withRequestLogging<A extends unknown[], R>(
  api: string,
  endpoint: string,
  sink: LogSink | null,
  fn: (...args: A) => Promise<R>,
  statusOf: (err: unknown) => number | undefined = () => undefined
): (...args: A) => Promise<R> {
  if (!sink) return fn;

  return async (...args: A): Promise<R> => {
    const start = performance.now();
    try {
      const result = await fn(...args);
      const ms = Math.round(performance.now() - start);
      sink(JSON.stringify({ api, endpoint, ms, ok: true } satisfies RequestLogEntry));
      return result;
    } catch (err) {
      const ms = Math.round(performance.now() - start);
      const error = err instanceof Error ? err.message : String(err);
      const status = statusOf(err);
      const entry: RequestLogEntry = { api, endpoint, ms, ok: false, ...(status !== undefined && { status }), error };
      sink(JSON.stringify(entry));
      throw err;
    }
  };
}
