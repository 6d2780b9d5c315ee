/**
 * Per-request state passed down the HTTP middleware chain.
 * The terminal handler fills in `response`.
 */
export interface RequestContext {
  /** Human-readable vendor name, used in logs and error messages. */
  readonly service: string;
  readonly url: URL;
  readonly init: RequestInit;
  /** Aborts the fetch after this many milliseconds; transport default when unset. */
  readonly timeoutMs?: number;
  /** Identifies the addressed resource for 404 mapping. */
  readonly resource?: { type: string; id: string };
  response?: Response;
}

export interface Middleware {
  execute(context: RequestContext): Promise<void>;
  setNext(next: Middleware): void;
}
