import type { Middleware, RequestContext } from "./types.js";

/**
 * Terminal handler that performs the network call with the global fetch.
 */
export class FetchHandler implements Middleware {
  async execute(context: RequestContext): Promise<void> {
    const signal =
      context.timeoutMs !== undefined ? AbortSignal.timeout(context.timeoutMs) : undefined;
    context.response = await fetch(context.url, { ...context.init, signal });
  }

  setNext(_next: Middleware): void {
    throw new Error("FetchHandler must be the last element of the chain");
  }
}
