/** The subset of `fetch` the agent router depends on. */
export type HttpFetch = (input: string, init: RequestInit) => Promise<Response>;
