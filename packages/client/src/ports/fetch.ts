/**
 * The HTTP doer: anything shaped like the global `fetch`, such as a Hono app's
 * `request` for in-process calls.
 */
export type FetchFn = (url: string, init: RequestInit) => Promise<Response>
