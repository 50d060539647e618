export type FetchFn = (input: string | URL, init?: RequestInit) => Promise<Response>;
