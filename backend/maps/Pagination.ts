// Continuation-token pagination used by upstream search APIs.
// Fetch a page, append, and if a token came back wait a fixed delay before asking for the next one.
// Stops at `maxPages` or when no token is returned, whichever comes first.
// A failure on a later page that `endsChain` accepts closes the chain and keeps what was collected;
// the first page always propagates its errors.

export type Page<T> = Readonly<{
  items: readonly T[];
  nextToken?: string;
}>;

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export async function collectPages<T>(args: {
  readonly fetchPage: (token: string | undefined) => Promise<Page<T>>;
  readonly maxPages: number;
  readonly delayMs: number;
  readonly sleep?: Sleep;
  readonly endsChain?: (err: unknown) => boolean;
}): Promise<T[]> {
  const wait = args.sleep ?? sleep;
  const items: T[] = [];

  let token: string | undefined;
  for (let page = 0; page < args.maxPages; page++) {
    if (token) await wait(args.delayMs);

    let result: Page<T>;
    try {
      result = await args.fetchPage(token);
    } catch (err) {
      if (page > 0 && args.endsChain?.(err)) break;
      throw err;
    }
    items.push(...result.items);

    token = result.nextToken;
    if (!token) break;
  }

  return items;
}
