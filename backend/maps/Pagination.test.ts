import { collectPages, type Page } from './Pagination';

test('collectPages stops when no token comes back', async () => {
  const fetchPage = jest.fn(async (token: string | undefined): Promise<Page<number>> =>
    token ? { items: [3] } : { items: [1, 2], nextToken: 'next' },
  );
  const sleep = jest.fn(async () => undefined);

  expect(await collectPages({ fetchPage, maxPages: 5, delayMs: 10, sleep })).toEqual([1, 2, 3]);
  expect(fetchPage).toHaveBeenCalledTimes(2);
  expect(sleep).toHaveBeenCalledTimes(1);
});

test('collectPages stops at maxPages', async () => {
  const fetchPage = jest.fn(async (): Promise<Page<string>> => ({ items: ['x'], nextToken: 'more' }));
  const sleep = jest.fn(async () => undefined);

  expect(await collectPages({ fetchPage, maxPages: 3, delayMs: 10, sleep })).toEqual(['x', 'x', 'x']);
  expect(fetchPage).toHaveBeenCalledTimes(3);
  expect(sleep).toHaveBeenCalledTimes(2);
});

test('collectPages never waits before the first page', async () => {
  const sleep = jest.fn(async () => undefined);
  await collectPages({ fetchPage: async () => ({ items: [] }), maxPages: 3, delayMs: 10, sleep });
  expect(sleep).not.toHaveBeenCalled();
});

test('collectPages keeps earlier pages when a later page ends the chain', async () => {
  const fetchPage = jest.fn(async (token: string | undefined): Promise<Page<number>> => {
    if (token) throw new Error('INVALID_REQUEST');
    return { items: [1, 2], nextToken: 'next' };
  });
  const endsChain = jest.fn(() => true);

  expect(await collectPages({ fetchPage, maxPages: 3, delayMs: 0, sleep: async () => undefined, endsChain })).toEqual([1, 2]);
  expect(endsChain).toHaveBeenCalledTimes(1);
});

test('collectPages rethrows a first-page failure even when it would end the chain', async () => {
  const fetchPage = async (): Promise<Page<number>> => {
    throw new Error('REQUEST_DENIED');
  };

  await expect(collectPages({ fetchPage, maxPages: 3, delayMs: 0, endsChain: () => true })).rejects.toThrow(
    'REQUEST_DENIED',
  );
});
