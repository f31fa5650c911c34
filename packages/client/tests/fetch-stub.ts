import { vi } from 'vitest';

export function stubFetch(status: number, body: unknown) {
  return vi.fn(
    async (_input: string | URL | Request, _init?: RequestInit) =>
      new Response(typeof body === 'string' || body === null ? body : JSON.stringify(body), { status }),
  );
}

export type FetchStub = ReturnType<typeof stubFetch>;

export function requestedUrl(fetchMock: FetchStub, call = 0): URL {
  const args = fetchMock.mock.calls[call];
  if (!args) {
    throw new Error(`fetch was called ${fetchMock.mock.calls.length} time(s)`);
  }

  return new URL(String(args[0]));
}
