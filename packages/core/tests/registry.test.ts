import { describe, it, expect, vi, afterEach } from 'vitest';
import { PypiRegistry, RegistryRequestError, buildProjectUrl } from '../src/registry.js';

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('PypiRegistry', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
    vi.useRealTimers();
  });

  it('lists the release keys of the project', async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      jsonResponse(200, { info: { name: 'sample-dist' }, releases: { '1.2.2': [], '1.2.3': [] } })
    );
    vi.stubGlobal('fetch', fetchMock);

    const registry = new PypiRegistry({ url: 'https://pypi.org/', timeout: 2000 });

    await expect(registry.publishedVersions('sample-dist')).resolves.toEqual(['1.2.2', '1.2.3']);
    expect(fetchMock).toHaveBeenCalledWith(
      'https://pypi.org/pypi/sample-dist/json',
      expect.objectContaining({
        headers: { Accept: 'application/json' },
        signal: expect.any(AbortSignal),
      })
    );
  });

  it('treats 404 as never published', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse(404, { message: 'Not Found' })));

    const registry = new PypiRegistry({ url: 'https://pypi.org', timeout: 2000 });
    await expect(registry.publishedVersions('brand-new')).resolves.toEqual([]);
  });

  it('fails on other HTTP errors', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse(503, {})));

    const registry = new PypiRegistry({ url: 'https://pypi.org', timeout: 2000 });
    await expect(registry.publishedVersions('sample-dist')).rejects.toMatchObject({
      name: 'RegistryRequestError',
      status: 503,
    });
  });

  it('fails when the body has no releases', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse(200, { info: {} })));

    const registry = new PypiRegistry({ url: 'https://pypi.org', timeout: 2000 });
    await expect(registry.publishedVersions('sample-dist')).rejects.toBeInstanceOf(RegistryRequestError);
  });

  it('times out slow requests', async () => {
    vi.useFakeTimers();
    vi.stubGlobal(
      'fetch',
      vi.fn().mockImplementation((_url: string, init: RequestInit) => {
        return new Promise((_resolve, reject) => {
          init.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        });
      })
    );

    const registry = new PypiRegistry({ url: 'https://pypi.org', timeout: 50 });
    const promise = registry.publishedVersions('sample-dist');
    const assertion = expect(promise).rejects.toThrow('timed out after 50ms');

    await vi.advanceTimersByTimeAsync(60);
    await assertion;
  });
});

describe('buildProjectUrl', () => {
  it('encodes the package name', () => {
    expect(buildProjectUrl('https://test.pypi.org', 'a b')).toBe('https://test.pypi.org/pypi/a%20b/json');
  });
});
