/**
 * Package registry lookups (PyPI JSON API)
 */

export interface PackageRegistry {
  /** Every version the registry has for the package; empty if it was never published */
  publishedVersions(packageName: string): Promise<string[]>;
}

export interface PypiRegistryOptions {
  url: string;
  /** Request timeout in ms */
  timeout: number;
}

export class RegistryRequestError extends Error {
  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'RegistryRequestError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function buildProjectUrl(baseUrl: string, packageName: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/pypi/${encodeURIComponent(packageName)}/json`;
}

export class PypiRegistry implements PackageRegistry {
  constructor(private readonly options: PypiRegistryOptions) {}

  async publishedVersions(packageName: string): Promise<string[]> {
    const url = buildProjectUrl(this.options.url, packageName);
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeout);

    let response: Response;
    try {
      response = await fetch(url, {
        headers: { Accept: 'application/json' },
        signal: controller.signal,
      });
    } catch (error) {
      const reason = controller.signal.aborted ? `timed out after ${this.options.timeout}ms` : String(error);
      throw new RegistryRequestError(`Registry request to ${url} failed: ${reason}`);
    } finally {
      clearTimeout(timeoutId);
    }

    if (response.status === 404) return [];
    if (!response.ok) {
      throw new RegistryRequestError(`Registry returned HTTP ${response.status} for ${url}`, response.status);
    }

    const body: unknown = await response.json();
    const releases = isRecord(body) ? body['releases'] : undefined;
    if (!isRecord(releases)) {
      throw new RegistryRequestError(`Registry response for ${url} has no releases`);
    }
    return Object.keys(releases);
  }
}
