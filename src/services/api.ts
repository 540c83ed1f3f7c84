import { DecodeError, FetchError } from './errors';

export const DATA_URL =
  import.meta.env.VITE_DATA_URL || 'https://www.ag-grid.com/example-assets/master-detail-data.json';

function assertAbsoluteUrl(url: string): void {
  try {
    new URL(url);
  } catch {
    throw new FetchError(0, url, `Invalid absolute URL: ${url}`);
  }
}

async function handleResponse(url: string, response: Response): Promise<unknown> {
  if (!response.ok) {
    const error = await response.text();
    console.error(`API Error: ${response.status} ${response.statusText}`, error);
    throw new FetchError(response.status, url, error || response.statusText, response.statusText);
  }

  const body = await response.text();
  try {
    return JSON.parse(body);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    console.error(`Malformed JSON from ${url}:`, reason);
    throw new DecodeError(url, `Response from ${url} is not valid JSON: ${reason}`);
  }
}

export const api = {
  /**
   * Single GET attempt; no retries. The decoded tree is returned untyped and
   * is expected to go through `normalize`.
   */
  async fetchJson(url: string): Promise<unknown> {
    assertAbsoluteUrl(url);

    let response: Response;
    try {
      console.log(`Making API request to: ${url}`);
      response = await fetch(url, {
        method: 'GET',
        headers: {
          Accept: 'application/json',
        },
      });
    } catch (error) {
      console.error('Network error in fetchJson:', error);
      const reason = error instanceof Error ? error.message : String(error);
      throw new FetchError(0, url, `Network error: ${reason}`);
    }
    return handleResponse(url, response);
  },
};
