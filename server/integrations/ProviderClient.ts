import { PlatformError } from '../errors';
import { getErrorMessage } from '../types/common';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';

export interface APIResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  statusCode?: number;
}

export class ProviderRequestError extends PlatformError {
  constructor(
    message: string,
    public readonly remoteStatus: number,
    options?: { cause?: unknown }
  ) {
    super(message, 'PROVIDER_REQUEST_FAILED', 502, options);
    this.name = 'ProviderRequestError';
  }
}

/**
 * Thin JSON-over-HTTP client for third-party provider APIs, authenticated
 * with a bearer token handed out by the Token Vault.
 */
export class ProviderClient {
  constructor(
    private readonly baseURL: string,
    private readonly accessToken: string,
    private readonly fetchImpl: typeof fetch = fetch,
    private readonly extraHeaders: Record<string, string> = {}
  ) {}

  get(endpoint: string): Promise<APIResponse> {
    return this.makeRequest('GET', endpoint);
  }

  post(endpoint: string, data?: unknown): Promise<APIResponse> {
    return this.makeRequest('POST', endpoint, data);
  }

  async makeRequest(method: HttpMethod, endpoint: string, data?: unknown): Promise<APIResponse> {
    const url = this.buildRequestUrl(endpoint);
    try {
      const response = await this.fetchImpl(url, {
        method,
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
          'User-Agent': 'Conduit-Platform/1.0',
          Authorization: `Bearer ${this.accessToken}`,
          ...this.extraHeaders,
        },
        body: data === undefined ? undefined : JSON.stringify(data),
      });

      const responseText = await response.text();
      let responseData: unknown = null;
      try {
        responseData = responseText ? JSON.parse(responseText) : null;
      } catch {
        responseData = responseText;
      }

      if (!response.ok) {
        return {
          success: false,
          error: `HTTP ${response.status}: ${response.statusText}`,
          statusCode: response.status,
          data: responseData,
        };
      }

      return { success: true, data: responseData, statusCode: response.status };
    } catch (error) {
      return { success: false, error: getErrorMessage(error), statusCode: 0 };
    }
  }

  private buildRequestUrl(endpoint: string): string {
    if (/^https?:\/\//i.test(endpoint)) {
      return endpoint;
    }
    if (endpoint.startsWith('/') && this.baseURL.endsWith('/')) {
      return `${this.baseURL}${endpoint.slice(1)}`;
    }
    if (endpoint.startsWith('/') || this.baseURL.endsWith('/')) {
      return `${this.baseURL}${endpoint}`;
    }
    return `${this.baseURL}/${endpoint}`;
  }
}
