import axios from 'axios';
import type { AxiosInstance, AxiosProxyConfig } from 'axios';
import { ConfigurationError } from '@newscheck/shared/src/utils/errors.js';
import type { FetchPageOptions, PageFetcher, PageResponse } from './types.js';

const MAX_REDIRECTS = 5;

export function toAxiosProxy(proxy: string): AxiosProxyConfig {
  let parsed: URL;
  try {
    parsed = new URL(proxy);
  } catch {
    throw new ConfigurationError(`Invalid proxy URL: ${proxy}`);
  }

  const protocol = parsed.protocol.replace(/:$/, '');
  const port = parsed.port ? Number(parsed.port) : protocol === 'https' ? 443 : 80;

  return {
    protocol,
    host: parsed.hostname,
    port,
    ...(parsed.username
      ? {
          auth: {
            username: decodeURIComponent(parsed.username),
            password: decodeURIComponent(parsed.password),
          },
        }
      : {}),
  };
}

export function createAxiosPageFetcher(http: Pick<AxiosInstance, 'get'> = axios): PageFetcher {
  return {
    async fetchPage(url: string, options: FetchPageOptions): Promise<PageResponse> {
      const response = await http.get<unknown>(url, {
        headers: { ...options.headers },
        timeout: options.timeoutMs,
        // axios's timeout does not cover a proxy that never answers CONNECT.
        signal: AbortSignal.timeout(options.timeoutMs),
        responseType: 'text',
        maxRedirects: MAX_REDIRECTS,
        validateStatus: () => true,
        ...(options.proxy ? { proxy: toAxiosProxy(options.proxy) } : {}),
      });

      const body = typeof response.data === 'string' ? response.data : '';
      return { status: response.status, body };
    },
  };
}
