export interface FetchPageOptions {
  readonly proxy?: string;
  readonly timeoutMs: number;
  readonly headers: Readonly<Record<string, string>>;
}

export interface PageResponse {
  readonly status: number;
  readonly body: string;
}

/**
 * Resolves with the response whatever its status; rejects only on transport
 * failures (timeout, refused connection, bad proxy).
 */
export interface PageFetcher {
  fetchPage(url: string, options: FetchPageOptions): Promise<PageResponse>;
}
