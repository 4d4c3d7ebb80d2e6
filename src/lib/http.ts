import type { FetchLike } from "../types/index.js";

const USER_AGENT = "binfetch-cli";

export interface RequestOptions {
  timeoutMs: number;
  followRedirects: boolean;
}

export interface HttpClient {
  get(url: string, options: RequestOptions): Promise<Response>;
}

function isGitHubHost(url: string): boolean {
  try {
    const host = new URL(url).hostname;
    return host === "github.com" || host.endsWith(".github.com");
  } catch {
    return false;
  }
}

export function getHeaders(url: string, githubToken?: string): Record<string, string> {
  const headers: Record<string, string> = {
    "User-Agent": USER_AGENT,
  };
  if (githubToken && isGitHubHost(url)) {
    headers["Authorization"] = `Bearer ${githubToken}`;
  }
  return headers;
}

export function createHttpClient(
  options: { githubToken?: string; fetch?: FetchLike } = {},
): HttpClient {
  const fetchImpl: FetchLike = options.fetch ?? fetch;
  return {
    get(url, { timeoutMs, followRedirects }) {
      return fetchImpl(url, {
        headers: getHeaders(url, options.githubToken),
        redirect: followRedirects ? "follow" : "manual",
        signal: AbortSignal.timeout(timeoutMs),
      });
    },
  };
}
