// Pure HTTP utility functions

/**
 * Build URL from base URL and endpoint
 */
export const buildUrl = (baseUrl: string, endpoint: string): string => {
  const cleanBaseUrl = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;

  if (!endpoint || endpoint === '/') {
    return cleanBaseUrl;
  }

  const cleanEndpoint = endpoint.startsWith('/') ? endpoint : `/${endpoint}`;
  return `${cleanBaseUrl}${cleanEndpoint}`;
};

/**
 * Append query parameters, skipping undefined values. Values are
 * percent-encoded (pagination keys are base64 and contain `+`, `/`, `=`).
 */
export const withQuery = (endpoint: string, params: Record<string, string | undefined>): string => {
  const search = new URLSearchParams();
  for (const [name, value] of Object.entries(params)) {
    if (value !== undefined) {
      search.append(name, value);
    }
  }
  const query = search.toString();
  return query ? `${endpoint}?${query}` : endpoint;
};

/**
 * Sanitize URL for logging (remove sensitive query parameters)
 */
export const sanitizeUrl = (url: string): string => {
  try {
    const urlObj = new URL(url);
    const sensitiveParams = ['token', 'apikey', 'api_key', 'secret', 'password'];

    for (const param of sensitiveParams) {
      if (urlObj.searchParams.has(param)) {
        urlObj.searchParams.set(param, '***');
      }
    }

    return urlObj.toString();
  } catch {
    return url;
  }
};

/**
 * Calculate exponential backoff delay
 */
export const calculateExponentialBackoff = (attempt: number, baseDelayMs: number, maxDelayMs: number): number => {
  const delay = baseDelayMs * Math.pow(2, attempt - 1);
  return Math.min(delay, maxDelayMs);
};
