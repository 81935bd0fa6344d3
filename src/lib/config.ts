/** Positive integer from an env value, or the fallback when unset or malformed. */
export function intFromEnv(raw: string | undefined, fallback: number): number {
  const value = parseInt(raw || "", 10);
  return isNaN(value) || value <= 0 ? fallback : value;
}

export const config = {
  baseUrl: process.env.BOOKS_BASE_URL || "https://books.toscrape.com/catalogue/",
  timeoutMs: intFromEnv(process.env.BOOKS_TIMEOUT_MS, 15000),
  maxConnections: intFromEnv(process.env.BOOKS_MAX_CONNECTIONS, 1),
  keepAliveTimeoutMs: intFromEnv(process.env.BOOKS_KEEP_ALIVE_MS, 4000),
  userAgents: [
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.2 Safari/605.1.15",
    "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  ],
  getRandomUserAgent(): string {
    return this.userAgents[Math.floor(Math.random() * this.userAgents.length)];
  },
  getProxyUrl(): string | undefined {
    return (
      process.env.HTTPS_PROXY ||
      process.env.https_proxy ||
      process.env.HTTP_PROXY ||
      process.env.http_proxy ||
      undefined
    );
  },
};
