/**
 * Header block replayed when the CLI is run without a file
 */
export const SAMPLE_HEADER_BLOCK = [
  "GET /",
  "host: www.website.com",
  "accept: text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "sec-fetch-site: none",
  "accept-encoding: gzip, deflate, br",
  "sec-fetch-mode: navigate",
  "user-agent: Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.6 Safari/605.1.15",
  "accept-language: en-GB,en;q=0.9",
  "sec-fetch-dest: document",
  "cookie: shop_session_4f1c2a=6%7C%7C10c097ef4212a;",
].join("\n");
