/** Strips trailing slashes so `${base}/api/...` never produces `//api`. */
export function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.trim().replace(/\/+$/, "");
}

export function resolveApiUrl(baseUrl: string): string {
  return `${normalizeBaseUrl(baseUrl)}/api`;
}
