/**
 * Absolute URL for a Location header, or the bare path when the request
 * carried no Host header
 */
export function resourceLocation(protocol: string, host: string | undefined, path: string): string {
  return host ? `${protocol}://${host}${path}` : path;
}
