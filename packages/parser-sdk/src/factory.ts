import type { Parser } from './types.js';

/**
 * Declares a platform parser. URLs are routed by comparing the lower-cased
 * host name against `manifest.host`, so the host must be non-empty and
 * lower-case.
 */
export function defineParser<T extends Parser>(parser: T): T {
  const { platform, host } = parser.manifest;
  if (host.length === 0 || host !== host.trim().toLowerCase()) {
    throw new Error(`Parser for ${platform} has an unroutable host: "${host}"`);
  }

  return parser;
}
