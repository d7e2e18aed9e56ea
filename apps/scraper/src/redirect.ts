/**
 * A posting that redirects to a shorter path on the same host (typically the
 * company's board index) is treated as closed. Cross-host redirects and
 * unparseable URLs are not.
 */
export function isClosedByRedirect(requestedUrl: string, finalUrl: string): boolean {
  let requested: URL;
  let final: URL;
  try {
    requested = new URL(requestedUrl);
    final = new URL(finalUrl);
  } catch {
    return false;
  }

  return requested.host === final.host && final.pathname.length < requested.pathname.length;
}
