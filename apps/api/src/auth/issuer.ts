const STS_ISSUER_HOST = "sts.windows.net";

function parseUrl(value: string) {
  try {
    return new URL(value);
  } catch {
    return null;
  }
}

/**
 * Extracts the tenant id from an Entra ID issuer. Accepts the v2.0 form under
 * the configured authority host and the v1.0 `sts.windows.net` form.
 */
export function tenantFromIssuer(issuer: string, authorityHost: string): string | null {
  const url = parseUrl(issuer.trim());
  const authority = parseUrl(authorityHost);
  if (!url || !authority || url.protocol !== "https:" || url.search || url.hash) {
    return null;
  }

  if (url.host === authority.host) {
    const match = url.pathname.match(/^\/([A-Za-z0-9.-]+)\/v2\.0\/?$/u);
    return match?.[1] ?? null;
  }

  if (url.host === STS_ISSUER_HOST) {
    const match = url.pathname.match(/^\/([A-Za-z0-9.-]+)\/?$/u);
    return match?.[1] ?? null;
  }

  return null;
}

export function buildAcceptedIssuers(tenantId: string, authorityHost: string): string[] {
  const host = authorityHost.replace(/\/+$/u, "");
  return [`${host}/${tenantId}/v2.0`, `https://${STS_ISSUER_HOST}/${tenantId}/`];
}
