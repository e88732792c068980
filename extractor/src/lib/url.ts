const TRACKING_PARAM_PATTERN =
  /^(utm_|fbclid$|gclid$|mc_cid$|mc_eid$|spm$|scm$|pdp_|algo_|aff_|sk$|terminal_id$|gatewayadapt$|_randl_|ref_?$|pd_rd_|pf_rd_|qid$|sr$|crid$|sprefix$|dib|content-id$|srsltid$)/i;
const SHOPIFY_LOCALE_PRODUCT_PATH_PATTERN = /^\/(?:[a-z]{2}(?:-[a-z]{2})?|undefined-undefined)\/(products?\/.+)$/i;
const SHOPIFY_PRODUCT_PATH_PATTERN = /^((?:\/[a-z]{2}(?:-[a-z]{2})?)?(?:\/collections\/[^/]+)?)\/products\/([^/?#]+)/i;

export function isHttpUrl(parsed: URL): boolean {
  return parsed.protocol === "http:" || parsed.protocol === "https:";
}

/**
 * Resolves `input` (absolute, relative or protocol-relative) against `base` and
 * returns it only when the result is http(s).
 */
export function resolveUrl(input: string, base?: string): string | null {
  const trimmed = input.trim();
  if (!trimmed || trimmed.startsWith("data:") || trimmed.startsWith("javascript:")) {
    return null;
  }
  try {
    const parsed = base ? new URL(trimmed, base) : new URL(trimmed);
    return isHttpUrl(parsed) ? parsed.toString() : null;
  } catch {
    return null;
  }
}

export function canonicalizeUrl(input: string, base?: string): string | null {
  let parsed: URL;

  try {
    parsed = base ? new URL(input, base) : new URL(input);
  } catch {
    return null;
  }

  if (!isHttpUrl(parsed)) {
    return null;
  }

  parsed.hash = "";
  parsed.hostname = parsed.hostname.toLowerCase();

  if ((parsed.protocol === "http:" && parsed.port === "80") || (parsed.protocol === "https:" && parsed.port === "443")) {
    parsed.port = "";
  }

  const keptParams: Array<[string, string]> = [];
  for (const [key, value] of parsed.searchParams.entries()) {
    if (!TRACKING_PARAM_PATTERN.test(key)) {
      keptParams.push([key, value]);
    }
  }

  keptParams.sort(([aKey, aValue], [bKey, bValue]) => {
    if (aKey === bKey) {
      return aValue.localeCompare(bValue);
    }
    return aKey.localeCompare(bKey);
  });

  parsed.search = "";
  for (const [key, value] of keptParams) {
    parsed.searchParams.append(key, value);
  }

  let pathname = parsed.pathname.replace(/\/+/g, "/");
  if (pathname !== "/") {
    pathname = pathname.replace(/\/+$/, "");
  }
  const localeProductMatch = pathname.match(SHOPIFY_LOCALE_PRODUCT_PATH_PATTERN);
  if (localeProductMatch) {
    pathname = `/${localeProductMatch[1]}`;
  }
  parsed.pathname = pathname;

  return parsed.toString();
}

export interface ShopifyProductPath {
  /** Locale and/or collection prefix kept in front of `/products/`, e.g. `/en-ca`. */
  prefix: string;
  handle: string;
}

export function shopifyProductPath(input: string): ShopifyProductPath | null {
  let parsed: URL;
  try {
    parsed = new URL(input);
  } catch {
    return null;
  }
  const match = parsed.pathname.match(SHOPIFY_PRODUCT_PATH_PATTERN);
  if (!match) {
    return null;
  }
  let handle: string;
  try {
    handle = decodeURIComponent(match[2]).replace(/\.(?:json|js)$/i, "");
  } catch {
    // Malformed escape such as `100%-cotton`.
    return null;
  }
  if (!handle) {
    return null;
  }
  const prefix = match[1].replace(/\/collections\/[^/]+$/i, "");
  return { prefix, handle };
}

export function queryParam(input: string, ...names: string[]): string | undefined {
  try {
    const parsed = new URL(input);
    for (const name of names) {
      const value = parsed.searchParams.get(name)?.trim();
      if (value) {
        return value;
      }
    }
  } catch {
    return undefined;
  }
  return undefined;
}
