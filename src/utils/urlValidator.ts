export function isHttpUrl(input: string): boolean {
  try {
    const u = new URL(input);
    return u.protocol === 'http:' || u.protocol === 'https:';
  } catch {
    return false;
  }
}

/** Resolves `href` against `base`; undefined when the result is not a valid URL. */
export function resolveUrl(href: string, base: string): string | undefined {
  try {
    return new URL(href, base).toString();
  } catch {
    return undefined;
  }
}

/** Host (including port) of a URL, lower-cased; undefined for unparsable input. */
export function hostOf(input: string): string | undefined {
  try {
    return new URL(input).host.toLowerCase();
  } catch {
    return undefined;
  }
}

export function isSameHost(url: string, host: string): boolean {
  return hostOf(url) === host.toLowerCase();
}
