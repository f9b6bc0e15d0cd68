const AUTHENTICATED_SCHEMES = new Set(["http:", "https:"]);

/**
 * Parses a repository URL. Throws a TypeError for anything the WHATWG URL
 * parser rejects, including scp-style `git@host:path` addresses.
 */
export function parseRepoUrl(raw: string): URL {
  return new URL(raw.trim());
}

/**
 * Returns a copy of `url` with `username:secret@` in its authority.
 *
 * URLs that already carry a username, and non-HTTP(S) URLs, come back as an
 * unmodified copy, so applying this twice never double-embeds.
 */
export function withCredentials(url: URL, username: string, secret: string): URL {
  const result = new URL(url.href);
  if (!AUTHENTICATED_SCHEMES.has(result.protocol) || result.username !== "") {
    return result;
  }
  result.username = username;
  result.password = secret;
  return result;
}

export function stripCredentials(url: URL): URL {
  const result = new URL(url.href);
  result.username = "";
  result.password = "";
  return result;
}

/**
 * Masks the userinfo of every URL found in `text`. Git error output quotes
 * the remote URL verbatim, secrets included.
 */
export function redactCredentials(text: string): string {
  return text.replace(/(\/\/)[^/@\s'"]+@/g, "$1***@");
}
