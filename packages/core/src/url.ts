/**
 * URL helpers for cluster routing.
 *
 * Discovery returns bare `host:port` addresses. Scheme and credentials are
 * configured once on the seed URL, so every discovered address is merged
 * onto the parsed seed URL before a connection is opened.
 */

export interface UrlComponents {
  scheme?: string;
  user?: string;
  pass?: string;
  host?: string;
  port?: number;
  path?: string;
  query?: string;
  fragment?: string;
}

const URL_COMPONENT_KEYS: readonly (keyof UrlComponents)[] = [
  'scheme',
  'user',
  'pass',
  'host',
  'port',
  'path',
  'query',
  'fragment',
];

// RFC 3986, appendix B
const URL_PATTERN = /^(?:([^:/?#]+):)?(?:\/\/([^/?#]*))?([^?#]*)(?:\?([^#]*))?(?:#(.*))?$/;
const SCHEME_PREFIX = /^[A-Za-z][A-Za-z0-9+.-]*:\/\//;
const PORT_PATTERN = /^\d+$/;

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

function parseAuthority(authority: string, into: UrlComponents): void {
  let hostPort = authority;

  const at = authority.lastIndexOf('@');
  if (at >= 0) {
    const userInfo = authority.slice(0, at);
    hostPort = authority.slice(at + 1);
    const colon = userInfo.indexOf(':');
    if (colon >= 0) {
      into.user = nonEmpty(userInfo.slice(0, colon));
      into.pass = nonEmpty(userInfo.slice(colon + 1));
    } else {
      into.user = nonEmpty(userInfo);
    }
  }

  let host = hostPort;
  let port: string | undefined;

  if (hostPort.startsWith('[')) {
    // IPv6 literal keeps its brackets
    const close = hostPort.indexOf(']');
    if (close >= 0) {
      host = hostPort.slice(0, close + 1);
      const rest = hostPort.slice(close + 1);
      if (rest.startsWith(':')) {
        port = rest.slice(1);
      }
    }
  } else {
    const colon = hostPort.lastIndexOf(':');
    if (colon >= 0 && PORT_PATTERN.test(hostPort.slice(colon + 1))) {
      host = hostPort.slice(0, colon);
      port = hostPort.slice(colon + 1);
    }
  }

  into.host = nonEmpty(host);
  if (port !== undefined && PORT_PATTERN.test(port)) {
    into.port = Number(port);
  }
}

/**
 * Split a URL into its components. Components that are absent or empty are
 * left undefined.
 *
 * An input without a scheme and without a leading slash is read as an
 * authority, so `host2:9999` yields host `host2` and port `9999`.
 */
export function parseUrl(url: string): UrlComponents {
  let input = url.trim();
  if (!SCHEME_PREFIX.test(input) && !input.startsWith('/')) {
    input = `//${input}`;
  }

  const match = URL_PATTERN.exec(input);
  const components: UrlComponents = {};
  if (!match) {
    return components;
  }

  const [, scheme, authority, path, query, fragment] = match;

  components.scheme = nonEmpty(scheme);
  if (authority !== undefined) {
    parseAuthority(authority, components);
  }
  components.path = nonEmpty(path);
  components.query = nonEmpty(query);
  components.fragment = nonEmpty(fragment);

  for (const key of URL_COMPONENT_KEYS) {
    if (components[key] === undefined) {
      delete components[key];
    }
  }

  return components;
}

/**
 * Assemble a URL string from its components, emitting each segment only when
 * its value is present.
 */
export function formatUrl(parts: UrlComponents): string {
  const hasUser = parts.user !== undefined;
  const hasAuthority = hasUser || parts.host !== undefined;

  return (
    (parts.scheme !== undefined ? `${parts.scheme}:` : '') +
    (hasAuthority ? '//' : '') +
    (parts.user ?? '') +
    (parts.pass !== undefined ? `:${parts.pass}` : '') +
    (hasUser ? '@' : '') +
    (parts.host ?? '') +
    (parts.port !== undefined ? `:${parts.port}` : '') +
    (parts.path ?? '') +
    (parts.query !== undefined ? `?${parts.query}` : '') +
    (parts.fragment !== undefined ? `#${parts.fragment}` : '')
  );
}

/**
 * Merge a discovered address onto a base URL. Each component of the address
 * wins over the base; base components fill in whatever the address omits.
 */
export function rebuildUrl(base: UrlComponents | string, address: string): string {
  const baseParts = typeof base === 'string' ? parseUrl(base) : base;
  const addressParts = parseUrl(address);

  const merged: UrlComponents = {};
  for (const key of URL_COMPONENT_KEYS) {
    mergeComponent(merged, key, addressParts, baseParts);
  }

  return formatUrl(merged);
}

function mergeComponent<K extends keyof UrlComponents>(
  target: UrlComponents,
  key: K,
  preferred: UrlComponents,
  fallback: UrlComponents
): void {
  const value = preferred[key] ?? fallback[key];
  if (value !== undefined) {
    target[key] = value;
  }
}
