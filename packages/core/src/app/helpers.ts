export function normalizePath(base: string, path: string): string {
  if (base === "/" || base === "") {
    return path.startsWith("/") ? path : `/${path}`;
  }
  const normalizedBase = base.endsWith("/") ? base.slice(0, -1) : base;
  const normalizedPath = path.startsWith("/") ? path : `/${path}`;
  return normalizedPath === "/"
    ? normalizedBase
    : `${normalizedBase}${normalizedPath}`;
}

/**
 * Pathname of an absolute URL string, without parsing the whole URL.
 */
export function extractPathname(url: string): string {
  const schemeEnd = url.indexOf("://");
  if (schemeEnd === -1) return "/";

  const pathStart = url.indexOf("/", schemeEnd + 3);
  if (pathStart === -1) return "/";

  let pathEnd = url.indexOf("?", pathStart);
  if (pathEnd === -1) pathEnd = url.indexOf("#", pathStart);
  if (pathEnd === -1) pathEnd = url.length;
  return url.slice(pathStart, pathEnd);
}

function decodeSegment(value: string): string {
  if (!value.includes("%")) return value;
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

export function decodeParams(
  params: Record<string, string>,
): Record<string, string> {
  const decoded: Record<string, string> = Object.create(null);
  for (const key in params) {
    decoded[key] = decodeSegment(params[key]);
  }
  return decoded;
}
