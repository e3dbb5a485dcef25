import path from "path";
import { InvalidReferenceError } from "./errors";

const SCHEME = /^[a-z][a-z0-9+.-]*:/i;

function looksLikeFileName(component: string): boolean {
  return component.includes(".");
}

function isFilesystemPath(base: string): boolean {
  return base.startsWith("/") || /^[a-z]:[\\/]/i.test(base);
}

function filesystemDirectory(base: string): string {
  const normalized = base.replace(/\\/g, "/");
  if (normalized.endsWith("/")) {
    return normalized;
  }
  const last = normalized.slice(normalized.lastIndexOf("/") + 1);
  if (looksLikeFileName(last)) {
    return path.posix.dirname(normalized).replace(/\/?$/, "/");
  }
  return normalized + "/";
}

function directoryUrl(base: URL): URL {
  const dir = new URL(base.toString());
  const last = dir.pathname.slice(dir.pathname.lastIndexOf("/") + 1);
  if (last !== "" && !looksLikeFileName(last)) {
    dir.pathname = dir.pathname + "/";
  }
  return dir;
}

/**
 * Resolves a playlist reference (segment, key or variant URI) against the
 * playlist it was found in. Absolute references come back untouched.
 */
export function resolveUrl(reference: string, base: string): string {
  const ref = reference.trim();
  if (ref === "") {
    throw new InvalidReferenceError(`Cannot resolve an empty reference against ${base}`);
  }
  if (ref.startsWith("//")) {
    const m = base.match(SCHEME);
    const scheme = m && !isFilesystemPath(base) ? m[0] : "https:";
    return scheme + ref;
  }
  if (SCHEME.test(ref) && !/^[a-z]:[\\/]/i.test(ref)) {
    return ref;
  }

  if (isFilesystemPath(base)) {
    if (isFilesystemPath(ref)) {
      return ref;
    }
    return path.posix.join(filesystemDirectory(base), ref.replace(/\\/g, "/"));
  }

  try {
    return new URL(ref, directoryUrl(new URL(base))).toString();
  } catch (err) {
    // Not a URL we understand. Glue the strings together and hope for the best.
    const cut = base.lastIndexOf("/");
    return cut >= 0 ? base.slice(0, cut + 1) + ref : ref;
  }
}

// "https://cdn/live/index.m3u8?t=1" -> "https://cdn/live/"
export function getBaseDirectory(url: string): string {
  if (isFilesystemPath(url)) {
    return filesystemDirectory(url);
  }
  try {
    const parsed = new URL(url);
    const pathname = parsed.pathname;
    const prefix = parsed.protocol === "file:" ? "file://" : parsed.origin;
    return prefix + pathname.slice(0, pathname.lastIndexOf("/") + 1);
  } catch (err) {
    return url.slice(0, url.lastIndexOf("/") + 1);
  }
}
