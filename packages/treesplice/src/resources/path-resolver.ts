import type { ResourceId } from "../types.js";

const URI_SCHEME = /^[A-Za-z][A-Za-z0-9+.-]*:/;

/**
 * Path-style resolution of a directive reference against the id of the
 * resource that contains it.
 *
 *   resolveResourceId("util.txt", "lib/main.txt")    → "lib/util.txt"
 *   resolveResourceId("../x", "a/b/c")               → "a/x"
 *   resolveResourceId("/shared/x", "a/b")            → "/shared/x"
 *   resolveResourceId("domain:lib/x", "a/b")         → "domain:lib/x"
 *
 * `..` never climbs above the root. Blank references resolve to "".
 */
export function resolveResourceId(reference: string, contextId?: ResourceId): ResourceId {
  if (reference.trim() === "") return "";
  if (URI_SCHEME.test(reference)) return reference;

  const path = toSlashes(reference);
  const rooted = path.startsWith("/");
  if (rooted || contextId === undefined) return normalize(path, rooted);

  const baseDir = directoryOf(toSlashes(contextId));
  return normalize(baseDir === "" ? path : `${baseDir}/${path}`, false);
}

function toSlashes(path: string): string {
  return path.replace(/\\/g, "/");
}

function directoryOf(path: string): string {
  const slash = path.lastIndexOf("/");
  return slash === -1 ? "" : path.slice(0, slash);
}

function normalize(path: string, rooted: boolean): string {
  const segments: string[] = [];
  for (const segment of path.split("/")) {
    if (segment === "" || segment === ".") continue;
    if (segment === "..") segments.pop();
    else segments.push(segment);
  }
  const joined = segments.join("/");
  return rooted ? `/${joined}` : joined;
}
