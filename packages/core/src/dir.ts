import fs from "node:fs";
import path from "node:path";
import type { PlatformPath } from "node:path";

export type DirPresence = "present" | "absent" | "unknown";

const DIR_MODE = 0o755;

const isMissingFileError = (error: unknown) =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Joins the non-empty segments and drops a trailing separator. Returns "" when
 * every segment is empty, so an unresolved base never turns into ".".
 */
export const joinPath = (pathApi: PlatformPath, ...segments: string[]) => {
  const parts = segments.filter((segment) => segment.length > 0);
  if (parts.length === 0) {
    return "";
  }
  const joined = pathApi.join(...parts);
  const { root } = pathApi.parse(joined);
  if (joined.length > root.length && joined.endsWith(pathApi.sep)) {
    return joined.slice(0, -pathApi.sep.length);
  }
  return joined;
};

/**
 * Immutable filesystem path. An empty path stands for a directory that could
 * not be resolved. Nothing here touches the filesystem except `probe`,
 * `exists` and `create`.
 *
 * `append` and `split` use the path flavour given at construction (the host's
 * by default), so a value built for win32 keeps backslashes on any host.
 */
export class Dir {
  readonly path: string;
  private readonly pathApi: PlatformPath;

  constructor(targetPath: string, pathApi: PlatformPath = path) {
    this.path = targetPath;
    this.pathApi = pathApi;
  }

  isEmpty() {
    return this.path.length === 0;
  }

  /**
   * Stats the path. `unknown` means stat failed for a reason other than the
   * entry being missing, e.g. a parent directory without search permission.
   */
  probe(): DirPresence {
    try {
      fs.statSync(this.path);
      return "present";
    } catch (error) {
      return isMissingFileError(error) ? "absent" : "unknown";
    }
  }

  /** True unless the entry is confirmed missing. */
  exists() {
    return this.probe() !== "absent";
  }

  /** Creates the directory and missing ancestors. Filesystem errors are thrown as-is. */
  create() {
    fs.mkdirSync(this.path, { recursive: true, mode: DIR_MODE });
  }

  append(segment: string) {
    return new Dir(joinPath(this.pathApi, this.path, segment), this.pathApi);
  }

  split(): string[] {
    const segments = this.path.split(this.pathApi.sep);
    if (segments[0] === "") {
      segments.shift();
    }
    if (segments.length > 0 && segments[segments.length - 1] === "") {
      segments.pop();
    }
    return segments;
  }

  toString() {
    return this.path;
  }

  toJSON() {
    return this.path;
  }
}
