import path from "node:path";

import { z } from "zod";

export type EnvSource = Record<string, string | undefined>;

const envValueSchema = z.string().optional();

// Keys absent from the source stay undefined; an empty string is a set value.
export const xdgEnvironmentSchema = z.object({
  XDG_CONFIG_HOME: envValueSchema,
  XDG_CACHE_HOME: envValueSchema,
  XDG_DATA_HOME: envValueSchema,
  XDG_STATE_HOME: envValueSchema,
  XDG_RUNTIME_DIR: envValueSchema,
  XDG_CONFIG_DIRS: envValueSchema,
  XDG_DATA_DIRS: envValueSchema,
  HOME: envValueSchema,
  USERPROFILE: envValueSchema,
});

export type XdgEnvironment = z.infer<typeof xdgEnvironmentSchema>;

export const readXdgEnvironment = (env: EnvSource = process.env): XdgEnvironment =>
  xdgEnvironmentSchema.parse(env);

export const resolveHomeDir = (
  environment: XdgEnvironment,
  platform: NodeJS.Platform = process.platform,
): string | null => {
  const home = platform === "win32" ? environment.USERPROFILE : environment.HOME;
  if (home == null || home.length === 0) {
    return null;
  }
  return home;
};

export const resolvePathApi = (platform: NodeJS.Platform = process.platform) =>
  platform === "win32" ? path.win32 : path.posix;
