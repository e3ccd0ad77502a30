import { Dir, joinPath } from "./dir";
import type { EnvSource, XdgEnvironment } from "./environment";
import { readXdgEnvironment, resolveHomeDir, resolvePathApi } from "./environment";
import type { HomeRole, SearchPathRole } from "./roles";
import { homeRoleDefaults, roleEnvKeys, searchPathDefaults } from "./roles";

export type XdgResolverOptions = {
  env?: EnvSource;
  platform?: NodeJS.Platform;
};

export type ResolvedXdgDirs = {
  config: Dir;
  cache: Dir;
  data: Dir;
  state: Dir;
  runtime: Dir;
  "config-dirs": Dir[];
  "data-dirs": Dir[];
};

export type XdgResolver = {
  readonly appName: string;
  resolveHome: (role: HomeRole) => Dir;
  resolveRuntime: () => Dir;
  resolveSearchPaths: (role: SearchPathRole) => Dir[];
  config: () => Dir;
  cache: () => Dir;
  data: () => Dir;
  state: () => Dir;
  runtime: () => Dir;
  configDirs: () => Dir[];
  dataDirs: () => Dir[];
  resolveAll: () => ResolvedXdgDirs;
  dotDir: () => Dir;
};

/**
 * Creates a resolver bound to `appName`. The environment is read on every
 * call, so changes made after construction are picked up.
 */
export const createXdgResolver = (
  appName: string,
  { env = process.env, platform = process.platform }: XdgResolverOptions = {},
): XdgResolver => {
  const pathApi = resolvePathApi(platform);
  const emptyDir = new Dir("", pathApi);
  const snapshot = (): XdgEnvironment => readXdgEnvironment(env);
  const toDir = (...segments: string[]) => new Dir(joinPath(pathApi, ...segments), pathApi);
  const withAppName = (base: string) => toDir(base, appName);

  const resolveHome = (role: HomeRole) => {
    const environment = snapshot();
    const override = environment[roleEnvKeys[role]];
    if (override !== undefined) {
      return withAppName(override);
    }
    const home = resolveHomeDir(environment, platform);
    if (home == null) {
      return emptyDir;
    }
    return toDir(home, ...homeRoleDefaults[role], appName);
  };

  // XDG_RUNTIME_DIR has no default location.
  const resolveRuntime = () => {
    const override = snapshot()[roleEnvKeys.runtime];
    return override === undefined ? emptyDir : withAppName(override);
  };

  const resolveSearchPaths = (role: SearchPathRole) => {
    const override = snapshot()[roleEnvKeys[role]];
    const bases =
      override === undefined
        ? searchPathDefaults[role]
        : override.length > 0
          ? override.split(pathApi.delimiter)
          : [];
    return bases.map(withAppName);
  };

  const dotDir = () => {
    const home = resolveHomeDir(snapshot(), platform);
    return home == null ? emptyDir : toDir(home, `.${appName}`);
  };

  return {
    appName,
    resolveHome,
    resolveRuntime,
    resolveSearchPaths,
    config: () => resolveHome("config"),
    cache: () => resolveHome("cache"),
    data: () => resolveHome("data"),
    state: () => resolveHome("state"),
    runtime: resolveRuntime,
    configDirs: () => resolveSearchPaths("config-dirs"),
    dataDirs: () => resolveSearchPaths("data-dirs"),
    resolveAll: () => ({
      config: resolveHome("config"),
      cache: resolveHome("cache"),
      data: resolveHome("data"),
      state: resolveHome("state"),
      runtime: resolveRuntime(),
      "config-dirs": resolveSearchPaths("config-dirs"),
      "data-dirs": resolveSearchPaths("data-dirs"),
    }),
    dotDir,
  };
};
