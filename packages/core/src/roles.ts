export const homeRoles = ["config", "cache", "data", "state"] as const;
export const searchPathRoles = ["config-dirs", "data-dirs"] as const;
export const xdgRoles = [...homeRoles, "runtime", ...searchPathRoles] as const;

export type HomeRole = (typeof homeRoles)[number];
export type SearchPathRole = (typeof searchPathRoles)[number];
export type XdgRole = (typeof xdgRoles)[number];
export type SinglePathRole = HomeRole | "runtime";

export const roleEnvKeys = {
  config: "XDG_CONFIG_HOME",
  cache: "XDG_CACHE_HOME",
  data: "XDG_DATA_HOME",
  state: "XDG_STATE_HOME",
  runtime: "XDG_RUNTIME_DIR",
  "config-dirs": "XDG_CONFIG_DIRS",
  "data-dirs": "XDG_DATA_DIRS",
} as const satisfies Record<XdgRole, string>;

export type XdgEnvKey = (typeof roleEnvKeys)[XdgRole];

/** Base directory beneath home, as path segments, used when the role's variable is unset. */
export const homeRoleDefaults: Record<HomeRole, readonly string[]> = {
  config: [".config"],
  cache: [".cache"],
  data: [".local", "share"],
  state: [".local", "state"],
};

export const searchPathDefaults: Record<SearchPathRole, readonly string[]> = {
  "config-dirs": ["/etc/xdg"],
  "data-dirs": ["/usr/local/share/", "/usr/share/"],
};

export const isHomeRole = (value: string): value is HomeRole =>
  homeRoles.some((role) => role === value);

export const isSearchPathRole = (value: string): value is SearchPathRole =>
  searchPathRoles.some((role) => role === value);

export const isXdgRole = (value: string): value is XdgRole =>
  xdgRoles.some((role) => role === value);
