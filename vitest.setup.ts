import { afterEach, beforeEach } from "vitest";

// Tests mutate process.env directly; put the recognized variables back afterwards.
const trackedKeys = [
  "XDG_CONFIG_HOME",
  "XDG_CACHE_HOME",
  "XDG_DATA_HOME",
  "XDG_STATE_HOME",
  "XDG_RUNTIME_DIR",
  "XDG_CONFIG_DIRS",
  "XDG_DATA_DIRS",
  "HOME",
  "USERPROFILE",
] as const;

let saved = new Map<string, string | undefined>();

beforeEach(() => {
  saved = new Map(
    trackedKeys.map((key): [string, string | undefined] => [key, process.env[key]]),
  );
});

afterEach(() => {
  for (const [key, value] of saved) {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
});
