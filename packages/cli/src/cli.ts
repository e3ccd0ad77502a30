#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import type { Dir, EnvSource, SinglePathRole, XdgResolver } from "@basedirs/core";
import { createXdgResolver, isSearchPathRole, resolvePathApi, roleEnvKeys } from "@basedirs/core";

import type { CliCommand } from "./args";
import { parseArgs, resolveCommand, usage } from "./args";

export type CliLogger = Pick<Console, "log" | "warn" | "error">;

export type RunCliOptions = {
  argv?: string[];
  env?: EnvSource;
  platform?: NodeJS.Platform;
  logger?: CliLogger;
};

export const EXIT_OK = 0;
export const EXIT_UNRESOLVED = 1;
export const EXIT_USAGE = 2;

type ResolveCommand = Extract<CliCommand, { kind: "resolve" }>;

const toMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

const readCommand = (argv: string[], logger: CliLogger): CliCommand | null => {
  try {
    return resolveCommand(parseArgs(argv));
  } catch (error) {
    logger.error(`basedirs: ${toMessage(error)}`);
    logger.error(usage);
    return null;
  }
};

const describeMissing = (role: SinglePathRole) =>
  role === "runtime"
    ? `${roleEnvKeys.runtime} is not set`
    : `${roleEnvKeys[role]} is not set and the home directory is unknown`;

const printSingle = (
  resolver: XdgResolver,
  command: ResolveCommand & { role: SinglePathRole },
  logger: CliLogger,
) => {
  const dir =
    command.role === "runtime" ? resolver.resolveRuntime() : resolver.resolveHome(command.role);
  if (dir.isEmpty()) {
    logger.warn(
      `basedirs: ${command.role} directory is unresolvable: ${describeMissing(command.role)}`,
    );
    return EXIT_UNRESOLVED;
  }
  if (command.create) {
    try {
      dir.create();
    } catch (error) {
      logger.error(`basedirs: failed to create ${dir.path}: ${toMessage(error)}`);
      return EXIT_UNRESOLVED;
    }
  }
  logger.log(command.json ? JSON.stringify(dir) : dir.path);
  return EXIT_OK;
};

const printSearchPaths = (dirs: Dir[], command: ResolveCommand, logger: CliLogger) => {
  if (dirs.length === 0) {
    logger.warn(`basedirs: ${command.role} search path is empty`);
    return EXIT_UNRESOLVED;
  }
  if (command.json) {
    logger.log(JSON.stringify(dirs));
    return EXIT_OK;
  }
  for (const dir of dirs) {
    logger.log(dir.path);
  }
  return EXIT_OK;
};

const printAll = (
  resolver: XdgResolver,
  command: ResolveCommand,
  delimiter: string,
  logger: CliLogger,
) => {
  const resolved = resolver.resolveAll();
  if (command.json) {
    logger.log(JSON.stringify(resolved, null, 2));
    return EXIT_OK;
  }
  for (const [role, value] of Object.entries(resolved)) {
    const text = Array.isArray(value) ? value.map((dir) => dir.path).join(delimiter) : value.path;
    logger.log(`${role}=${text}`);
  }
  return EXIT_OK;
};

export const runCli = ({
  argv = process.argv.slice(2),
  env = process.env,
  platform = process.platform,
  logger = console,
}: RunCliOptions = {}): number => {
  const command = readCommand(argv, logger);
  if (!command) {
    return EXIT_USAGE;
  }
  if (command.kind === "help") {
    logger.log(usage);
    return EXIT_OK;
  }

  const resolver = createXdgResolver(command.appName, { env, platform });
  const { role } = command;
  if (role === "all") {
    return printAll(resolver, command, resolvePathApi(platform).delimiter, logger);
  }
  if (isSearchPathRole(role)) {
    return printSearchPaths(resolver.resolveSearchPaths(role), command, logger);
  }
  return printSingle(resolver, { ...command, role }, logger);
};

// Symlinked bins (npm link, node_modules/.bin) point argv[1] at the link.
const canonicalPath = (targetPath: string) => {
  try {
    return fs.realpathSync(targetPath);
  } catch {
    return path.resolve(targetPath);
  }
};

const modulePathFromUrl = (moduleUrl: string) => {
  try {
    return fileURLToPath(moduleUrl);
  } catch {
    return null;
  }
};

export const isMainModule = (
  mainPath: string | undefined = process.argv[1],
  moduleUrl = import.meta.url,
) => {
  const modulePath = modulePathFromUrl(moduleUrl);
  if (!mainPath || modulePath == null) {
    return false;
  }
  return canonicalPath(modulePath) === canonicalPath(mainPath);
};

if (isMainModule()) {
  process.exitCode = runCli();
}
