import type { Dir } from "./dir";
import { createXdgResolver } from "./resolver";

const toPaths = (dirs: Dir[]) => dirs.map((dir) => dir.path);

// One-call helpers over process.env. An empty string or empty list means the
// directory cannot be resolved in the current environment.
export const config = (name: string): string => createXdgResolver(name).config().path;
export const cache = (name: string): string => createXdgResolver(name).cache().path;
export const data = (name: string): string => createXdgResolver(name).data().path;
export const state = (name: string): string => createXdgResolver(name).state().path;
export const runtime = (name: string): string => createXdgResolver(name).runtime().path;
export const configDirs = (name: string): string[] =>
  toPaths(createXdgResolver(name).configDirs());
export const dataDirs = (name: string): string[] => toPaths(createXdgResolver(name).dataDirs());
