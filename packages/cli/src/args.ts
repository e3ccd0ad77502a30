import { isSearchPathRole, xdgRoles } from "@basedirs/core";
import type { ArgsDef, ParsedArgs as CittyParsedArgs } from "citty";
import { parseArgs as parseCittyArgs } from "citty";
import { z } from "zod";

const cliArgDefinitions = {
  role: { type: "positional", required: false },
  name: { type: "positional", required: false },
  create: { type: "boolean" },
  json: { type: "boolean" },
  help: { type: "boolean", alias: "h" },
} satisfies ArgsDef;

export type ParsedArgs = CittyParsedArgs<typeof cliArgDefinitions>;

export const cliRoleSchema = z.enum([...xdgRoles, "all"] as const);

export type CliRole = z.infer<typeof cliRoleSchema>;

export type CliCommand =
  | { kind: "help" }
  | {
      kind: "resolve";
      role: CliRole;
      appName: string;
      create: boolean;
      json: boolean;
    };

export const usage = [
  "Usage: basedirs <role> <app-name> [--create] [--json]",
  `Roles: ${cliRoleSchema.options.join(", ")}`,
].join("\n");

const normalizeRawArgv = (argv: string[]) => argv.filter((token) => token !== "--");

export const parseArgs = (argv = process.argv.slice(2)): ParsedArgs =>
  parseCittyArgs<typeof cliArgDefinitions>(normalizeRawArgv(argv), cliArgDefinitions);

const readPositional = (value: unknown, label: string) => {
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`missing ${label}.`);
  }
  return value;
};

export const resolveCommand = (args: ParsedArgs): CliCommand => {
  if (args.help === true) {
    return { kind: "help" };
  }
  const rawRole = readPositional(args.role, "<role>");
  const parsedRole = cliRoleSchema.safeParse(rawRole);
  if (!parsedRole.success) {
    throw new Error(`unknown role: ${rawRole}`);
  }
  const role = parsedRole.data;
  const appName = readPositional(args.name, "<app-name>");
  const create = args.create === true;
  if (create && (role === "all" || isSearchPathRole(role))) {
    throw new Error(`--create only applies to single-directory roles. (received: ${role})`);
  }
  return { kind: "resolve", role, appName, create, json: args.json === true };
};
