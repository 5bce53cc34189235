/**
 * Runtime configuration, read from the environment (dotenv is loaded by the
 * entrypoints before this runs).
 */

import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform(value => value === "true" || value === "1");

export const EnvZ = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  HOST: z.string().min(1).default("0.0.0.0"),
  SOP_JSON_LIMIT: z.string().min(1).default("5mb"),
  SOP_ESCAPE_CELLS: booleanFlag.default("true"),
});

export interface AppConfig {
  port: number;
  host: string;
  jsonLimit: string;
  render: {
    escapeCells: boolean;
  };
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.join("\n")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvZ.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.errors.map(err => `[${err.path.join(".") || "root"}] ${err.message}`));
  }
  const { PORT, HOST, SOP_JSON_LIMIT, SOP_ESCAPE_CELLS } = parsed.data;
  return {
    port: PORT,
    host: HOST,
    jsonLimit: SOP_JSON_LIMIT,
    render: { escapeCells: SOP_ESCAPE_CELLS },
  };
}
