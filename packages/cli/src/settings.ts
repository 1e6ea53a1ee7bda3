import { z } from "zod";
import { ENV_CONFIG_PATH, ENV_DEBUG } from "@repotrack/shared";

const SettingsSchema = z.object({
  [ENV_CONFIG_PATH]: z.string().min(1).optional(),
  [ENV_DEBUG]: z
    .string()
    .optional()
    .transform((value) => value === "1" || value?.toLowerCase() === "true"),
});

export interface Settings {
  /** Config file named by the environment, if any. */
  configPath?: string;
  debug: boolean;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = SettingsSchema.parse({
    [ENV_CONFIG_PATH]: env[ENV_CONFIG_PATH] || undefined,
    [ENV_DEBUG]: env[ENV_DEBUG],
  });
  return {
    configPath: parsed[ENV_CONFIG_PATH],
    debug: parsed[ENV_DEBUG],
  };
}
