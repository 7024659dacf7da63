import "dotenv/config";
import { z } from "zod";

const Env = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  HOST: z.string().min(1).default("0.0.0.0"),
  DB_FILE: z.string().min(1).default("./data/trivia.sqlite"),
  SEED_FILE: z.string().min(1).default("./data/seed.json"),
  NODE_ENV: z.string().optional(),
  LOG_LEVEL: z
    .enum(["error", "warn", "info", "http", "verbose", "debug", "silly"])
    .optional(),
  LOG_DIR: z.string().min(1).default("./logs"),
});

export type Config = z.infer<typeof Env>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return Env.parse(env);
}

export const config: Config = loadConfig();
