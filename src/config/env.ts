import { config } from "dotenv";
import { z } from "zod";

config();

export type ModelProvider = "openai" | "anthropic";

const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().default(""),
  ANTHROPIC_API_KEY: z.string().default(""),
  MODEL_PROVIDER: z.enum(["openai", "anthropic"]).default("openai"),
  MODEL_NAME: z.string().optional(),
  EVAL_TIMEOUT_MS: z.coerce.number().int().positive().default(1000),
  SESSION_MAX_ENTRIES: z.coerce.number().int().positive().optional(),
  AGENT_MAX_STEPS: z.coerce.number().int().positive().default(25),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  // Blank entries in .env mean "not set".
  const present = Object.fromEntries(Object.entries(source).filter(([, value]) => value !== undefined && value !== ""));
  return EnvSchema.parse(present);
}

export const env = loadEnv();

export function warnMissingKeys(settings: Env = env): void {
  if (settings.MODEL_PROVIDER === "openai" && !settings.OPENAI_API_KEY) console.warn("⚠️  Missing OPENAI_API_KEY");
  if (settings.MODEL_PROVIDER === "anthropic" && !settings.ANTHROPIC_API_KEY) console.warn("⚠️  Missing ANTHROPIC_API_KEY");
}
