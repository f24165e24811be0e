import { z } from "zod";

// ============================================
// Environment configuration with validation
// Fails fast on startup if config is invalid
// ============================================

const envSchema = z.object({
  // Server
  PORT: z.string().default("3000").transform(Number),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // Slack
  SLACK_BOT_TOKEN: z.string().min(1, "SLACK_BOT_TOKEN is required"),
  SLACK_SIGNING_SECRET: z.string().min(1, "SLACK_SIGNING_SECRET is required"),

  // Workspace scope. When unset, resolved once at startup from the bot token.
  WORKSPACE_ID: z.string().min(1).optional(),

  // Supabase (message archive, users, channels, conversation history)
  SUPABASE_URL: z.string().url("SUPABASE_URL must be a valid URL"),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1, "SUPABASE_SERVICE_ROLE_KEY is required"),

  // OpenAI (optional - answers fall back to the top message without it)
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_MODEL: z.string().default("gpt-4o"),

  // Retrieval
  DEFAULT_CONTEXT_SIZE: z.string().default("10").transform(Number),

  // API Configuration (optional - only needed if exposing the REST API)
  API_KEYS: z.string().optional(), // Comma-separated: "id1:name1:secret1,id2:name2:secret2"
  API_RATE_LIMIT_WINDOW_MS: z.string().default("60000").transform(Number),
  API_RATE_LIMIT_MAX_REQUESTS: z.string().default("20").transform(Number),
  API_ALLOWED_ORIGINS: z.string().default(""), // Comma-separated origins, or "*" for all
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error("Invalid environment configuration:");
    for (const issue of result.error.issues) {
      console.error(`   ${issue.path.join(".")}: ${issue.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

// Validate on module load
export const env = validateEnv();

export interface ApiKeyEntry {
  id: string;
  name: string;
  secret: string;
}

/**
 * Parse API keys from environment variable.
 * Format: "id1:name1:secret1,id2:name2:secret2"
 */
export function parseApiKeys(keysStr: string | undefined): ApiKeyEntry[] {
  if (!keysStr) return [];

  return keysStr
    .split(",")
    .map((keyStr) => {
      const [id, name, secret] = keyStr.trim().split(":");
      if (!id || !name || !secret) return null;
      return { id, name, secret };
    })
    .filter((k): k is ApiKeyEntry => k !== null);
}

export function parseAllowedOrigins(originsStr: string): string[] {
  if (!originsStr) return [];
  return originsStr.split(",").map((o) => o.trim()).filter(Boolean);
}

// Derived config for convenience
export const config = {
  port: env.PORT,
  isDev: env.NODE_ENV === "development",
  isProd: env.NODE_ENV === "production",

  slack: {
    botToken: env.SLACK_BOT_TOKEN,
    signingSecret: env.SLACK_SIGNING_SECRET,
  },

  workspaceId: env.WORKSPACE_ID,

  supabase: {
    url: env.SUPABASE_URL,
    serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY,
  },

  openai: {
    apiKey: env.OPENAI_API_KEY,
    model: env.OPENAI_MODEL,
  },

  retrieval: {
    defaultContextSize: env.DEFAULT_CONTEXT_SIZE,
  },

  api: {
    keys: parseApiKeys(env.API_KEYS),
    rateLimitWindowMs: env.API_RATE_LIMIT_WINDOW_MS,
    rateLimitMaxRequests: env.API_RATE_LIMIT_MAX_REQUESTS,
    allowedOrigins: parseAllowedOrigins(env.API_ALLOWED_ORIGINS),
    isConfigured: Boolean(env.API_KEYS && env.API_KEYS.length > 0),
  },
} as const;
