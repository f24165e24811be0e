// ============================================
// Slack Recall Server — Slack app + REST API
// ============================================

import "dotenv/config";
import express from "express";
import { App, ExpressReceiver } from "@slack/bolt";

import { config } from "./config/env.js";
import { logger } from "./lib/logger.js";
import { configError } from "./lib/errors.js";
import { createSupabaseClient } from "./db/supabase.js";
import { createSupabaseUserDirectory } from "./db/users.js";
import { createSupabaseChannelDirectory } from "./db/channels.js";
import { createSupabaseConversationStore } from "./db/conversations.js";
import { createSupabaseMessageSearch } from "./retrieval/search.js";
import { createCompletionCapability } from "./llm/client.js";
import { handleAppMention, handleAskCommand } from "./app/handleSlackQuestion.js";
import { PIPELINE_VERSION } from "./app/pipeline.js";
import {
  addRequestId,
  authenticateApiKey,
  corsMiddleware,
  createApiHandlers,
  rateLimit,
} from "./api/index.js";
import type { PipelineDeps } from "./app/types.js";

// ============================================
// Slack App Setup
// ============================================

const receiver = new ExpressReceiver({
  signingSecret: config.slack.signingSecret,
  endpoints: "/slack/events",
});

const slackApp = new App({
  token: config.slack.botToken,
  receiver,
});

/**
 * The workspace every question is scoped to: WORKSPACE_ID, or the bot
 * token's team.
 */
async function resolveWorkspaceId(): Promise<string> {
  if (config.workspaceId) return config.workspaceId;

  const auth = await slackApp.client.auth.test();
  if (!auth.team_id) {
    throw configError("Could not determine the workspace: set WORKSPACE_ID or use a workspace bot token");
  }
  return auth.team_id;
}

function createDeps(): PipelineDeps {
  const supabase = createSupabaseClient();

  return {
    search: createSupabaseMessageSearch(supabase),
    users: createSupabaseUserDirectory(supabase),
    channels: createSupabaseChannelDirectory(supabase),
    conversations: createSupabaseConversationStore(supabase),
    completion: createCompletionCapability(config.openai.apiKey, config.openai.model),
    defaultContextSize: config.retrieval.defaultContextSize,
  };
}

// ============================================
// Startup
// ============================================

async function main(): Promise<void> {
  const deps = createDeps();
  const workspaceId = await resolveWorkspaceId();

  // ============================================
  // Slack Event Handlers
  // ============================================

  slackApp.event("app_mention", async ({ event, client }) => {
    await handleAppMention(client, deps, workspaceId, event);
  });

  slackApp.command("/ask", async ({ command, ack, client }) => {
    await ack();
    await handleAskCommand(client, deps, workspaceId, command, "private");
  });

  slackApp.command("/askall", async ({ command, ack, client }) => {
    await ack();
    await handleAskCommand(client, deps, workspaceId, command, "public");
  });

  slackApp.error(async (error) => {
    logger.error("Unhandled Slack error", { stage: "slack", error });
  });

  // ============================================
  // Express Routes
  // ============================================

  const app = receiver.app;
  const handlers = createApiHandlers(deps, workspaceId);

  app.get("/health", handlers.health);

  app.use("/api", corsMiddleware(config.api.allowedOrigins));
  app.use("/api", addRequestId);

  if (config.api.isConfigured) {
    const authenticate = authenticateApiKey(config.api.keys);
    const rateLimiter = rateLimit({
      windowMs: config.api.rateLimitWindowMs,
      maxRequests: config.api.rateLimitMaxRequests,
    });

    app.post("/api/v1/ask", express.json({ limit: "100kb" }), authenticate, rateLimiter, handlers.ask);
    app.get("/api/v1/conversations", authenticate, rateLimiter, handlers.listConversations);
    app.get("/api/v1/conversations/:id", authenticate, rateLimiter, handlers.getConversation);
    app.delete("/api/v1/conversations/:id", authenticate, rateLimiter, handlers.deleteConversation);

    logger.info("API routes enabled", {
      stage: "startup",
      keyCount: config.api.keys.length,
      rateLimitWindow: config.api.rateLimitWindowMs,
      rateLimitMax: config.api.rateLimitMaxRequests,
    });
  } else {
    app.use("/api/v1", (_req, res) => {
      res.status(503).json({
        error: "API_NOT_CONFIGURED",
        message: "The API is not configured. Please set API_KEYS environment variable.",
      });
    });

    logger.info("API routes disabled (no API keys configured)", { stage: "startup" });
  }

  await slackApp.start(config.port);

  logger.info("Server listening", {
    stage: "startup",
    port: config.port,
    workspaceId,
    llm: deps.completion.kind,
    version: PIPELINE_VERSION,
  });
}

main().catch((err: unknown) => {
  logger.error("Startup failed", { stage: "startup", error: err });
  process.exit(1);
});
