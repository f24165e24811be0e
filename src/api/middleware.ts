// ============================================
// API Middleware — Auth, Rate Limiting, Validation
// ============================================

import crypto from "crypto";
import type { IncomingHttpHeaders } from "http";
import { z } from "zod";
import { logger } from "../lib/logger.js";
import type { ApiKeyEntry } from "../config/env.js";

// ============================================
// Types
// ============================================

/**
 * The parts of an express request the API reads.
 */
export interface ApiRequest {
  headers: IncomingHttpHeaders;
  body?: unknown;
  params: Record<string, string>;
  query: Record<string, unknown>;
  method?: string;
  ip?: string;
  requestId?: string;
  apiKeyId?: string;
  apiKeyName?: string;
}

/** The parts of an express response the API writes. */
export interface ApiResponse {
  status(code: number): ApiResponse;
  json(body: unknown): unknown;
  setHeader(name: string, value: string | number): unknown;
  end(): unknown;
}

export type NextFn = () => void;

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

// ============================================
// API Key Authentication
// ============================================

/**
 * Bearer API key check against the configured keys.
 */
export function authenticateApiKey(
  keys: readonly ApiKeyEntry[]
): (req: ApiRequest, res: ApiResponse, next: NextFn) => void {
  return (req, res, next) => {
    const authHeader = req.headers.authorization;

    if (!authHeader) {
      res.status(401).json({
        error: "UNAUTHORIZED",
        message: "Missing Authorization header",
      });
      return;
    }

    // Expect "Bearer <api-key>" format
    const parts = authHeader.split(" ");
    if (parts.length !== 2 || parts[0] !== "Bearer") {
      res.status(401).json({
        error: "UNAUTHORIZED",
        message: "Invalid Authorization header format. Use: Bearer <api-key>",
      });
      return;
    }

    const validKey = findApiKey(keys, parts[1] ?? "");

    if (!validKey) {
      const userAgent = req.headers["user-agent"];
      logger.warn("Invalid API key attempt", {
        stage: "api",
        ip: req.ip ?? "unknown",
        userAgent: userAgent ? userAgent.slice(0, 100) : "unknown",
      });

      res.status(401).json({
        error: "UNAUTHORIZED",
        message: "Invalid API key",
      });
      return;
    }

    req.apiKeyId = validKey.id;
    req.apiKeyName = validKey.name;

    next();
  };
}

/**
 * Timing-safe lookup of a presented key.
 */
export function findApiKey(keys: readonly ApiKeyEntry[], providedKey: string): ApiKeyEntry | null {
  const providedBuffer = Buffer.from(providedKey);

  for (const key of keys) {
    const storedBuffer = Buffer.from(key.secret);

    // timingSafeEqual requires equal lengths
    if (providedBuffer.length === storedBuffer.length && crypto.timingSafeEqual(providedBuffer, storedBuffer)) {
      return key;
    }
  }

  return null;
}

// ============================================
// Rate Limiting
// ============================================

/**
 * Fixed-window rate limit per API key (or IP when unauthenticated).
 * In-memory: each process counts on its own.
 */
export function rateLimit(options: {
  windowMs: number;
  maxRequests: number;
  now?: () => number;
}): (req: ApiRequest, res: ApiResponse, next: NextFn) => void {
  const { windowMs, maxRequests } = options;
  const now = options.now ?? Date.now;
  const store = new Map<string, RateLimitEntry>();

  const cleanup = setInterval(() => {
    const current = now();
    for (const [key, entry] of store.entries()) {
      if (entry.resetAt < current) {
        store.delete(key);
      }
    }
  }, windowMs);
  cleanup.unref();

  return (req, res, next) => {
    const identifier = req.apiKeyId ?? req.ip ?? "unknown";
    const current = now();

    let entry = store.get(identifier);

    if (!entry || entry.resetAt < current) {
      entry = { count: 1, resetAt: current + windowMs };
      store.set(identifier, entry);
    } else {
      entry.count++;
    }

    res.setHeader("X-RateLimit-Limit", maxRequests);
    res.setHeader("X-RateLimit-Remaining", Math.max(0, maxRequests - entry.count));
    res.setHeader("X-RateLimit-Reset", Math.ceil(entry.resetAt / 1000));

    if (entry.count > maxRequests) {
      logger.warn("Rate limit exceeded", {
        stage: "api",
        identifier,
        count: entry.count,
        limit: maxRequests,
      });

      res.status(429).json({
        error: "RATE_LIMIT_EXCEEDED",
        message: "Too many requests. Please try again later.",
        retryAfter: Math.ceil((entry.resetAt - current) / 1000),
      });
      return;
    }

    next();
  };
}

// ============================================
// Input Validation
// ============================================

/**
 * Request body for POST /api/v1/ask.
 */
export const askRequestSchema = z.object({
  question: z
    .string()
    .trim()
    .min(1, "Question cannot be empty")
    .max(2000, "Question cannot exceed 2000 characters"),
  channel: z
    .string()
    .regex(/^#?[\w-]+$/, "Channel must be a channel name")
    .transform((c) => c.replace(/^#/, "").toLowerCase())
    .optional(),
  daysBack: z.number().int().min(1).max(365).optional(),
  maxSources: z.number().int().min(1).max(50).optional(),
  conversationId: z.string().min(1).max(100).optional(),
  channelId: z.string().min(1).max(50).optional(),
});

export type AskRequest = z.infer<typeof askRequestSchema>;

export interface ValidationErrorBody {
  error: "VALIDATION_ERROR";
  message: string;
  details: Array<{ field: string; message: string }>;
  requestId?: string;
}

export function validationErrorBody(error: z.ZodError, requestId?: string): ValidationErrorBody {
  return {
    error: "VALIDATION_ERROR",
    message: "Invalid request body",
    details: error.issues.map((issue) => ({
      field: issue.path.join("."),
      message: issue.message,
    })),
    requestId,
  };
}

// ============================================
// Request ID Middleware
// ============================================

export function addRequestId(req: ApiRequest, res: ApiResponse, next: NextFn): void {
  const header = req.headers["x-request-id"];
  const requestId = typeof header === "string" && header ? header : crypto.randomUUID().slice(0, 8);
  req.requestId = requestId;
  res.setHeader("X-Request-Id", requestId);
  next();
}

// ============================================
// CORS Configuration
// ============================================

export function corsMiddleware(
  allowedOrigins: readonly string[]
): (req: ApiRequest, res: ApiResponse, next: NextFn) => void {
  return (req, res, next) => {
    const origin = req.headers.origin;

    if (origin && (allowedOrigins.includes("*") || allowedOrigins.includes(origin))) {
      res.setHeader("Access-Control-Allow-Origin", origin);
    }

    res.setHeader("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type, Authorization, X-Request-Id");
    res.setHeader("Access-Control-Max-Age", "86400");

    if (req.method === "OPTIONS") {
      res.status(204).end();
      return;
    }

    next();
  };
}
