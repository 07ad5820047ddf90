import rateLimit, { type RateLimitRequestHandler } from "express-rate-limit";
import type { Request } from "express";

// Rate Limiting Middleware
//
// Four tiers:
// 1. General API: 100 req/min per session
// 2. AI endpoints: 30 req/min per session
// 3. Search endpoints: 60 req/min per session
// 4. Contact form: 1 submission per 10 s per session
//
// Key extraction: uses the session id from the token, falls back to IP.
// Limiters are built per app instance so each keeps its own store.

export type RateLimiters = Readonly<{
  general: RateLimitRequestHandler;
  ai: RateLimitRequestHandler;
  search: RateLimitRequestHandler;
  contact: RateLimitRequestHandler;
}>;

function extractKey(req: Request): string {
  if (req.auth?.sessionId) return req.auth.sessionId;
  return req.ip || req.socket.remoteAddress || "unknown";
}

export function createRateLimiters(): RateLimiters {
  return {
    general: rateLimit({
      windowMs: 60 * 1000,
      max: 100,
      standardHeaders: true,
      legacyHeaders: false,
      keyGenerator: extractKey,
      message: { error: "Too many requests. Please try again later.", retryAfterMs: 60000 },
    }),

    ai: rateLimit({
      windowMs: 60 * 1000,
      max: 30,
      standardHeaders: true,
      legacyHeaders: false,
      keyGenerator: extractKey,
      message: { error: "AI request limit reached. Please wait before trying again.", retryAfterMs: 60000 },
    }),

    search: rateLimit({
      windowMs: 60 * 1000,
      max: 60,
      standardHeaders: true,
      legacyHeaders: false,
      keyGenerator: extractKey,
      message: { error: "Search limit reached. Please wait before searching again.", retryAfterMs: 60000 },
    }),

    contact: rateLimit({
      windowMs: 10 * 1000,
      max: 1,
      standardHeaders: true,
      legacyHeaders: false,
      keyGenerator: extractKey,
      message: { error: "Please wait a few seconds before sending another message.", retryAfterMs: 10000 },
    }),
  };
}
