import { Request, Response, NextFunction } from "express";
import jwt from "jsonwebtoken";
import { z } from "zod";
import type { SessionId } from "../domain/IntakeSession";

// Session token middleware
//
// Strategy:
// - POST /api/session creates an intake session and returns a signed token bound to its id.
// - Every other stateful endpoint expects `Authorization: Bearer <token>`.
//
// Token scheme: HS256 with a shared secret. Lifetime: 2 hours, matching the session store TTL.

export const SESSION_TOKEN_EXPIRY_SECONDS = 2 * 60 * 60;

export interface AuthPayload {
  sessionId: SessionId;
  iat?: number;
  exp?: number;
}

declare global {
  namespace Express {
    interface Request {
      auth?: AuthPayload;
    }
  }
}

const TokenClaimsSchema = z.object({
  sid: z.string().min(1),
  iat: z.number().optional(),
  exp: z.number().optional(),
});

// Paths reachable without a session token.
const PUBLIC_PATHS: readonly ((req: Request) => boolean)[] = [
  (req) => req.path === "/api/health",
  (req) => req.path === "/api/session" && req.method === "POST",
  (req) => req.path === "/api/specialties",
  (req) => req.path.startsWith("/api/geocode/"),
];

export class SessionTokens {
  constructor(private readonly secret: string) {}

  issue(sessionId: SessionId): string {
    return jwt.sign({ sid: sessionId }, this.secret, {
      algorithm: "HS256",
      expiresIn: SESSION_TOKEN_EXPIRY_SECONDS,
    });
  }

  verify(token: string): AuthPayload {
    const claims = TokenClaimsSchema.parse(jwt.verify(token, this.secret, { algorithms: ["HS256"] }));
    return { sessionId: claims.sid, iat: claims.iat, exp: claims.exp };
  }

  middleware() {
    return (req: Request, res: Response, next: NextFunction): void => {
      if (req.method === "OPTIONS" || PUBLIC_PATHS.some((isPublic) => isPublic(req))) {
        return next();
      }

      const authHeader = req.headers.authorization;
      if (!authHeader || !authHeader.startsWith("Bearer ")) {
        res.status(401).json({ error: "Missing or invalid Authorization header. Expected: Bearer <token>" });
        return;
      }

      try {
        req.auth = this.verify(authHeader.slice(7));
        next();
      } catch (err) {
        if (err instanceof jwt.TokenExpiredError) {
          res.status(401).json({ error: "Session expired. Please start a new session." });
        } else {
          res.status(401).json({ error: "Invalid session token." });
        }
      }
    };
  }
}

export function requireSessionId(req: Request): SessionId {
  const sessionId = req.auth?.sessionId;
  if (!sessionId) throw new Error("Session token required.");
  return sessionId;
}
