import { Request, Response, NextFunction } from "express";
import { describeError } from "../domain/Errors";
import type { AuditRecord, IntakeRepository } from "../repository/IntakeRepository";

// Audit Logging Middleware
//
// Records every state-changing intake action.
// Append-only. Request bodies are never copied into the log.

export type AuditAction =
  | "session_created"
  | "intake_submitted"
  | "otc_requested"
  | "provider_search"
  | "provider_selected"
  | "facility_search"
  | "appointment_booked"
  | "contact_sent";

const ACTIONS: readonly [string, AuditAction, string][] = [
  ["/api/session", "session_created", "session"],
  ["/api/intake/symptoms", "intake_submitted", "intake"],
  ["/api/otc", "otc_requested", "ai"],
  ["/api/providers/search", "provider_search", "search"],
  ["/api/providers/select", "provider_selected", "session"],
  ["/api/facilities/search", "facility_search", "search"],
  ["/api/appointments", "appointment_booked", "booking"],
  ["/api/contact", "contact_sent", "contact"],
];

export function auditActionFor(path: string): { action: AuditAction; resource: string } | undefined {
  const match = ACTIONS.find(([p]) => p === path);
  return match ? { action: match[1], resource: match[2] } : undefined;
}

export function auditMiddleware(repository: IntakeRepository) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (req.method !== "POST") return next();

    const mapped = auditActionFor(req.path);
    if (!mapped) return next();

    // Written once the response is done, so the status code is known.
    res.on("finish", () => {
      const entry: AuditRecord = {
        sessionId: req.auth?.sessionId,
        action: mapped.action,
        resource: mapped.resource,
        detail: { method: req.method, path: req.path, status: res.statusCode },
        ipAddress: req.ip || req.socket.remoteAddress,
        userAgent: req.headers["user-agent"],
      };

      repository.writeAudit(entry).catch((err: unknown) => {
        console.error("[Audit] Failed to write audit log:", describeError(err));
      });
    });

    next();
  };
}
