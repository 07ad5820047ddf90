import express, { Request, Response, NextFunction } from "express";
import cors from "cors";
import { ZodError } from "zod";
import type { AppConfig } from "./config";

import type { LLMCaller } from "./ai/PromptBuilders";
import { suggestOtc } from "./ai/OtcAdvisor";
import { bookAppointment } from "./booking/AppointmentBooking";
import type { FeedbackMailer } from "./contact/FeedbackMailer";
import {
  IndexOutOfRangeError,
  PreconditionError,
  SessionNotFoundError,
  SourceUnavailableError,
} from "./domain/Errors";
import type { IntakeSession } from "./domain/IntakeSession";
import type { IntakeSessionStore } from "./intake/IntakeSessionStore";
import { GENERALIST_SPECIALTIES } from "./intake/SpecialtySuggester";
import { runSymptomIntake } from "./intake/SymptomIntake";
import { findDoctors } from "./maps/ProviderDiscovery";
import type { SearchServices } from "./maps/SearchServices";
import { getSupportedSpecializationMappings } from "./maps/SpecializationQueryMap";
import { normalizeZip } from "./maps/ZipGeocoder";
import type { IntakeRepository } from "./repository/IntakeRepository";

import { auditMiddleware } from "./middleware/audit";
import { requireSessionId, SESSION_TOKEN_EXPIRY_SECONDS, type SessionTokens } from "./middleware/auth";
import { createRateLimiters } from "./middleware/rateLimiter";
import {
  AppointmentSchema,
  ContactSchema,
  FacilitySearchSchema,
  OtcRequestSchema,
  ProviderSearchSchema,
  SelectProviderSchema,
  SymptomIntakeSchema,
} from "./validation/schemas";

export type AppDeps = Readonly<{
  config: AppConfig;
  search: SearchServices;
  repository: IntakeRepository;
  sessions: IntakeSessionStore;
  tokens: SessionTokens;
  mailer: FeedbackMailer;

  // Completion service override; production uses the OpenAI-backed default.
  llm?: LLMCaller;
}>;

// ---- Async error wrapper ----
function asyncHandler(fn: (req: Request, res: Response) => Promise<void>) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}

function statusFor(err: unknown): number {
  if (err instanceof ZodError) return 400;
  if (err instanceof SyntaxError) return 400;
  if (err instanceof IndexOutOfRangeError) return 400;
  if (err instanceof SessionNotFoundError) return 401;
  if (err instanceof PreconditionError) return 409;
  if (err instanceof SourceUnavailableError) return 502;
  return 500;
}

export function createApp(deps: AppDeps) {
  const { config, search, repository, sessions, tokens, mailer } = deps;
  const app = express();
  const limiters = createRateLimiters();

  // ---- CORS ----
  app.use(cors({
    origin(requestOrigin: string | undefined, callback: (err: Error | null, allow?: boolean | string) => void) {
      // Allow server-to-server / curl / health-pings (no Origin header)
      if (!requestOrigin) return callback(null, true);
      if (config.corsOrigins.includes(requestOrigin)) {
        return callback(null, requestOrigin);
      }
      console.warn(`[CORS] Blocked request from origin: ${requestOrigin}`);
      callback(new Error(`Origin ${requestOrigin} not allowed by CORS`));
    },
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization"],
  }));

  app.use(express.json({ limit: "100kb" }));

  // ---- Privacy headers (intake data must not be cached) ----
  app.use((_req, res, next) => {
    res.setHeader("Cache-Control", "no-store, no-cache, must-revalidate, private");
    res.setHeader("Pragma", "no-cache");
    res.setHeader("Expires", "0");
    next();
  });

  app.use(limiters.general);
  app.use(tokens.middleware());
  app.use(auditMiddleware(repository));

  const currentSession = (req: Request): IntakeSession => sessions.require(requireSessionId(req));

  // ===============================
  // GET /api/health
  // ===============================
  app.get("/api/health", (_req, res) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      features: {
        ai: Boolean(config.openai.apiKey),
        places: Boolean(config.maps.googleApiKey),
        database: Boolean(config.database.url),
        mail: mailer.missingSettings().length === 0,
      },
    });
  });

  // ===============================
  // Session
  // ===============================
  app.post("/api/session", (_req, res) => {
    const session = sessions.create();
    res.status(201).json({
      sessionId: session.sessionId,
      token: tokens.issue(session.sessionId),
      expiresIn: SESSION_TOKEN_EXPIRY_SECONDS,
    });
  });

  app.get("/api/session", (req, res) => {
    res.json(currentSession(req));
  });

  // ===============================
  // POST /api/intake/symptoms
  // ===============================
  app.post("/api/intake/symptoms", limiters.ai, asyncHandler(async (req, res) => {
    const sessionId = requireSessionId(req);
    sessions.require(sessionId);
    const body = SymptomIntakeSchema.parse(req.body);

    const outcome = await runSymptomIntake(
      { repository, llm: deps.llm },
      {
        firstName: body.firstName,
        lastName: body.lastName,
        email: body.email,
        zipCode: body.zip,
        symptomsText: body.symptoms,
        age: body.age,
        sex: body.sex,
        durationDays: body.durationDays,
      },
    );

    sessions.recordIntake(sessionId, { patient: outcome.patient, symptoms: outcome.summary, run: outcome.run });

    res.json({
      summary: outcome.summary,
      emergency: {
        isEmergency: outcome.summary.emergencyKeywords.length > 0,
        keywords: outcome.summary.emergencyKeywords,
      },
      saved: outcome.saved,
      runId: outcome.run?.runId,
      fallback: outcome.fallback,
    });
  }));

  // ===============================
  // POST /api/otc
  // ===============================
  app.post("/api/otc", limiters.ai, asyncHandler(async (req, res) => {
    const session = currentSession(req);
    const body = OtcRequestSchema.parse(req.body ?? {});

    const conditionSummary = session.symptoms?.conditionSummary;
    if (!conditionSummary) throw new PreconditionError("Please complete the symptom checker first.");

    const advice = await suggestOtc(
      {
        conditionSummary,
        age: session.symptoms?.age,
        allergies: body.allergies,
        medications: body.medications,
      },
      deps.llm,
    );

    res.json(advice);
  }));

  // ===============================
  // Doctor search & selection
  // ===============================
  app.post("/api/providers/search", limiters.search, asyncHandler(async (req, res) => {
    const sessionId = requireSessionId(req);
    sessions.require(sessionId);
    const body = ProviderSearchSchema.parse(req.body);

    const found = await findDoctors(search.orchestrator, {
      zip: body.zip,
      specialty: body.specialty,
      radiusMiles: body.radiusMiles,
    });
    sessions.storeSearch(sessionId, found);

    res.json(found.result);
  }));

  app.post("/api/providers/select", (req, res) => {
    const body = SelectProviderSchema.parse(req.body);
    const selected = sessions.select(requireSessionId(req), body.index);
    res.json({ selected });
  });

  // ===============================
  // POST /api/facilities/search
  // ===============================
  app.post("/api/facilities/search", limiters.search, asyncHandler(async (req, res) => {
    const body = FacilitySearchSchema.parse(req.body);
    res.json(await search.facilities.find(body));
  }));

  // ===============================
  // POST /api/appointments
  // ===============================
  app.post("/api/appointments", asyncHandler(async (req, res) => {
    const session = currentSession(req);
    const body = AppointmentSchema.parse(req.body);
    res.status(201).json(await bookAppointment(repository, session, body));
  }));

  // ===============================
  // POST /api/contact
  // ===============================
  app.post("/api/contact", limiters.contact, asyncHandler(async (req, res) => {
    const body = ContactSchema.parse(req.body);
    res.json(await mailer.send(body));
  }));

  // ===============================
  // Lookups
  // ===============================
  app.get("/api/geocode/:zip", asyncHandler(async (req, res) => {
    const zip = normalizeZip(req.params.zip);
    if (!zip) {
      res.status(400).json({ error: "Please enter a valid US ZIP (e.g., 33351 or 33351-1234)." });
      return;
    }

    const found = await search.geocoder.resolve(zip);
    if (!found) {
      res.status(404).json({ error: `Could not geolocate ZIP ${zip}.` });
      return;
    }
    res.json({ zip, ...found });
  }));

  app.get("/api/specialties", (_req, res) => {
    res.json({
      specialties: Object.keys(getSupportedSpecializationMappings()),
      generalists: GENERALIST_SPECIALTIES,
    });
  });

  // ---- Global error handler ----
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusFor(err);

    if (err instanceof ZodError) {
      res.status(status).json({
        error: "Invalid request.",
        issues: err.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
      });
      return;
    }

    const message = err instanceof Error ? err.message : String(err);
    if (status >= 500) console.error("[Server Error]", message);
    res.status(status).json({ error: status === 500 ? "Internal server error." : message });
  });

  return app;
}
