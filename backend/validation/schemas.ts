import { z } from "zod";
import { isCalendarDate } from "../booking/AppointmentBooking";
import { HOW_MANY_CHOICES } from "../maps/FacilityFinder";
import { normalizeZip } from "../maps/ZipGeocoder";

// Input Validation Schemas (Zod)
//
// Validates all incoming API payloads before they reach domain logic.
// Blank optional strings are treated as absent.

// --- Shared ---

const EMAIL_PATTERN = /^[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}$/;

const blankToUndefined = (v: unknown): unknown => (typeof v === "string" && v.trim() === "" ? undefined : v);

const OptionalText = (max: number) => z.preprocess(blankToUndefined, z.string().trim().max(max).optional());

export const ZipSchema = z.string().transform((raw, ctx) => {
  const zip = normalizeZip(raw);
  if (!zip) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Please enter a valid US ZIP (e.g., 33351 or 33351-1234)." });
    return z.NEVER;
  }
  return zip;
});

const OptionalZipSchema = z.preprocess(blankToUndefined, ZipSchema.optional());

const OptionalEmailSchema = z.preprocess(
  blankToUndefined,
  z.string().trim().regex(EMAIL_PATTERN, "Please enter a valid email.").optional(),
);

// --- Symptom intake ---

export const SymptomIntakeSchema = z
  .object({
    firstName: z.string().trim().max(100).default(""),
    lastName: z.string().trim().max(100).default(""),
    email: OptionalEmailSchema,
    zip: OptionalZipSchema,
    symptoms: z.string().max(2000).default(""),
    age: z.number().int().min(0).max(130).optional(),
    sex: z.enum(["Male", "Female"]).optional(),
    durationDays: z.number().int().min(0).max(3650).optional(),
  })
  .refine(
    (v) => Boolean(v.symptoms.trim() || v.age || v.sex || v.durationDays),
    { message: "Please enter at least one detail." },
  );

// --- OTC ---

export const OtcRequestSchema = z.object({
  allergies: OptionalText(500),
  medications: OptionalText(500),
});

// --- Search ---

export const ProviderSearchSchema = z.object({
  zip: ZipSchema,
  specialty: z.string().trim().min(2, "Specialty must be at least 2 characters").max(200),
  radiusMiles: z.number().positive().max(100).default(25),
});

export const SelectProviderSchema = z.object({
  index: z.number(),
});

const HowManySchema = z
  .number()
  .refine((n): n is (typeof HOW_MANY_CHOICES)[number] => HOW_MANY_CHOICES.some((c) => c === n), {
    message: `howMany must be one of ${HOW_MANY_CHOICES.join(", ")}`,
  });

export const FacilitySearchSchema = z.object({
  kind: z.enum(["lab", "pharmacy"]),
  zip: ZipSchema,
  radiusMiles: z.number().int().min(1).max(25).default(5),
  howMany: HowManySchema.default(10),
});

// --- Booking ---

export const AppointmentSchema = z.object({
  firstName: z.string().trim().min(1, "First name is required").max(100),
  lastName: z.string().trim().min(1, "Last name is required").max(100),
  phone: z.string().trim().min(1, "Phone number is required").max(40),
  insurance: z.string().trim().min(1, "Insurance name is required").max(200),
  date: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, "Date must be YYYY-MM-DD")
    .refine(isCalendarDate, "Please enter a real calendar date."),
  time: z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, "Time must be HH:MM"),
  reason: OptionalText(4000),
});

// --- Contact ---

export const ContactSchema = z.object({
  name: OptionalText(200),
  email: OptionalText(320),
  subject: OptionalText(300),
  message: z.string().trim().min(1, "Please enter a message.").max(5000),
});

export type SymptomIntakeBody = z.infer<typeof SymptomIntakeSchema>;
export type FacilitySearchBody = z.infer<typeof FacilitySearchSchema>;
export type AppointmentBody = z.infer<typeof AppointmentSchema>;
export type ContactBody = z.infer<typeof ContactSchema>;
