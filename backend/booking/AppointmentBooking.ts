import type { Candidate } from "../domain/Candidate";
import { PreconditionError } from "../domain/Errors";
import type { IntakeSession } from "../domain/IntakeSession";
import type { IntakeRepository } from "../repository/IntakeRepository";

// Booking step
// - Uses the carried-forward provider exactly as selected; nothing is re-fetched.
// - Dates are calendar dates: formatting never passes through a local time zone.

const WEEKDAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];
const MONTHS = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
];

export type AppointmentRequest = Readonly<{
  firstName: string;
  lastName: string;
  phone: string;
  insurance: string;

  // YYYY-MM-DD
  date: string;
  // HH:MM (24h)
  time: string;

  // Defaults to the text built by defaultReason().
  reason?: string;
}>;

export type ProviderBlock = Readonly<{
  name: string;
  category: string;
  registryId?: string;
  phone: string;
  address: string;
  postalCode: string;
  distanceMiles?: number;
}>;

export type BookingConfirmation = Readonly<{
  appointmentId: number;
  message: string;
  provider: ProviderBlock;
  patient: Readonly<{ firstName: string; lastName: string; phone: string; insurance: string }>;
  reason: string;
}>;

const pad2 = (n: number): string => String(n).padStart(2, "0");

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

// Date.UTC rolls 2025-02-30 over to March 2; a real date survives the round trip.
function toUtcDate(year: number, month: number, day: number): Date | null {
  const d = new Date(Date.UTC(year, month - 1, day));
  return d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day ? d : null;
}

export function isCalendarDate(isoDate: string): boolean {
  const m = ISO_DATE.exec(isoDate);
  return m !== null && toUtcDate(Number(m[1]), Number(m[2]), Number(m[3])) !== null;
}

// "2025-03-07" -> "Friday, March 07, 2025"
export function formatAppointmentDate(isoDate: string): string {
  const m = ISO_DATE.exec(isoDate);
  if (!m) throw new Error(`Invalid date: ${isoDate}. Expected YYYY-MM-DD.`);

  const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const d = toUtcDate(year, month, day);
  if (!d) throw new Error(`Invalid date: ${isoDate}.`);

  return `${WEEKDAYS[d.getUTCDay()]}, ${MONTHS[month - 1]} ${pad2(day)}, ${year}`;
}

// "14:05" -> "02:05 PM"
export function formatAppointmentTime(hhmm: string): string {
  const m = /^(\d{2}):(\d{2})$/.exec(hhmm);
  const hours = Number(m?.[1]);
  const minutes = Number(m?.[2]);
  if (!m || hours > 23 || minutes > 59) throw new Error(`Invalid time: ${hhmm}. Expected HH:MM.`);

  const hour12 = hours % 12 === 0 ? 12 : hours % 12;
  return `${pad2(hour12)}:${pad2(minutes)} ${hours < 12 ? "AM" : "PM"}`;
}

export function defaultReason(symptomsInput: string, conditionSummary: string): string {
  return `Symptoms: ${symptomsInput}\nPossible differentials: ${conditionSummary}\nAdditional reason: `;
}

export function providerBlock(c: Candidate): ProviderBlock {
  return {
    name: c.displayName,
    category: c.category || "Provider",
    registryId: c.source.startsWith("registry-") ? c.id : undefined,
    phone: c.phone || "Not provided",
    address: c.address,
    postalCode: c.postalCode,
    distanceMiles: c.distanceMiles,
  };
}

// Throws PreconditionError when an earlier step has not been completed.
export function bookingContext(session: IntakeSession): { provider: Candidate; symptomsInput: string; conditionSummary: string } {
  const provider = session.selectedProvider;
  if (!provider) throw new PreconditionError("Please select a provider from a doctor search before booking.");

  const symptoms = session.symptoms;
  if (!symptoms || !symptoms.symptomsInput || !symptoms.conditionSummary) {
    throw new PreconditionError("Please complete the symptom checker before booking.");
  }

  return { provider, symptomsInput: symptoms.symptomsInput, conditionSummary: symptoms.conditionSummary };
}

export async function bookAppointment(
  repository: IntakeRepository,
  session: IntakeSession,
  request: AppointmentRequest,
): Promise<BookingConfirmation> {
  const ctx = bookingContext(session);

  const when = `${formatAppointmentDate(request.date)} at ${formatAppointmentTime(request.time)}`;
  const reason = request.reason?.trim() ? request.reason : defaultReason(ctx.symptomsInput, ctx.conditionSummary);

  const appointmentId = await repository.saveAppointment({
    run: session.run,
    providerId: ctx.provider.id,
    providerName: ctx.provider.displayName,
    providerSource: ctx.provider.source,
    patientFirstName: request.firstName.trim(),
    patientLastName: request.lastName.trim(),
    phone: request.phone.trim(),
    insurance: request.insurance.trim(),
    date: request.date,
    time: request.time,
    reason,
  });

  console.log(`[Booking] Appointment ${appointmentId} stored (${ctx.provider.source})`);

  return {
    appointmentId,
    message: `Appointment booked with ${ctx.provider.displayName} on ${when}.`,
    provider: providerBlock(ctx.provider),
    patient: {
      firstName: request.firstName.trim(),
      lastName: request.lastName.trim(),
      phone: request.phone.trim(),
      insurance: request.insurance.trim(),
    },
    reason,
  };
}
