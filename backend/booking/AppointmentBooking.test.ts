import type { Candidate } from '../domain/Candidate';
import { PreconditionError } from '../domain/Errors';
import type { IntakeSession } from '../domain/IntakeSession';
import { InMemoryIntakeRepository } from '../repository/InMemoryIntakeRepository';
import {
  bookAppointment,
  defaultReason,
  formatAppointmentDate,
  formatAppointmentTime,
  isCalendarDate,
  providerBlock,
  type AppointmentRequest,
} from './AppointmentBooking';

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

const DOCTOR: Candidate = {
  id: '1234567890',
  displayName: 'Jane Roe, MD',
  category: 'Cardiology',
  phone: '',
  address: '1 Ocean Dr, Miami, FL',
  postalCode: '33139',
  distanceMiles: 4.2,
  source: 'registry-individual',
  extra: {},
};

const SESSION: IntakeSession = {
  sessionId: 's1',
  createdAt: '2025-03-01T00:00:00.000Z',
  symptoms: {
    symptomsInput: 'chest pain, Age 50',
    conditionSummary: '- Angina',
    diagnoses: [],
    suggestedSpecialties: ['Cardiology'],
    primarySpecialty: 'Cardiology',
    emergencyKeywords: [],
  },
  run: { runId: 'run-1', contactId: 7 },
  selectedProvider: DOCTOR,
};

const REQUEST: AppointmentRequest = {
  firstName: ' Ana ',
  lastName: 'Diaz',
  phone: '555-0100 ',
  insurance: 'Acme Health',
  date: '2025-03-07',
  time: '14:05',
};

test('formatAppointmentDate spells out calendar dates', () => {
  expect(formatAppointmentDate('2025-03-07')).toBe('Friday, March 07, 2025');
  expect(formatAppointmentDate('2024-02-29')).toBe('Thursday, February 29, 2024');
  expect(() => formatAppointmentDate('2025-02-29')).toThrow('Invalid date: 2025-02-29.');
  expect(() => formatAppointmentDate('03/07/2025')).toThrow('Invalid date: 03/07/2025. Expected YYYY-MM-DD.');
});

test('isCalendarDate accepts only dates that exist', () => {
  expect(isCalendarDate('2024-02-29')).toBe(true);
  expect(isCalendarDate('2025-02-30')).toBe(false);
  expect(isCalendarDate('2025-04-31')).toBe(false);
  expect(isCalendarDate('2025-3-7')).toBe(false);
});

test('formatAppointmentTime uses a 12-hour clock', () => {
  expect(formatAppointmentTime('14:05')).toBe('02:05 PM');
  expect(formatAppointmentTime('00:30')).toBe('12:30 AM');
  expect(formatAppointmentTime('12:00')).toBe('12:00 PM');
  expect(formatAppointmentTime('23:59')).toBe('11:59 PM');
  expect(() => formatAppointmentTime('24:00')).toThrow('Invalid time: 24:00. Expected HH:MM.');
  expect(() => formatAppointmentTime('9:00')).toThrow('Invalid time: 9:00. Expected HH:MM.');
});

test('providerBlock shows registry ids only for registry sources', () => {
  expect(providerBlock(DOCTOR)).toEqual({
    name: 'Jane Roe, MD',
    category: 'Cardiology',
    registryId: '1234567890',
    phone: 'Not provided',
    address: '1 Ocean Dr, Miami, FL',
    postalCode: '33139',
    distanceMiles: 4.2,
  });
  const place = providerBlock({ ...DOCTOR, id: 'place-1', category: '', source: 'places-doctor' });
  expect(place.registryId).toBeUndefined();
  expect(place.category).toBe('Provider');
});

test('bookAppointment stores the carried-forward provider', async () => {
  const repository = new InMemoryIntakeRepository();

  const confirmation = await bookAppointment(repository, SESSION, REQUEST);

  expect(confirmation.appointmentId).toBe(1);
  expect(confirmation.message).toBe('Appointment booked with Jane Roe, MD on Friday, March 07, 2025 at 02:05 PM.');
  expect(confirmation.reason).toBe(defaultReason('chest pain, Age 50', '- Angina'));
  expect(confirmation.reason).toBe('Symptoms: chest pain, Age 50\nPossible differentials: - Angina\nAdditional reason: ');
  expect(confirmation.patient).toEqual({ firstName: 'Ana', lastName: 'Diaz', phone: '555-0100', insurance: 'Acme Health' });
  expect(repository.listAppointments()[0]).toEqual({
    id: 1,
    run: { runId: 'run-1', contactId: 7 },
    providerId: '1234567890',
    providerName: 'Jane Roe, MD',
    providerSource: 'registry-individual',
    patientFirstName: 'Ana',
    patientLastName: 'Diaz',
    phone: '555-0100',
    insurance: 'Acme Health',
    date: '2025-03-07',
    time: '14:05',
    reason: confirmation.reason,
  });
});

test('bookAppointment keeps a reason the patient wrote', async () => {
  const confirmation = await bookAppointment(new InMemoryIntakeRepository(), SESSION, { ...REQUEST, reason: 'Follow-up' });
  expect(confirmation.reason).toBe('Follow-up');
});

test('bookAppointment requires a selected provider and a symptom summary', async () => {
  const repository = new InMemoryIntakeRepository();

  await expect(bookAppointment(repository, { ...SESSION, selectedProvider: undefined }, REQUEST)).rejects.toThrow(
    'Please select a provider from a doctor search before booking.',
  );
  await expect(bookAppointment(repository, { ...SESSION, symptoms: undefined }, REQUEST)).rejects.toBeInstanceOf(
    PreconditionError,
  );
  expect(repository.listAppointments()).toHaveLength(0);
});

test('bookAppointment validates the date before storing', async () => {
  const repository = new InMemoryIntakeRepository();
  await expect(bookAppointment(repository, SESSION, { ...REQUEST, date: '2025-13-01' })).rejects.toThrow(
    'Invalid date: 2025-13-01.',
  );
  expect(repository.listAppointments()).toHaveLength(0);
});
