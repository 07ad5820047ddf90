import { auditActionFor } from './audit';

test('auditActionFor maps state-changing paths', () => {
  expect(auditActionFor('/api/appointments')).toEqual({ action: 'appointment_booked', resource: 'booking' });
  expect(auditActionFor('/api/providers/select')).toEqual({ action: 'provider_selected', resource: 'session' });
  expect(auditActionFor('/api/health')).toBeUndefined();
});
