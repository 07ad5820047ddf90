import jwt from 'jsonwebtoken';
import { SessionTokens, SESSION_TOKEN_EXPIRY_SECONDS } from './auth';

test('issued tokens verify back to the session id', () => {
  const tokens = new SessionTokens('test-secret');
  const payload = tokens.verify(tokens.issue('session-1'));

  expect(payload.sessionId).toBe('session-1');
  expect((payload.exp ?? 0) - (payload.iat ?? 0)).toBe(SESSION_TOKEN_EXPIRY_SECONDS);
});

test('tokens signed with another secret are rejected', () => {
  const token = new SessionTokens('other-secret').issue('session-1');
  expect(() => new SessionTokens('test-secret').verify(token)).toThrow(jwt.JsonWebTokenError);
});

test('expired tokens are rejected', () => {
  const token = jwt.sign({ sid: 'session-1' }, 'test-secret', { expiresIn: -10 });
  expect(() => new SessionTokens('test-secret').verify(token)).toThrow(jwt.TokenExpiredError);
});

test('tokens without a session id are rejected', () => {
  const token = jwt.sign({ user: 'x' }, 'test-secret');
  expect(() => new SessionTokens('test-secret').verify(token)).toThrow();
});
