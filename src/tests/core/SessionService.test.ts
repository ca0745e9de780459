import { describe, it, expect, beforeEach } from 'vitest';
import { buildTestContainer, expectOk, type TestContainer } from '../fixtures';

describe('SessionService', () => {
  let app: TestContainer;

  beforeEach(async () => {
    app = await buildTestContainer();
  });

  it('opens a session carrying the account role', async () => {
    expect(expectOk(await app.workflow.sessions.login('T0000001F', 'password'))).toEqual({
      userId: 'T0000001F',
      role: 'officer',
    });
    expect(app.logger.info).toHaveBeenCalledWith({ userId: 'T0000001F', role: 'officer' }, 'User logged in');
  });

  it('matches user ids regardless of case and padding', async () => {
    expect(expectOk(await app.workflow.sessions.login('  s0000003c ', 'password'))).toEqual({
      userId: 'S0000003C',
      role: 'applicant',
    });
  });

  it('refuses unknown users and wrong passwords alike', async () => {
    const refused = { ok: false, error: { code: 'AuthorizationDenied', message: 'Invalid user ID or password' } };

    expect(await app.workflow.sessions.login('S0000003C', 'not-the-password')).toEqual(refused);
    expect(await app.workflow.sessions.login('S7777777Q', 'password')).toEqual(refused);
    expect(app.logger.warn).toHaveBeenCalledWith({ userId: 'S0000003C' }, 'Login refused');
  });
});
