import { vi, type Mock } from 'vitest';
import type { Session } from '../core/application/session';
import type { OperationResult } from '../core/domain/errors';
import type { Logger, UserRole } from '../core/ports';
import { buildContainer, type AppContainer } from '../infra/container';
import { PolicySchema } from '../infra/config/policySchema';
import { SeedSchema } from '../infra/config/seedSchema';

export type MockedLogger = {
  [K in keyof Logger]: Mock;
};

export function createMockLogger(): MockedLogger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

// Local midday so the calendar day is the same in every timezone
export const TODAY = new Date(2026, 5, 15, 12, 0);

// Cedar Heights (#1): window 2026-01-01..2026-12-31, 2 x 2-Room, 1 x 3-Room, Fiona already handling it
// Dahlia Vista (#2): no window, no 2-Room units left, one officer slot, manager referenced by name
export const TEST_SEED = {
  applicants: [
    { id: 'S0000001A', name: 'Alicia Tan', age: 35, maritalStatus: 'Single', password: 'password' },
    { id: 'S0000002B', name: 'Bryan Lee', age: 34, maritalStatus: 'Single', password: 'password' },
    { id: 'S0000003C', name: 'Cara Ng', age: 21, maritalStatus: 'Married', password: 'password' },
    { id: 'S0000004D', name: 'Daniel Ho', age: 20, maritalStatus: 'Married', password: 'password' },
    { id: 'S0000005E', name: 'Evan Sim', age: 40, maritalStatus: 'Married', password: 'password' },
  ],
  officers: [
    { id: 'T0000001F', name: 'Fiona Wee', age: 30, maritalStatus: 'Married', password: 'password' },
    { id: 'T0000002G', name: 'Gavin Yap', age: 45, maritalStatus: 'Single', password: 'password' },
    { id: 'T0000003H', name: 'Hana Low', age: 28, maritalStatus: 'Married', password: 'password' },
  ],
  managers: [
    { id: 'M0000001J', name: 'Irene Koh', age: 50, maritalStatus: 'Married', password: 'password' },
    { id: 'M0000002K', name: 'Jacob Lim', age: 47, maritalStatus: 'Single', password: 'password' },
  ],
  projects: [
    {
      name: 'Cedar Heights',
      neighborhood: 'Tampines',
      flatTypes: [
        { type: '2-Room', units: 2, price: 300000 },
        { type: '3-Room', units: 1, price: 400000 },
      ],
      openDate: '2026-01-01',
      closeDate: '2026-12-31',
      manager: 'M0000001J',
      officerSlots: 2,
      officers: ['T0000001F'],
    },
    {
      name: 'Dahlia Vista',
      neighborhood: 'Punggol',
      flatTypes: [
        { type: '2-Room', units: 0, price: 280000 },
        { type: '3-Room', units: 3, price: 380000 },
      ],
      manager: 'Jacob Lim',
      officerSlots: 1,
    },
  ],
};

export const sessions = {
  alicia: { userId: 'S0000001A', role: 'applicant' },
  bryan: { userId: 'S0000002B', role: 'applicant' },
  cara: { userId: 'S0000003C', role: 'applicant' },
  daniel: { userId: 'S0000004D', role: 'applicant' },
  evan: { userId: 'S0000005E', role: 'applicant' },
  fiona: { userId: 'T0000001F', role: 'officer' },
  gavin: { userId: 'T0000002G', role: 'officer' },
  hana: { userId: 'T0000003H', role: 'officer' },
  irene: { userId: 'M0000001J', role: 'manager' },
  jacob: { userId: 'M0000002K', role: 'manager' },
} satisfies Record<string, Session>;

export const sessionFor = (userId: string, role: UserRole): Session => ({ userId, role });

export interface TestContainer extends AppContainer {
  logger: MockedLogger;
}

export async function buildTestContainer(
  options: { policy?: unknown; clock?: () => Date } = {},
): Promise<TestContainer> {
  const logger = createMockLogger();
  const container = await buildContainer({
    policy: PolicySchema.parse(options.policy ?? {}),
    seed: SeedSchema.parse(TEST_SEED),
    logger: logger as unknown as Logger,
    clock: options.clock ?? (() => TODAY),
  });
  return { ...container, logger };
}

// Unwraps a result the test expects to succeed, failing loudly with the error otherwise
export function expectOk<T>(result: OperationResult<T>): T {
  if (!result.ok) {
    throw new Error(`Expected success, got ${result.error.code}: ${result.error.message}`);
  }
  return result.value;
}

// Returns the error code of a result the test expects to fail
export function errorCode<T>(result: OperationResult<T>): string {
  if (result.ok) {
    throw new Error('Expected a failure, got success');
  }
  return result.error.code;
}
