import type { Logger, OfficerAccount, UserAccount, UserRepository, UserRole } from "../ports";
import { fail, succeed, type OperationResult } from "../domain/errors";

/**
 * Who is acting. Created by login and passed to every operation explicitly;
 * there is no process-wide current user.
 */
export interface Session {
  userId: string;
  role: UserRole;
}

export class SessionService {
  constructor(
    private readonly users: UserRepository,
    private readonly logger: Logger,
  ) {}

  // Plain comparison: credential storage is outside this system's concerns
  async login(userId: string, credential: string): Promise<OperationResult<Session>> {
    const account = await this.users.findById(userId.trim());
    if (!account || account.credential !== credential) {
      this.logger.warn({ userId }, "Login refused");
      return fail("AuthorizationDenied", "Invalid user ID or password");
    }

    this.logger.info({ userId, role: account.role }, "User logged in");
    return succeed({ userId: account.person.id, role: account.role });
  }
}

// Reloads the account behind a session so checks always see the stored record
export async function resolveActor(
  users: UserRepository,
  session: Session,
): Promise<OperationResult<UserAccount>> {
  const account = await users.findById(session.userId);
  if (!account || account.role !== session.role) {
    return fail("AuthorizationDenied", `Session for ${session.userId} is no longer valid`);
  }
  return succeed(account);
}

export async function resolveManager(
  users: UserRepository,
  session: Session,
): Promise<OperationResult<UserAccount>> {
  const actor = await resolveActor(users, session);
  if (actor.ok && actor.value.role !== "manager") {
    return fail("AuthorizationDenied", "Only managers can perform this action");
  }
  return actor;
}

export async function resolveOfficer(
  users: UserRepository,
  session: Session,
): Promise<OperationResult<OfficerAccount>> {
  const actor = await resolveActor(users, session);
  if (!actor.ok) {
    return actor;
  }
  const account = actor.value;
  if (account.role !== "officer") {
    return fail("AuthorizationDenied", "Only officers can perform this action");
  }
  return succeed(account);
}

// Applicants and officers share the applicant capability; managers do not apply
export async function resolveApplicant(
  users: UserRepository,
  session: Session,
): Promise<OperationResult<UserAccount>> {
  const actor = await resolveActor(users, session);
  if (actor.ok && actor.value.role === "manager") {
    return fail("AuthorizationDenied", "Managers cannot act as applicants");
  }
  return actor;
}
