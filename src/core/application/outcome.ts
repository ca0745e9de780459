import type { Logger } from "../ports";
import type { Failure } from "../domain/errors";
import type { Session } from "./session";

// Lock keys shared by every orchestrator. A person key (applicant or officer)
// is always taken before a project key, so two callers never wait in reverse.
export const applicantKey = (applicantId: string): string => `applicant:${applicantId}`;
export const officerKey = (officerId: string): string => `officer:${officerId}`;
export const projectKey = (projectId: number): string => `project:${projectId}`;

// Logs a refused operation and hands the failure back to the caller
export function refuse(logger: Logger, operation: string, session: Session, failure: Failure): Failure {
  logger.warn(
    { operation, userId: session.userId, code: failure.error.code },
    failure.error.message,
  );
  return failure;
}
