export type HousingErrorCode =
  | "EligibilityDenied"
  | "DuplicateActiveApplication"
  | "UnitsExhausted"
  | "InvalidStateTransition"
  | "AuthorizationDenied"
  | "NotFound"
  | "SlotExhausted"
  | "ApplicationWindowClosed"
  | "InvalidInput";

export interface HousingError {
  code: HousingErrorCode;
  message: string;
}

export interface Success<T> {
  ok: true;
  value: T;
}

export interface Failure {
  ok: false;
  error: HousingError;
}

// Every workflow operation resolves to one of these; domain failures never throw
export type OperationResult<T> = Success<T> | Failure;

export const succeed = <T>(value: T): Success<T> => ({ ok: true, value });

export const fail = (code: HousingErrorCode, message: string): Failure => ({
  ok: false,
  error: { code, message },
});
