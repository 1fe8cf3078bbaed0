export interface ResultError<TCode extends string = string> {
  readonly code: TCode;
  readonly message: string;
}

export type Result<TValue, TError extends ResultError = ResultError> =
  | { readonly ok: true; readonly value: TValue }
  | { readonly ok: false; readonly error: TError };

export const ok = <TValue>(value: TValue): { readonly ok: true; readonly value: TValue } => ({
  ok: true as const,
  value
});

export const err = <TError extends ResultError>(error: TError): { readonly ok: false; readonly error: TError } => ({
  ok: false as const,
  error
});
