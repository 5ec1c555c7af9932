export type EnvOverlayErrorCode =
  | "CONTEXT_NOT_BOUND"
  | "INVALID_CONTEXT_ID"
  | "CONFIG_INVALID"
  | "PROFILE_NOT_FOUND";

export class EnvOverlayError extends Error {
  code: EnvOverlayErrorCode;
  details?: string;

  constructor(code: EnvOverlayErrorCode, message: string, details?: string) {
    super(message);
    this.name = "EnvOverlayError";
    this.code = code;
    this.details = details;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err ?? "unknown error");
}
