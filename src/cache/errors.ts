export type SizedLruErrorCode = "invalid_configuration";

export class SizedLruError extends Error {
  code: SizedLruErrorCode;
  details: Record<string, unknown>;

  constructor(code: SizedLruErrorCode, message: string, details: Record<string, unknown>) {
    super(message);
    this.name = "SizedLruError";
    this.code = code;
    this.details = details;
  }
}

export function invalidConfiguration(message: string, details: Record<string, unknown>): never {
  throw new SizedLruError("invalid_configuration", message, details);
}
