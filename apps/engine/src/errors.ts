import type { ZodIssue } from "zod";

export type InputErrorCode = "MALFORMED_SAMPLE" | "DUPLICATE_TIMESTAMP" | "INVALID_QUERY" | "INVALID_BODY";

export type InputError = {
  code: InputErrorCode;
  path: string;
  message: string;
};

/** Boundary rejection carrying the HTTP status the route should answer with. */
export class EngineInputRejected extends Error {
  public readonly status: number;
  public readonly errors: InputError[];

  constructor(status: number, errors: InputError[]) {
    super(errors.map((e) => `${e.code}:${e.path}`).join(","));
    this.name = "EngineInputRejected";
    this.status = status;
    this.errors = errors;
  }
}

export function issuesToErrors(code: InputErrorCode, issues: readonly ZodIssue[]): InputError[] {
  return issues.map((i) => ({ code, path: i.path.join(".") || "$", message: i.message }));
}
