import type { Diagnostic } from "./diagnostic";

export type FailureReason =
  | "lex-error"
  | "parse-error"
  | "transform-error"
  | "runtime-error"
  | "internal-error";

export interface Failure {
  reason: FailureReason;
  message: string;
  diagnostics: Diagnostic[];
  cause?: unknown;
}

export function failure(
  reason: FailureReason,
  message: string,
  opts?: Partial<Omit<Failure, "reason" | "message">>
): Failure {
  return {
    reason,
    message,
    diagnostics: opts?.diagnostics ?? [],
    cause: opts?.cause,
  };
}

export function isFailureReason(f: Failure, reason: FailureReason): boolean {
  return f.reason === reason;
}
