export type HackerNewsErrorKind =
  | "transport"
  | "status"
  | "decode"
  | "missing"
  | "cancelled";

export class HackerNewsError extends Error {
  readonly kind: HackerNewsErrorKind;
  readonly status?: number;

  constructor(
    kind: HackerNewsErrorKind,
    message: string,
    options: { status?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "HackerNewsError";
    this.kind = kind;
    this.status = options.status;
  }
}

export const isCancelled = (error: unknown): boolean =>
  error instanceof HackerNewsError && error.kind === "cancelled";

export const cancelledError = (): HackerNewsError =>
  new HackerNewsError("cancelled", "Request cancelled");
