export type ReportFailureKind = "api" | "input";

/**
 * Fatal failure of a report run. `api` covers every GitHub request failure,
 * `input` covers malformed timestamps, checkpoints and configuration.
 */
export class ReportFailure extends Error {
  name = "ReportFailure";
  constructor(
    readonly kind: ReportFailureKind,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));

/** Awaits a GitHub request, rethrowing its failure as an `api` ReportFailure. */
export async function ghRequest<T>(what: string, request: Promise<T>): Promise<T> {
  return await request.catch((error: unknown) => {
    if (error instanceof ReportFailure) throw error;
    throw new ReportFailure("api", `FAIL TO ${what}: ${describeError(error)}`, { cause: error });
  });
}

export const inputFailure = (message: string, cause?: unknown) =>
  new ReportFailure("input", cause === undefined ? message : `${message}: ${describeError(cause)}`, { cause });
