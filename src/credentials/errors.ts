// ---------------------------------------------------------------------------
// Error taxonomy for credential resolution
// ---------------------------------------------------------------------------

/** No credential could be found through any step of the source chain. */
export class CredentialResolutionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CredentialResolutionError";
  }
}

/** The credential payload cannot be mapped to an identity (bad JSON, unsupported type, userinfo failure). */
export class IdentityResolutionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "IdentityResolutionError";
  }
}

/** A Google API answered with a non-200 status or a body we could not understand. */
export class UpstreamError extends Error {
  readonly endpoint: string;
  readonly status: number;

  constructor(message: string, endpoint: string, status: number, options?: ErrorOptions) {
    super(message, options);
    this.name = "UpstreamError";
    this.endpoint = endpoint;
    this.status = status;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
