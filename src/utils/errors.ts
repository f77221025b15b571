/**
 * Raised when a collaborator outside the service (row store, image host) fails.
 * The workflow never retries; callers map it to a gateway error.
 */
export class UpstreamFailureError extends Error {
  readonly collaborator: string;

  constructor(collaborator: string, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'UpstreamFailureError';
    this.collaborator = collaborator;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
