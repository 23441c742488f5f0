/**
 * Ways an image job can fail.
 *
 * - BackendUnavailable: transport failure (refused, DNS, per-call timeout)
 * - BackendRejected: submission answered with a non-success status
 * - Timeout: the result did not appear within the poll budget
 * - MalformedPayload: the result is not in a recognized shape
 * - RetrievalFailed: fetching a server-side file reference failed
 * - Cancelled: the caller gave up before the job finished
 */
export type ImageJobFailureKind =
  | 'BackendUnavailable'
  | 'BackendRejected'
  | 'Timeout'
  | 'MalformedPayload'
  | 'RetrievalFailed'
  | 'Cancelled';

export class ImageJobError extends Error {
  constructor(
    readonly kind: ImageJobFailureKind,
    message: string,
    readonly context: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ImageJobError';
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      context: this.context,
    };
  }
}
