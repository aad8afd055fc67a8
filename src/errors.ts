export type UpdaterErrorKind =
  | 'ConfigMissing'
  | 'ConfigInvalid'
  | 'NetworkFailure'
  | 'UnexpectedResponseShape'
  | 'FileNotFound'
  | 'MarkerNotFound';

export class UpdaterError extends Error {
  constructor(
    public readonly kind: UpdaterErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'UpdaterError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof UpdaterError) {
    return `${error.kind}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
