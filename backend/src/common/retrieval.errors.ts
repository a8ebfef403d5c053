export type RetrievalErrorCode = 'INVALID_ARGUMENT' | 'NOT_FOUND' | 'EMPTY_INPUT';

export class RetrievalError extends Error {
  public readonly code: RetrievalErrorCode;
  public readonly cause?: Error;

  constructor(
    code: RetrievalErrorCode,
    message: string,
    options?: { cause?: Error },
  ) {
    super(message);
    this.code = code;
    this.name = 'RetrievalError';
    if (options?.cause) {
      this.cause = options.cause;
    }
  }
}

export const invalidArgument = (message: string): RetrievalError =>
  new RetrievalError('INVALID_ARGUMENT', message);

export const notFound = (message: string): RetrievalError =>
  new RetrievalError('NOT_FOUND', message);

export const emptyInput = (message: string): RetrievalError =>
  new RetrievalError('EMPTY_INPUT', message);
