export class LinespamError extends Error {
  constructor(
    message: string,
    public code: string,
    public cause?: unknown
  ) {
    super(message);
    this.name = 'LinespamError';
  }
}

export class InvalidInputError extends LinespamError {
  constructor(message: string, public field: string) {
    super(message, 'INVALID_INPUT');
    this.name = 'InvalidInputError';
  }
}

export class WorkerError extends LinespamError {
  constructor(message: string, public workerId: string, cause?: unknown) {
    super(message, 'WORKER_ERROR', cause);
    this.name = 'WorkerError';
  }
}
