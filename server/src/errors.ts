export class StudyError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

/** Input rejected before any state was touched. */
export class ValidationError extends StudyError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class NotFoundError extends StudyError {
  constructor(message: string) {
    super(message, 404);
  }
}

/** The operation collides with state that already exists, e.g. a running timer. */
export class ConflictError extends StudyError {
  constructor(message: string) {
    super(message, 409);
  }
}
