export abstract class RunboardError extends Error {
  abstract readonly code: string
  abstract readonly statusCode: number
}

export class PathEscapeError extends RunboardError {
  readonly code = 'PATH_ESCAPE'
  readonly statusCode = 403
  constructor(readonly input: string, root: string) {
    super(`Can't go outside workspace ${root}`)
    this.name = 'PathEscapeError'
  }
}

export class RunNotFoundError extends RunboardError {
  readonly code = 'RUN_NOT_FOUND'
  readonly statusCode = 404
  constructor(readonly runId: string) {
    super(`run ${runId} not found`)
    this.name = 'RunNotFoundError'
  }
}

export class MalformedReportError extends RunboardError {
  readonly code = 'MALFORMED_REPORT'
  readonly statusCode = 500
  constructor(readonly runId: string, detail: string) {
    super(`report for run ${runId} is malformed: ${detail}`)
    this.name = 'MalformedReportError'
  }
}

export class WrongRunTypeError extends RunboardError {
  readonly code = 'WRONG_RUN_TYPE'
  readonly statusCode = 400
  constructor(expected: string) {
    super(`expected a run of type ${expected}`)
    this.name = 'WrongRunTypeError'
  }
}

export class InvalidRequestError extends RunboardError {
  readonly code = 'BAD_REQUEST'
  readonly statusCode = 400
  constructor(message: string) {
    super(message)
    this.name = 'InvalidRequestError'
  }
}

export class DuplicateRunError extends RunboardError {
  readonly code = 'DUPLICATE_RUN'
  readonly statusCode = 409
  constructor(readonly runId: string) {
    super(`run ${runId} already exists`)
    this.name = 'DuplicateRunError'
  }
}

export class InvalidTransitionError extends RunboardError {
  readonly code = 'INVALID_TRANSITION'
  readonly statusCode = 409
  constructor(from: string, to: string) {
    super(`cannot move a run from ${from} to ${to}`)
    this.name = 'InvalidTransitionError'
  }
}
