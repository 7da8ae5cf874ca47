/* eslint-disable prettier/prettier */
export class ValidationError extends Error {
  status = 400

  constructor(
    readonly field: string,
    message: string
  ) {
    super(message)
    this.name = 'ValidationError'
  }
}

export class NotFoundError extends Error {
  status = 404

  constructor(message = 'not found') {
    super(message)
    this.name = 'NotFoundError'
  }
}

export class ForbiddenError extends Error {
  status = 403

  constructor(message = 'forbidden') {
    super(message)
    this.name = 'ForbiddenError'
  }
}
