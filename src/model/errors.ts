export type GenomeErrorCode = 'OUT_OF_RANGE' | 'INVALID_ARGUMENT'

export class GenomeError extends Error {
  readonly code: GenomeErrorCode

  constructor(code: GenomeErrorCode, message: string) {
    super(message)
    this.name = 'GenomeError'
    this.code = code
  }
}

export function requireInteger(value: number, what: string, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new GenomeError('INVALID_ARGUMENT', `${what} must be an integer >= ${min}, got ${value}`)
  }
}
