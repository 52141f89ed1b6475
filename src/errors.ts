// Error types shared by the compressor and the CLI

export class HuffmanError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

// Programming errors: malformed trees, unknown symbols, misuse of a container
export class HuffmanContractError extends HuffmanError {}

export type HuffmanDataErrorReason =
  | 'alphabet-too-small'
  | 'incomplete-code'
  | 'corrupt-container'
  | 'output-too-large'
  | 'frequency-overflow'

// Input that cannot be compressed or decoded
export class HuffmanDataError extends HuffmanError {
  readonly reason: HuffmanDataErrorReason

  constructor(reason: HuffmanDataErrorReason, message: string) {
    super(message)
    this.reason = reason
  }
}

export class HuffmanIoError extends HuffmanError {
  readonly path: string

  constructor(path: string, cause: unknown, operation: 'read' | 'write' = 'read') {
    const detail = cause instanceof Error ? cause.message : String(cause)
    super(`Cannot ${operation} ${path}: ${detail}`, { cause })
    this.path = path
  }
}

export function invariant(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new HuffmanContractError(message)
  }
}
