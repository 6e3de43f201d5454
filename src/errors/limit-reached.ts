/**
 * Control-flow signal thrown by a limit consumer once its quota is used up.
 *
 * This is not an `Error`: it carries no stack and is not part of the error
 * taxonomy. Only a pipeline driver catches it, and treats it as the normal
 * end of the stream.
 */
export class LimitReachedSignal {
  readonly limit: number;

  constructor(limit: number) {
    this.limit = limit;
  }
}

export function isLimitReached(value: unknown): value is LimitReachedSignal {
  return value instanceof LimitReachedSignal;
}
