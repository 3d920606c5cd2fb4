/**
 * Error types thrown by the engine.
 *
 * Only configuration problems throw. Render failures are reported through
 * the context's onError handler, and everything else is a silent no-op.
 */

export class LazylineError extends Error {
  constructor(message: string) {
    super(`[lazyline] ${message}`);
    this.name = 'LazylineError';
  }
}

/** A layout entry failed validation. `path` points at it, e.g. "left[1].components[0]". */
export class LazylineConfigError extends LazylineError {
  constructor(
    readonly path: string,
    readonly reason: string
  ) {
    super(`${path}: ${reason}`);
    this.name = 'LazylineConfigError';
  }
}
