/**
 * Error thrown when the kernel's internal bookkeeping is inconsistent:
 * an event addressed to an unknown component, a handle that does not match
 * its stored slot, a queue id the state never issued, or a clock asked to
 * move backwards.
 *
 * These indicate a bug or a handle used outside the state that minted it.
 * They are not meant to be caught and recovered from.
 */
export class InvariantError extends Error {
  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = 'InvariantError';
    Object.setPrototypeOf(this, InvariantError.prototype);
  }
}
