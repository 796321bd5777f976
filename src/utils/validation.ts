/**
 * Validation utilities for the simulation kernel.
 * Every validator throws ValidationError with the offending value in its context.
 *
 * @example
 * ```typescript
 * import { ValidationError } from 'des-kernel';
 *
 * try {
 *   sim.schedule(-5, producer, { kind: 'produce' });
 * } catch (error) {
 *   if (error instanceof ValidationError) {
 *     console.log(error.message); // "delay must be non-negative (got -5). ..."
 *     console.log(error.context); // { delay: -5 }
 *   }
 * }
 * ```
 */

/**
 * Error thrown when an argument passed to the kernel is out of range.
 * Carries an optional context object for debugging.
 *
 * @example
 * ```typescript
 * throw new ValidationError('capacity must be positive', { capacity: 0 });
 * ```
 */
export class ValidationError extends Error {
  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Validate that a number is non-negative (>= 0).
 *
 * @param paramName - Name of the parameter (for error message)
 * @param context - Hint appended to the error message (optional)
 *
 * @throws {ValidationError} If value < 0
 *
 * @example
 * ```typescript
 * validateNonNegative(5, 'delay'); // OK
 * validateNonNegative(-1, 'delay'); // Throws ValidationError
 * ```
 */
export function validateNonNegative(
  value: number,
  paramName: string,
  context?: string
): void {
  if (value < 0) {
    const msg = context
      ? `${paramName} must be non-negative (got ${value}). ${context}`
      : `${paramName} must be non-negative (got ${value})`;
    throw new ValidationError(msg, { [paramName]: value });
  }
}

/**
 * Validate that a number is at least a minimum value.
 *
 * @throws {ValidationError} If value < minimum
 */
export function validateMinimum(
  value: number,
  minimum: number,
  paramName: string,
  context?: string
): void {
  if (value < minimum) {
    const msg = context
      ? `${paramName} must be at least ${minimum} (got ${value}). ${context}`
      : `${paramName} must be at least ${minimum} (got ${value})`;
    throw new ValidationError(msg, { [paramName]: value, minimum });
  }
}

/**
 * Validate that a number is finite (not NaN or Infinity).
 *
 * @throws {ValidationError} If value is NaN or Infinity
 */
export function validateFinite(
  value: number,
  paramName: string,
  context?: string
): void {
  if (!Number.isFinite(value)) {
    const msg = context
      ? `${paramName} must be a finite number (got ${value}). ${context}`
      : `${paramName} must be a finite number (got ${value})`;
    throw new ValidationError(msg, { [paramName]: value });
  }
}

/**
 * Validate that a number is an integer.
 *
 * @throws {ValidationError} If value is not an integer
 */
export function validateInteger(
  value: number,
  paramName: string,
  context?: string
): void {
  if (!Number.isInteger(value)) {
    const msg = context
      ? `${paramName} must be an integer (got ${value}). ${context}`
      : `${paramName} must be an integer (got ${value})`;
    throw new ValidationError(msg, { [paramName]: value });
  }
}

/**
 * Validate a queue capacity.
 * A capacity is either a positive integer or Infinity (unbounded).
 *
 * @param queueName - Included in the message when given
 *
 * @throws {ValidationError} If capacity is not a positive integer or Infinity
 *
 * @example
 * ```typescript
 * validateCapacity(5); // OK
 * validateCapacity(Infinity); // OK
 * validateCapacity(0, 'inbox'); // Throws: "Queue 'inbox' must hold at least 1 item"
 * validateCapacity(2.5); // Throws: capacity must be a whole number
 * ```
 */
export function validateCapacity(capacity: number, queueName?: string): void {
  if (capacity === Infinity) {
    return;
  }

  const name = queueName ? `Queue '${queueName}'` : 'Queue';

  validateFinite(capacity, 'capacity', `${name} capacity must be a valid number or Infinity`);
  validateInteger(capacity, 'capacity', `${name} capacity must be a whole number`);
  validateMinimum(capacity, 1, 'capacity', `${name} must hold at least 1 item`);
}

/**
 * Validate a simulation time or delay.
 * Ensures the value is finite and non-negative.
 *
 * @param paramName - Name of the parameter (default: 'time')
 *
 * @throws {ValidationError} If time is not finite or is negative
 *
 * @example
 * ```typescript
 * validateTime(10); // OK
 * validateTime(0, 'delay'); // OK
 * validateTime(NaN); // Throws: time must be a finite number
 * ```
 */
export function validateTime(time: number, paramName: string = 'time'): void {
  validateFinite(time, paramName, 'Simulation time must be a valid number');
  validateNonNegative(time, paramName, 'Simulation time cannot be negative');
}

/**
 * Validate a step count for bounded execution.
 *
 * @throws {ValidationError} If steps is not a non-negative integer
 */
export function validateStepCount(steps: number, paramName: string = 'steps'): void {
  validateFinite(steps, paramName, 'Use Executor.unbound() to run until the scheduler is empty');
  validateInteger(steps, paramName);
  validateNonNegative(steps, paramName);
}
