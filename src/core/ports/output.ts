/**
 * Output Port Interface
 *
 * Defines the contract for all user-facing output operations.
 * Core logic uses this interface instead of console.log directly.
 *
 * Implementations:
 *   - consoleOutput (CLI/CI): routes to plain console.log
 *   - test collectors: record messages for assertions
 */

export interface OutputPort {
  /** Display an informational message */
  info(message: string): void;

  /** Display a step/progress indicator */
  step(message: string): void;

  /** Display a plain message */
  message(message: string): void;

  /** Display a success message */
  success(message: string): void;
}
