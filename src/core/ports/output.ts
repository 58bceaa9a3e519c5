/**
 * Output Port Interface
 *
 * Defines the contract for all user-facing output operations.
 * Commands use this interface instead of console.log directly.
 */

export interface OutputPort {
  /** Display an informational message */
  info(message: string): void;

  /** Display a success message */
  success(message: string): void;

  /** Display an error message */
  error(message: string): void;

  /** Display a warning message */
  warn(message: string): void;

  /** Display a note block with optional title */
  note(content: string, title?: string): void;
}
