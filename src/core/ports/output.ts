/**
 * Output Port Interface
 *
 * Abstraction over user-facing output so that the pack pipeline can be
 * driven from the CLI, from tests, or embedded in another tool without
 * writing to the terminal directly.
 */

export interface OutputPort {
  /** Display an informational message */
  info(message: string): void;

  /** Display a step/progress indicator */
  step(message: string): void;

  /** Display a success message */
  success(message: string): void;

  /** Display a warning message */
  warn(message: string): void;

  /** Display an error message */
  error(message: string): void;

  /** Display a note block with optional title */
  note(content: string, title?: string): void;
}
