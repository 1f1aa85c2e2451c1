/**
 * Base command interface for CLI entry points.
 */

export interface CliCommand {
  /** Program name shown in usage output */
  name: string;

  /** Command description for help text */
  description: string;

  /** Execute the command with the raw process arguments (without the program name) */
  execute(argv: string[]): Promise<number>; // Exit code: 0 = success, 1+ = error
}
