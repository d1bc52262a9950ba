/**
 * A structured command ready for execution.
 * Steps never build raw command strings; they produce Command objects
 * and the privilege helpers decide whether to wrap them in sudo.
 */
export interface Command {
  readonly argv: string[];
  readonly env?: Record<string, string>;
  readonly stdin?: string;
}
