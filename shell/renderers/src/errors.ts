/**
 * Render error classes
 */
import { OperatorError } from "@operator/utils";

export interface TemplateLocation {
  line?: number | undefined;
  column?: number | undefined;
}

export class TemplateError extends OperatorError {
  constructor(
    template: string,
    reason: string,
    location: TemplateLocation = {},
    cause?: unknown,
  ) {
    const at =
      location.line === undefined
        ? ""
        : ` (line ${location.line}${location.column === undefined ? "" : `, column ${location.column}`})`;
    super(
      `Template ${template} failed${at}: ${reason}`,
      "TemplateError",
      { template, line: location.line, column: location.column },
      cause,
    );
  }
}

export type RecursionReason = "self-reference" | "cycle" | "depth";

export class RecursionError extends OperatorError {
  constructor(route: string, trail: readonly string[], reason: RecursionReason) {
    const description = {
      "self-reference": `${route} includes itself`,
      cycle: `${route} is already being rendered`,
      depth: `nesting is deeper than ${trail.length} renders`,
    }[reason];
    super(
      `Recursive render of ${route}: ${description} (${[...trail, route].join(" -> ")})`,
      "RecursionError",
      { route, trail: [...trail], reason },
    );
  }
}

export interface ExecutableFailure {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stderr: string;
  timedOut: boolean;
}

export class ExecutableError extends OperatorError {
  public readonly exitCode: number | null;
  public readonly signal: NodeJS.Signals | null;
  public readonly stderr: string;
  public readonly timedOut: boolean;

  constructor(
    program: string,
    reason: string,
    failure: ExecutableFailure,
    cause?: unknown,
  ) {
    super(
      `Executable ${program} ${reason}`,
      "ExecutableError",
      { program, ...failure },
      cause,
    );
    this.exitCode = failure.exitCode;
    this.signal = failure.signal;
    this.stderr = failure.stderr;
    this.timedOut = failure.timedOut;
  }
}
