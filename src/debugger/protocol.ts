import { BreakpointTarget, Debugger, DebugResult, Inspection, RunState, Transition } from "../vm/debugger";
import { BFError } from "../vm/errors";
import {
  ContextStyle,
  formatContext,
  formatInstruction,
  hex,
  hexdumpTape,
  stringifyProgram,
  unitAt,
} from "../vm/util";

export type DebugResponse =
  | { ok: true; kind: "transition"; transition: Transition; text: string }
  | { ok: true; kind: "text"; text: string }
  | { ok: true; kind: "quit"; text: string }
  | { ok: false; kind: "error"; text: string };

export const HELP_TEXT = [
  "Available commands:",
  "  run                  - start or resume execution until a breakpoint or halt",
  "  c / continue         - continue execution until a breakpoint or halt",
  "  s / step / ni        - execute one instruction",
  "  n / next             - execute until the current unit is left",
  "  b / break <target>   - set a breakpoint on a unit name or an index (decimal or 0x hex)",
  "  cl / clear <target>  - clear a breakpoint",
  "  bl / breakpoints     - list breakpoints",
  "  p / print <what>     - print tape, pointer, unit, instruction, program or context",
  "  t / tape             - print the tape",
  "  ctx / context        - print tape, program and registers",
  "  h / help             - print this message",
  "  q / quit             - quit the debugger",
  "An empty line repeats the previous command.",
].join("\n");

/**
 * Parse a breakpoint argument: `0x`-prefixed hex or plain decimal digits are
 * instruction indices, anything else is a unit name.
 */
export function parseBreakpointTarget(argument: string): BreakpointTarget | null {
  const text = argument.trim();
  if (text.length === 0) {
    return null;
  }
  if (/^0x[0-9a-f]+$/i.test(text)) {
    return parseInt(text.slice(2), 16);
  }
  if (/^\d+$/.test(text)) {
    return Number(text);
  }
  return text;
}

function errorResponse(error: BFError | string): DebugResponse {
  return { ok: false, kind: "error", text: typeof error === "string" ? error : error.message };
}

/**
 * Turns textual debugger commands into calls on a Debugger and renders the
 * outcome of each as a structured response.
 */
export class DebugCommandProcessor {
  private lastCommand: string | null = null;

  constructor(private readonly session: Debugger, private readonly style: ContextStyle = {}) {}

  execute(line: string): DebugResponse {
    let input = line.trim();
    if (input.length === 0) {
      if (this.lastCommand === null) {
        return { ok: true, kind: "text", text: "" };
      }
      input = this.lastCommand;
    }
    this.lastCommand = input;

    const [word] = input.split(/\s+/, 1);
    const argument = input.slice(word.length).trim();

    switch (word.toLowerCase()) {
      case "h":
      case "help":
        return { ok: true, kind: "text", text: HELP_TEXT };
      case "q":
      case "quit":
        this.session.quit();
        return { ok: true, kind: "quit", text: "Exiting debugger!" };
      case "r":
      case "run":
        return this.transition(this.session.run());
      case "c":
      case "continue":
        return this.transition(this.session.continue());
      case "s":
      case "step":
      case "ni":
        return this.transition(this.session.step());
      case "n":
      case "next":
        return this.transition(this.session.stepUnit());
      case "b":
      case "break":
        return this.setBreakpoint(argument);
      case "cl":
      case "clear":
        return this.clearBreakpoint(argument);
      case "bl":
      case "breakpoints":
        return this.print("breakpoints");
      case "t":
      case "tape":
        return this.print("tape");
      case "ctx":
      case "context":
        return this.print("context");
      case "p":
      case "print":
        return this.print(argument.toLowerCase() || "context");
      default:
        return errorResponse(`Unknown command: ${input}`);
    }
  }

  private transition(result: DebugResult<Transition>): DebugResponse {
    if (!result.ok) {
      return errorResponse(result.error);
    }
    return { ok: true, kind: "transition", transition: result.value, text: describeTransition(result.value) };
  }

  private setBreakpoint(argument: string): DebugResponse {
    const target = parseBreakpointTarget(argument);
    if (target === null) {
      return errorResponse("Usage: break <unit-or-index>");
    }
    const result = this.session.setBreakpoint(target);
    if (!result.ok) {
      return errorResponse(result.error);
    }
    return { ok: true, kind: "text", text: `Added breakpoint at ${hex(result.value)}` };
  }

  private clearBreakpoint(argument: string): DebugResponse {
    const target = parseBreakpointTarget(argument);
    if (target === null) {
      return errorResponse("Usage: clear <unit-or-index>");
    }
    const result = this.session.clearBreakpoint(target);
    if (!result.ok) {
      return errorResponse(result.error);
    }
    const { index, removed } = result.value;
    return { ok: true, kind: "text", text: removed ? `Cleared breakpoint at ${hex(index)}` : `No breakpoint at ${hex(index)}` };
  }

  /**
   * Render an inspection view without recording it as the last command.
   */
  print(what: string): DebugResponse {
    const result = this.session.inspect();
    if (!result.ok) {
      return errorResponse(result.error);
    }
    const text = this.render(what, result.value);
    return text === null ? errorResponse(`Cannot print '${what}'`) : { ok: true, kind: "text", text };
  }

  private render(what: string, view: Inspection): string | null {
    const { program } = this.session;
    switch (what) {
      case "tape":
        return hexdumpTape(view.tape, { highlight: this.style.highlight });
      case "pointer":
        return `TP: ${hex(view.pointer)} (cell = ${view.cell})`;
      case "unit":
        return view.unit ?? "(none)";
      case "instruction":
        return view.instruction === null
          ? `${hex(view.cursor)}: (end of program)`
          : `${hex(view.cursor)}: ${formatInstruction(view.instruction)}`;
      case "program":
        return stringifyProgram(program, { cursor: view.cursor, breakpoints: new Set(view.breakpoints) });
      case "breakpoints":
        if (view.breakpoints.length === 0) {
          return "No breakpoints";
        }
        return view.breakpoints
          .map(index => {
            const unit = unitAt(program, index);
            return unit ? `${hex(index)} (${unit.name})` : hex(index);
          })
          .join("\n");
      case "context":
        return formatContext(
          { program, tape: view.tape, cursor: view.cursor, breakpoints: new Set(view.breakpoints), state: view.state },
          this.style
        );
      default:
        return null;
    }
  }
}

export function describeTransition(transition: Transition): string {
  const where = `${hex(transition.cursor)}${transition.unit === null ? "" : ` (${transition.unit})`}`;
  switch (transition.state) {
    case RunState.PausedAtBreakpoint:
      return `Hit breakpoint at ${where}`;
    case RunState.PausedByStep:
    case RunState.Running:
      return `Paused at ${where}`;
    case RunState.Halted:
      return "Program has halted";
    case RunState.Errored:
      return `Program has halted with an error at ${hex(transition.cursor)}: ${transition.error ? transition.error.message : "unknown error"}`;
  }
}
