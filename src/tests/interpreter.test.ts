/**
 * Interpreter: stepping, EOF behaviours, boundary faults and equivalence with
 * unoptimized execution
 */

import { parseProgram } from "../parser";
import { runInContext } from "../runner/bfRunner";
import { BoundaryPolicy, EofBehavior } from "../vm/config";
import { BoundaryError, ExecutionLimitError, InputExhaustedError } from "../vm/errors";
import { Interpreter, MachineState } from "../vm/interpreter";
import { BufferInput, BufferOutput } from "../vm/io";
import { compile, runReference } from "./utils";

function bytes(data: Uint8Array): number[] {
  return Array.from(data);
}

describe("Interpreter", () => {
  describe("Programs", () => {
    test("prints a counted cell", () => {
      const { result, stdout } = runInContext("+++.");
      expect(result.ok).toBe(true);
      expect(bytes(stdout)).toEqual([3]);
    });

    test("clears a cell in a loop", () => {
      const { result, stdout } = runInContext("+[-]");
      expect(result.ok).toBe(true);
      expect(result.tape.cells[0]).toBe(0);
      expect(result.steps).toBe(4);
      expect(bytes(stdout)).toEqual([]);
    });

    test("echoes input", () => {
      expect(bytes(runInContext(",.", Uint8Array.of(65)).stdout)).toEqual([65]);
    });

    test("multiplies with a nested loop", () => {
      const { stdout } = runInContext("++++++++[>++++++++<-]>+.");
      expect(bytes(stdout)).toEqual([65]);
    });

    test("skips a loop whose cell is zero", () => {
      const { result, stdout } = runInContext("[+].");
      expect(bytes(stdout)).toEqual([0]);
      expect(result.steps).toBe(2);
    });

    test("an empty program halts immediately", () => {
      const interpreter = new Interpreter(compile(""));
      expect(interpreter.step()).toEqual({ status: "halted", cursor: 0 });
      expect(interpreter.executedSteps).toBe(0);
    });
  });

  describe("Stepping", () => {
    test("advances one instruction per step and stays halted", () => {
      const interpreter = new Interpreter(compile("+[-]"));
      expect(interpreter.step()).toEqual({ status: "running", cursor: 1 });
      expect(interpreter.step()).toEqual({ status: "running", cursor: 2 });
      expect(interpreter.step()).toEqual({ status: "running", cursor: 3 });
      expect(interpreter.step()).toEqual({ status: "halted", cursor: 4 });
      expect(interpreter.step()).toEqual({ status: "halted", cursor: 4 });
      expect(interpreter.executedSteps).toBe(4);
      expect(interpreter.status).toBe("halted");
    });

    test("reports the instruction under the cursor", () => {
      const interpreter = new Interpreter(compile("++>"));
      expect(interpreter.currentInstruction()).toEqual({ opcode: 0, delta: 2 });
      interpreter.run();
      expect(interpreter.currentInstruction()).toBeNull();
      expect(interpreter.pointer).toBe(1);
    });

    test("writes output through the given sink", () => {
      const output = new BufferOutput();
      new Interpreter(compile("++++++++[>++++++++<-]>+.+."), { output }).run();
      expect(output.toString()).toBe("AB");
    });
  });

  describe("End of input", () => {
    const cases: [EofBehavior, number][] = [
      [EofBehavior.LeaveUnchanged, 3],
      [EofBehavior.WriteZero, 0],
      [EofBehavior.WriteMinusOne, 255],
    ];

    test.each(cases)("%s stores %d", (eofBehavior, expected) => {
      const { result, stdout } = runInContext("+++,.", "", { eofBehavior });
      expect(result.ok).toBe(true);
      expect(bytes(stdout)).toEqual([expected]);
    });

    test("fatal-error faults on the read", () => {
      const { result, stdout } = runInContext("+++,.", "", { eofBehavior: EofBehavior.FatalError });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(InputExhaustedError);
        expect(result.error.instructionIndex).toBe(1);
        expect(result.tape.cells[0]).toBe(3);
        expect(result.steps).toBe(1);
      }
      expect(bytes(stdout)).toEqual([]);
    });

    test("reads input bytes before applying the policy", () => {
      const input = new BufferInput("a");
      const output = new BufferOutput();
      new Interpreter(compile(",.,."), { input, output, eofBehavior: EofBehavior.WriteZero }).run();
      expect(bytes(output.toBytes())).toEqual([97, 0]);
      expect(input.remaining).toBe(0);
    });
  });

  describe("Pointer boundaries", () => {
    test("moving left of cell 0 faults by default", () => {
      const { result } = runInContext("<");
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(BoundaryError);
        expect(result.error.instructionIndex).toBe(0);
        expect(result.tape.pointer).toBe(0);
      }
    });

    test("a fault keeps the cursor on the failing move", () => {
      const interpreter = new Interpreter(compile("+>+<<"), { tapeSize: 4 });
      const result = interpreter.run();
      expect(result.status).toBe("errored");
      expect(result.cursor).toBe(3);
      expect(Array.from(interpreter.snapshot().cells)).toEqual([1, 1, 0, 0]);
      expect(interpreter.pointer).toBe(0);
      expect(interpreter.lastError).toBeInstanceOf(BoundaryError);
      expect(interpreter.step()).toEqual(result);
    });

    test("wraps when configured", () => {
      const { result } = runInContext("<+", "", { tapeSize: 4, pointerBoundaryPolicy: BoundaryPolicy.Wrap });
      expect(result.tape.pointer).toBe(3);
      expect(result.tape.cells[3]).toBe(1);
    });

    test("a counted move faults where single moves would", () => {
      const { result } = runInContext(">>>>>>+>>>", "", { tapeSize: 8 });
      expect(result.ok).toBe(false);
      if (!result.ok && result.error instanceof BoundaryError) {
        expect(result.error.attemptedPointer).toBe(8);
        expect(result.error.instructionIndex).toBe(2);
      }
      expect(result.tape.pointer).toBe(7);
      expect(result.tape.cells[6]).toBe(1);
    });

    test("a move back from a clamped edge leaves it", () => {
      const { result } = runInContext("<>", "", { tapeSize: 8, pointerBoundaryPolicy: BoundaryPolicy.Clamp });
      expect(result.ok).toBe(true);
      expect(result.tape.pointer).toBe(1);
    });

    test("a move back from the edge does not undo a fault", () => {
      const { result } = runInContext("<>", "", { tapeSize: 8 });
      expect(result.ok).toBe(false);
      expect(result.tape.pointer).toBe(0);
    });

    test("clamps when configured", () => {
      const { result } = runInContext(">>>>>>+", "", { tapeSize: 4, pointerBoundaryPolicy: BoundaryPolicy.Clamp });
      expect(result.tape.pointer).toBe(3);
      expect(result.tape.cells[3]).toBe(1);
    });
  });

  describe("Limits and hooks", () => {
    test("stops an endless loop at the step limit", () => {
      const { result } = runInContext("+[]", "", { maxSteps: 10 });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ExecutionLimitError);
        expect(result.error.message).toBe("Exceeded maximum step limit (10)");
        expect(result.error.instructionIndex).toBe(2);
      }
      expect(result.steps).toBe(10);
    });

    test("'#' hands the machine state to the hook", () => {
      const states: MachineState[] = [];
      runInContext("+#", "", { allowDumpState: true, onDumpState: state => states.push(state) });
      expect(states).toHaveLength(1);
      expect(states[0].cursor).toBe(1);
      expect(states[0].executedSteps).toBe(1);
      expect(states[0].tape.cells[0]).toBe(1);
    });

    test("traces instructions in debug mode", () => {
      const log = jest.spyOn(console, "error").mockImplementation(() => undefined);
      try {
        new Interpreter(compile("+"), { debug: true }).run();
        expect(log).toHaveBeenCalledWith("[DEBUG] IP=0x0 | +1 | TP=0x0 cell=0");
      } finally {
        log.mockRestore();
      }
    });

    test("rejects a bad configuration", () => {
      expect(() => new Interpreter(compile("+"), { tapeSize: -1 })).toThrow("Tape size must be an integer");
    });
  });

  describe("Equivalence with unoptimized execution", () => {
    const programs: [string, number[]][] = [
      ["++++++++[>++++++++<-]>+.", []],
      ["+++[>+++[>++<-]<-]>>.", []],
      [",[.,]", [97, 98, 0]],
      ["+-+-><>< ++--[-]>+++<", []],
      ["+++++[->+>++<<]>>[-<+>]<.", []],
      ["-.>--.<+.", []],
      [",>,<[->+<]>.", [7, 9]],
    ];

    test.each(programs)("'%s' behaves the same optimized", (source, input) => {
      const reference = runReference(parseProgram(source).commands, input, 64);
      const { result, stdout } = runInContext(source, Uint8Array.from(input), { tapeSize: 64 });
      expect(result.ok).toBe(true);
      expect(bytes(stdout)).toEqual(reference.output);
      expect(bytes(result.tape.cells)).toEqual(reference.cells);
      expect(result.tape.pointer).toBe(reference.pointer);
    });

    const bounded: [string, BoundaryPolicy][] = [
      ["<>+.", BoundaryPolicy.Clamp],
      ["<<<>+>>>>>>>>>>+<<<+.", BoundaryPolicy.Clamp],
      [">>>>>>>>>+<<<<<<<<<<+", BoundaryPolicy.Clamp],
      ["<>+", BoundaryPolicy.Error],
      [">>>>>>>>>+", BoundaryPolicy.Error],
      [">>>>>>+>>>", BoundaryPolicy.Error],
      ["+>+-<<", BoundaryPolicy.Error],
      ["<>+.", BoundaryPolicy.Wrap],
      [">>>>>>>>>+<<<<<<<<<<+", BoundaryPolicy.Wrap],
    ];

    test.each(bounded)("'%s' under the %s policy behaves the same optimized", (source, policy) => {
      const reference = runReference(parseProgram(source).commands, [], 8, policy);
      const { result, stdout } = runInContext(source, "", { tapeSize: 8, pointerBoundaryPolicy: policy });
      const attempted = result.ok || !(result.error instanceof BoundaryError) ? null : result.error.attemptedPointer;
      expect(attempted).toBe(reference.error === null ? null : reference.error.attemptedPointer);
      expect(bytes(stdout)).toEqual(reference.output);
      expect(bytes(result.tape.cells)).toEqual(reference.cells);
      expect(result.tape.pointer).toBe(reference.pointer);
    });
  });
});
