#!/usr/bin/env node

import chalk from "chalk";
import { Command, InvalidArgumentError } from "commander";
import * as fs from "fs";
import * as readline from "readline";
import { DebugCommandProcessor } from "../debugger/protocol";
import { compileSource } from "../runner/bfRunner";
import {
  BoundaryPolicy,
  DEFAULT_MACHINE_CONFIG,
  EofBehavior,
  MachineConfig,
  parseBoundaryPolicy,
  parseEofBehavior,
  parseTapeSize,
} from "../vm/config";
import { Debugger } from "../vm/debugger";
import { BFError, RuntimeFault } from "../vm/errors";
import { execute, MachineState } from "../vm/interpreter";
import { BufferInput, ByteInput, EMPTY_INPUT } from "../vm/io";
import { CompiledProgram } from "../vm/types";
import { ContextStyle, formatContext, hex, stringifyProgram } from "../vm/util";
import { FdInput, StreamOutput } from "./io";

interface MachineFlags {
  tapeSize: number;
  eof: EofBehavior;
  boundary: BoundaryPolicy;
  dumpState?: boolean;
  inputFile?: string;
  debug?: boolean;
}

interface RunFlags extends MachineFlags {
  maxSteps?: number;
  time?: boolean;
}

const STYLE: ContextStyle = {
  heading: text => chalk.blue.bold(text),
  highlight: text => chalk.green(text),
};

function argumentParser<T>(parse: (value: string) => T): (value: string) => T {
  return (value: string) => {
    try {
      return parse(value);
    } catch (error) {
      throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
    }
  };
}

function parseStepLimit(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new Error(`Step limit must be a non-negative integer, got '${value}'`);
  }
  return Number(value);
}

function addMachineOptions(command: Command): Command {
  return command
    .option("-t, --tape-size <cells>", "number of cells on the tape", argumentParser(parseTapeSize), DEFAULT_MACHINE_CONFIG.tapeSize)
    .option(
      "-e, --eof <behavior>",
      `what ',' does at end of input (${Object.values(EofBehavior).join("|")})`,
      argumentParser(parseEofBehavior),
      DEFAULT_MACHINE_CONFIG.eofBehavior
    )
    .option(
      "-b, --boundary <policy>",
      `what happens when the pointer leaves the tape (${Object.values(BoundaryPolicy).join("|")})`,
      argumentParser(parseBoundaryPolicy),
      DEFAULT_MACHINE_CONFIG.pointerBoundaryPolicy
    )
    .option("-i, --dump-state", "treat '#' as an instruction that prints the machine state")
    .option("-I, --input-file <path>", "read program input from a file instead of stdin")
    .option("--debug", "trace every executed instruction on stderr");
}

function machineConfig(flags: MachineFlags): MachineConfig {
  return { tapeSize: flags.tapeSize, eofBehavior: flags.eof, pointerBoundaryPolicy: flags.boundary };
}

function loadProgram(file: string, flags: MachineFlags): CompiledProgram {
  if (!fs.existsSync(file)) {
    throw new BFError(`File '${file}' not found`);
  }
  const source = fs.readFileSync(file, "utf8");
  return compileSource(source, { allowDumpState: flags.dumpState, debug: flags.debug });
}

function printState(program: CompiledProgram, state: MachineState): void {
  const divider = "=".repeat(40);
  console.error(chalk.red(`${divider} CTX ${divider}`));
  console.error(
    formatContext({ program, tape: state.tape, cursor: state.cursor, breakpoints: new Set<number>(), state: "running" }, STYLE)
  );
  console.error(chalk.red(`${divider} END ${divider}`));
}

function describeFault(program: CompiledProgram, error: RuntimeFault): string {
  const index = error.instructionIndex;
  if (index === null) {
    return error.message;
  }
  const origin = program.origins[index];
  const position = origin !== undefined && origin < program.positions.length ? program.positions[origin] : undefined;
  const where = position ? ` (line ${position.line}, column ${position.column})` : "";
  return `${error.message} at instruction ${hex(index)}${where}`;
}

function reportError(error: unknown): void {
  if (error instanceof BFError) {
    console.error(`Error: ${error.message}`);
  } else {
    console.error("Error:", error);
  }
  process.exitCode = 1;
}

function runProgram(file: string, flags: RunFlags): void {
  const program = loadProgram(file, flags);
  const input: ByteInput = flags.inputFile ? new BufferInput(fs.readFileSync(flags.inputFile)) : new FdInput();
  const output = new StreamOutput(process.stdout);
  const start = process.hrtime.bigint();

  const result = execute(
    program,
    { ...machineConfig(flags), maxSteps: flags.maxSteps, debug: flags.debug },
    { input, output, onDumpState: state => printState(program, state) }
  );
  output.flush();

  if (flags.time) {
    const elapsed = Number(process.hrtime.bigint() - start) / 1e6;
    console.error(`\nExecution time: ${elapsed.toFixed(2)}ms (${result.steps} instructions)`);
  }
  if (!result.ok) {
    console.error(`Error running program: ${describeFault(program, result.error)}`);
    process.exitCode = 1;
  }
}

function compileListing(file: string, flags: MachineFlags): void {
  const program = loadProgram(file, flags);
  console.log(stringifyProgram(program));
  console.log(`\nCompilation Summary:`);
  console.log(`  Source commands: ${program.positions.length}`);
  console.log(`  Instructions: ${program.instructions.length}`);
  console.log(`  Units: ${program.units.map(unit => unit.name).join(", ")}`);
}

function debugProgram(file: string, flags: MachineFlags): void {
  const program = loadProgram(file, flags);
  const output = new StreamOutput(process.stdout);
  const session = new Debugger(program, {
    ...machineConfig(flags),
    input: flags.inputFile ? new BufferInput(fs.readFileSync(flags.inputFile)) : EMPTY_INPUT,
    output,
    onDumpState: state => {
      output.flush();
      printState(program, state);
    },
    debug: flags.debug,
  });
  const processor = new DebugCommandProcessor(session, STYLE);

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: chalk.red("> ") });

  console.log("Welcome to the bfstep debugger");
  console.log("Use command `help` for information on available commands");
  console.log(processor.print("context").text);
  rl.prompt();

  rl.on("line", line => {
    const response = processor.execute(line);
    output.flush();
    if (response.kind === "quit") {
      console.log(response.text);
      rl.close();
      return;
    }
    if (response.kind === "error") {
      console.log(chalk.yellow(response.text));
    } else if (response.text.length > 0) {
      console.log(response.text);
    }
    if (response.kind === "transition") {
      console.log(processor.print("context").text);
    }
    rl.prompt();
  });

  rl.on("close", () => {
    output.flush();
    session.quit();
  });
}

/**
 * CLI entry point
 */
function main() {
  const program = new Command();

  program
    .name("bfstep")
    .description("Optimizing interpreter and interactive debugger for tape programs")
    .version("0.1.0");

  addMachineOptions(program.command("run"))
    .description("Run a program against stdin and stdout")
    .argument("<file>", "program file to run")
    .option("--max-steps <count>", "stop with an error after this many instructions", argumentParser(parseStepLimit))
    .option("--time", "show execution time on stderr")
    .action((file: string, flags: RunFlags) => {
      try {
        runProgram(file, flags);
      } catch (error) {
        reportError(error);
      }
    });

  addMachineOptions(program.command("debug"))
    .description("Open a program in the interactive debugger")
    .argument("<file>", "program file to debug")
    .action((file: string, flags: MachineFlags) => {
      try {
        debugProgram(file, flags);
      } catch (error) {
        reportError(error);
      }
    });

  addMachineOptions(program.command("compile"))
    .description("Print the optimized instruction listing of a program")
    .argument("<file>", "program file to compile")
    .action((file: string, flags: MachineFlags) => {
      try {
        compileListing(file, flags);
      } catch (error) {
        reportError(error);
      }
    });

  program.parse(process.argv);
}

// Run the CLI if this file is executed directly
if (require.main === module) {
  main();
}
