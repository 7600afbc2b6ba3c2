import { ConfigError } from "./errors";

export enum EofBehavior {
  WriteZero = "write-zero",
  LeaveUnchanged = "leave-unchanged",
  WriteMinusOne = "write-minus-one", // 255 in an 8-bit cell
  FatalError = "fatal-error",
}

export enum BoundaryPolicy {
  Wrap = "wrap",
  Clamp = "clamp",
  Error = "error",
}

export interface MachineConfig {
  tapeSize: number;
  eofBehavior: EofBehavior;
  pointerBoundaryPolicy: BoundaryPolicy;
}

export const DEFAULT_MACHINE_CONFIG: Readonly<MachineConfig> = Object.freeze({
  tapeSize: 1024 * 64,
  eofBehavior: EofBehavior.LeaveUnchanged,
  pointerBoundaryPolicy: BoundaryPolicy.Error,
});

// Typed arrays cap out well above this, but nothing useful needs more.
export const MAX_TAPE_SIZE = 1 << 30;

function isEnumValue<T extends string>(values: Record<string, T>, value: unknown): value is T {
  const allowed: readonly string[] = Object.values(values);
  return typeof value === "string" && allowed.includes(value);
}

/**
 * Fill in defaults and validate a partial machine configuration.
 *
 * @throws ConfigError for a non-integer or out-of-range tape size, or an
 *   unknown policy value
 */
export function resolveMachineConfig(partial: Partial<MachineConfig> = {}): MachineConfig {
  const config: MachineConfig = { ...DEFAULT_MACHINE_CONFIG };

  if (partial.tapeSize !== undefined) {
    if (!Number.isInteger(partial.tapeSize) || partial.tapeSize < 1 || partial.tapeSize > MAX_TAPE_SIZE) {
      throw new ConfigError(`Tape size must be an integer in [1, ${MAX_TAPE_SIZE}], got ${partial.tapeSize}`);
    }
    config.tapeSize = partial.tapeSize;
  }
  if (partial.eofBehavior !== undefined) {
    config.eofBehavior = parseEofBehavior(partial.eofBehavior);
  }
  if (partial.pointerBoundaryPolicy !== undefined) {
    config.pointerBoundaryPolicy = parseBoundaryPolicy(partial.pointerBoundaryPolicy);
  }

  return config;
}

export function parseEofBehavior(value: string): EofBehavior {
  if (!isEnumValue(EofBehavior, value)) {
    throw new ConfigError(
      `Unknown EOF behavior '${value}' (expected one of ${Object.values(EofBehavior).join(", ")})`
    );
  }
  return value;
}

export function parseBoundaryPolicy(value: string): BoundaryPolicy {
  if (!isEnumValue(BoundaryPolicy, value)) {
    throw new ConfigError(
      `Unknown boundary policy '${value}' (expected one of ${Object.values(BoundaryPolicy).join(", ")})`
    );
  }
  return value;
}

export function parseTapeSize(value: string): number {
  const trimmed = value.trim();
  const size = /^0x[0-9a-f]+$/i.test(trimmed) ? parseInt(trimmed, 16) : /^\d+$/.test(trimmed) ? Number(trimmed) : NaN;
  if (Number.isNaN(size)) {
    throw new ConfigError(`Tape size must be a number, got '${value}'`);
  }
  return resolveMachineConfig({ tapeSize: size }).tapeSize;
}
