import { ConfigurationError } from "./errors";

/**
 * Split `--name=value` arguments; bare `--name` gets an empty value
 */
function splitFlag(arg: string): { name: string; value: string } | undefined {
  if (!arg.startsWith("--")) return undefined;
  const eq = arg.indexOf("=");
  return eq === -1
    ? { name: arg.slice(2), value: "" }
    : { name: arg.slice(2, eq), value: arg.slice(eq + 1) };
}

/**
 * Every value given for a flag, in command-line order
 */
export const readFlags = (args: string[], name: string): string[] =>
  args
    .map(splitFlag)
    .filter((flag) => flag?.name === name)
    .map((flag) => flag?.value ?? "");

/**
 * The last value given for a flag, if any
 */
export const readFlag = (args: string[], name: string): string | undefined => {
  const values = readFlags(args, name);
  return values.length > 0 ? values[values.length - 1] : undefined;
};

export const hasFlag = (args: string[], name: string): boolean =>
  readFlags(args, name).length > 0;

/**
 * Reject flags outside the known set and positional arguments
 */
export const assertKnownFlags = (args: string[], known: string[]): void => {
  for (const arg of args) {
    const flag = splitFlag(arg);
    if (!flag) {
      throw new ConfigurationError(`Unexpected argument: ${arg}`);
    }
    if (!known.includes(flag.name)) {
      throw new ConfigurationError(`Unknown option: --${flag.name}`);
    }
  }
};

export const readNumberFlag = (
  args: string[],
  name: string,
  fallback: number,
  isValid: (value: number) => boolean,
  requirement: string
): number => {
  const raw = readFlag(args, name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (raw.trim() === "" || !isValid(value)) {
    throw new ConfigurationError(
      `Invalid --${name} value ${JSON.stringify(raw)}: ${requirement}`
    );
  }
  return value;
};
