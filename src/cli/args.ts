/**
 * @file CLI argument parsing (no third-party parser; positional commands + a few flags)
 */
import type { Condition } from "../hty/query";

/* eslint-disable no-restricted-syntax -- Error classes are idiomatic for exceptions and enable instanceof checks */
/** Thrown for malformed command lines; the CLI prints usage alongside it. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}
/* eslint-enable no-restricted-syntax */

export type Command =
  | { kind: "help" }
  | { kind: "interactive"; file?: string }
  | { kind: "convert"; csv: string; hty: string }
  | { kind: "info"; file: string }
  | { kind: "project"; file: string; columns: string[] }
  | { kind: "filter"; file: string; where: Condition }
  | { kind: "select"; file: string; columns: string[]; where: Condition }
  | { kind: "append"; source: string; destination: string; rowsFile: string };

export type CliArgs = { command: Command; configPath?: string };

export const USAGE = `
Usage: hty [command] [options]

Commands:
  (none) [file]                           Interactive: pick a file and a column to show
  convert <csv> <hty>                     Convert a CSV file to an HTY file
  info <hty>                              Show the file's groups and columns
  project <hty> <col...>                  Print one or more same-group columns
  filter <hty> <col> <op> <value>         Print the values of <col> matching the predicate
  select <hty> <col...> --where <col> <op> <value>
                                          Print columns for rows matching the predicate
  append <src> <dest> --rows <csv>        Write <src> plus the rows of <csv> to <dest>

Operators: > >= < <= = != (= and != compare within the configured tolerance)

Options:
  --config, -c <path>   Path to executable config (hty.config.*)
  --help, -h            Show this help
`;

type Acc = {
  positionals: string[];
  configPath?: string;
  help: boolean;
  where?: string[];
  rowsFile?: string;
};

function takeValues(args: readonly string[], i: number, count: number, flag: string): string[] {
  const values = args.slice(i + 1, i + 1 + count);
  if (values.length < count) {
    throw new UsageError(`Missing value for ${flag}`);
  }
  return values;
}

function walk(args: readonly string[], i: number, acc: Acc): Acc {
  if (i >= args.length) {
    return acc;
  }
  const a = args[i];
  if (a === "--help" || a === "-h") {
    return walk(args, i + 1, { ...acc, help: true });
  }
  if (a === "--config" || a === "-c") {
    const [v] = takeValues(args, i, 1, a);
    return walk(args, i + 2, { ...acc, configPath: v });
  }
  if (a === "--where" || a === "-w") {
    return walk(args, i + 4, { ...acc, where: takeValues(args, i, 3, a) });
  }
  if (a === "--rows" || a === "-r") {
    const [v] = takeValues(args, i, 1, a);
    return walk(args, i + 2, { ...acc, rowsFile: v });
  }
  return walk(args, i + 1, { ...acc, positionals: [...acc.positionals, a] });
}

/** Parse a threshold; anything `Number()` rejects is a usage error. */
export function parseThreshold(raw: string): number {
  const v = raw.trim() === "" ? Number.NaN : Number(raw);
  if (Number.isNaN(v)) {
    throw new UsageError(`Threshold must be a number: ${raw}`);
  }
  return v;
}

function condition(column: string, op: string, value: string): Condition {
  return { column, op, value: parseThreshold(value) };
}

function expectCount(cmd: string, operands: readonly string[], min: number, max = min): void {
  if (operands.length < min || operands.length > max) {
    throw new UsageError(`'${cmd}' takes ${min === max ? min : `${min}+`} operand(s), got ${operands.length}`);
  }
}

function toCommand(acc: Acc): Command {
  if (acc.help || acc.positionals[0] === "help") {
    return { kind: "help" };
  }
  const [cmd, ...ops] = acc.positionals;
  switch (cmd) {
    case undefined:
      return { kind: "interactive" };
    case "convert":
      expectCount(cmd, ops, 2);
      return { kind: "convert", csv: ops[0], hty: ops[1] };
    case "info":
      expectCount(cmd, ops, 1);
      return { kind: "info", file: ops[0] };
    case "project":
      expectCount(cmd, ops, 2, Number.POSITIVE_INFINITY);
      return { kind: "project", file: ops[0], columns: ops.slice(1) };
    case "filter":
      expectCount(cmd, ops, 4);
      return { kind: "filter", file: ops[0], where: condition(ops[1], ops[2], ops[3]) };
    case "select": {
      expectCount(cmd, ops, 2, Number.POSITIVE_INFINITY);
      if (!acc.where) {
        throw new UsageError("'select' requires --where <col> <op> <value>");
      }
      const [column, op, value] = acc.where;
      return { kind: "select", file: ops[0], columns: ops.slice(1), where: condition(column, op, value) };
    }
    case "append":
      expectCount(cmd, ops, 2);
      if (!acc.rowsFile) {
        throw new UsageError("'append' requires --rows <csv>");
      }
      return { kind: "append", source: ops[0], destination: ops[1], rowsFile: acc.rowsFile };
    default:
      if (ops.length === 0) {
        return { kind: "interactive", file: cmd };
      }
      throw new UsageError(`Unknown command: ${cmd}`);
  }
}

/** Parse `process.argv.slice(2)`. */
export function parseArgs(argv: readonly string[]): CliArgs {
  const acc = walk(argv, 0, { positionals: [], help: false });
  return { command: toCommand(acc), configPath: acc.configPath };
}
