import { UsageError } from "../internal/errors.js";

export type CliArgs = {
  _: string[]; // positional
  out?: string;
  exclusions?: string;
  quiet: boolean;
  help: boolean;
};

const VALUE_FLAGS = ["out", "exclusions"] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(name: string): name is ValueFlag {
  return VALUE_FLAGS.some((flag) => flag === name);
}

export function parseArgs(argv: string[]): CliArgs {
  const out: CliArgs = { _: [], quiet: false, help: false };
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === "--") {
      out._.push(...argv.slice(i + 1));
      break;
    }
    if (a === "-h" || a === "--help") {
      out.help = true;
    } else if (a === "-q" || a === "--quiet") {
      out.quiet = true;
    } else if (a === "-o") {
      out.out = requireValue(argv, ++i, a);
    } else if (a.startsWith("--")) {
      const eq = a.indexOf("=");
      const name = a.slice(2, eq === -1 ? undefined : eq);
      if (!isValueFlag(name)) throw new UsageError(`Unknown option: ${a}`);
      out[name] = eq === -1 ? requireValue(argv, ++i, a) : a.slice(eq + 1);
    } else if (a.startsWith("-") && a.length > 1) {
      throw new UsageError(`Unknown option: ${a}`);
    } else {
      out._.push(a);
    }
  }
  return out;
}

function requireValue(argv: string[], i: number, flag: string): string {
  const v = argv[i];
  if (v === undefined || v.startsWith("-")) throw new UsageError(`Option ${flag} requires a value`);
  return v;
}
