import { RecordKind } from "../lib/types";

export interface CliArgs {
  url: string;
  kind: RecordKind;
  withConfig: boolean;
  keys?: string[];
  lang?: string;
  outDir?: string;
  images: boolean;
  timeoutMs?: number;
  includeMissing: boolean;
}

export const USAGE =
  "Usage: npm run parse -- <url> [--kind marketplace|configuration] [--with-config] " +
  "[--keys a,b] [--lang ru] [--out dir] [--images] [--timeout ms] [--no-missing]";

function isRecordKind(value: string): value is RecordKind {
  return value === RecordKind.MARKETPLACE || value === RecordKind.CONFIGURATION;
}

/** Throws with a usage hint on unknown flags or bad values. */
export function parseCliArgs(argv: string[]): CliArgs {
  let url: string | undefined;
  const args: Omit<CliArgs, "url"> = {
    kind: RecordKind.MARKETPLACE,
    withConfig: false,
    images: false,
    includeMissing: true,
  };

  const valueAfter = (i: number, flag: string): string => {
    const value = argv[i + 1];
    if (value === undefined || value.startsWith("--")) throw new Error(`${flag} needs a value\n${USAGE}`);
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--kind": {
        const kind = valueAfter(i++, arg);
        if (!isRecordKind(kind)) throw new Error(`Unknown record kind "${kind}"\n${USAGE}`);
        args.kind = kind;
        break;
      }
      case "--with-config":
        args.withConfig = true;
        break;
      case "--keys":
        args.keys = valueAfter(i++, arg)
          .split(",")
          .map((k) => k.trim())
          .filter(Boolean);
        break;
      case "--lang":
        args.lang = valueAfter(i++, arg);
        break;
      case "--out":
        args.outDir = valueAfter(i++, arg);
        break;
      case "--images":
        args.images = true;
        break;
      case "--timeout": {
        const raw = valueAfter(i++, arg);
        const ms = parseInt(raw, 10);
        if (!Number.isFinite(ms) || ms <= 0) throw new Error(`Invalid --timeout "${raw}"\n${USAGE}`);
        args.timeoutMs = ms;
        break;
      }
      case "--no-missing":
        args.includeMissing = false;
        break;
      default:
        if (arg.startsWith("--")) throw new Error(`Unknown option ${arg}\n${USAGE}`);
        if (url) throw new Error(`Unexpected argument "${arg}"\n${USAGE}`);
        url = arg;
    }
  }

  if (!url) throw new Error(USAGE);
  if (args.withConfig && args.kind !== RecordKind.MARKETPLACE) {
    throw new Error(`--with-config only applies to marketplace pages\n${USAGE}`);
  }
  return { url, ...args };
}
