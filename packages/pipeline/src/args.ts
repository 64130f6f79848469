import type { EmbeddingConfig, ExtractConfig, IoConfig, MatchConfig, PipelineOverrides } from "./config";

export const COMMANDS = ["fetch", "extract", "match", "associate", "run"] as const;

export type Cmd = typeof COMMANDS[number];

export interface CliArgs {
  cmd: Cmd | null;
  overrides: PipelineOverrides;
}

export const USAGE = `Usage: tsx src/cli.ts <${COMMANDS.join("|")}> [--force] [--min-year N] [--max-year N] [--threshold X] [--gap X] [--model NAME] [--dimensions N] [--gloss first|last] [--raw PATH] [--input PATH] [--output PATH] [--mappings PATH] [--buffer-size BYTES]\n`;

export class ArgsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ArgsError";
  }
}

function isCommand(value: string | undefined): value is Cmd {
  return COMMANDS.some(cmd => cmd === value);
}

function toNumber(flag: string, value: string): number {
  const n = Number(value);
  if (value.trim() === "" || Number.isNaN(n)) {
    throw new ArgsError(`${flag} expects a number, got "${value}"`);
  }
  return n;
}

/**
 * Parses `<cmd> [--flag value | --flag=value]...`. Throws `ArgsError` on an
 * unknown flag or a missing value.
 */
export function parseArgs(argv: string[]): CliArgs {
  const [first, ...rest] = argv;
  const extract: Partial<ExtractConfig> = {};
  const match: Partial<MatchConfig> = {};
  const embedding: Partial<EmbeddingConfig> = {};
  const io: Partial<IoConfig> = {};

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    const eq = arg.indexOf("=");
    const flag = eq === -1 ? arg : arg.slice(0, eq);

    if (flag === "--force") {
      io.force = true;
      continue;
    }

    let value: string;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    }
    else {
      const next = rest[i + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new ArgsError(`${flag} expects a value`);
      }
      value = next;
      i++;
    }

    switch (flag) {
      case "--min-year":
        extract.minimumYear = toNumber(flag, value);
        break;
      case "--max-year":
        extract.maximumYear = toNumber(flag, value);
        break;
      case "--gloss":
        if (value !== "first" && value !== "last") {
          throw new ArgsError(`--gloss expects "first" or "last", got "${value}"`);
        }
        extract.glossEnd = value;
        break;
      case "--threshold":
        match.threshold = toNumber(flag, value);
        break;
      case "--gap":
        match.gap = toNumber(flag, value);
        break;
      case "--model":
        embedding.model = value;
        break;
      case "--dimensions":
        embedding.dimensions = toNumber(flag, value);
        break;
      case "--raw":
        io.rawPath = value;
        break;
      case "--input":
        io.interimPath = value;
        break;
      case "--output":
        io.outputPath = value;
        io.associatedPath = value;
        break;
      case "--mappings":
        io.mappingsPath = value;
        break;
      case "--buffer-size":
        io.bufferSize = toNumber(flag, value);
        break;
      default:
        throw new ArgsError(`Unknown flag: ${flag}`);
    }
  }

  return {
    cmd: isCommand(first) ? first : null,
    overrides: { extract, match, embedding, io },
  };
}
