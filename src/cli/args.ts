/**
 * Command-line parsing for the phasor CLI.
 *
 *   phasor chain  --vector V,2.5,45 --vector I,1.2,90 [--start-x 0] [--start-y 0]
 *   phasor single --magnitude 2 --angle 45 [--name V] [--start-x 1] [--start-y 1]
 *   phasor file   diagram.json
 *
 * Shared flags: --out <file.svg|file.png>, --title <text>, --debug, --help
 */

import { parseArgs } from "node:util";
import { z } from "zod";
import { parseChainLink } from "@/phasor/PhasorChain";
import { InvalidPhasorInputError } from "@/phasor/errors";
import type { ChainLink, Vector2 } from "@/types";

interface SharedArgs {
  readonly out: string;
  readonly title?: string;
  readonly debug: boolean;
}

export interface ChainCommand extends SharedArgs {
  readonly command: "chain";
  readonly start: Vector2;
  readonly links: readonly ChainLink[];
}

export interface SingleCommand extends SharedArgs {
  readonly command: "single";
  readonly name: string;
  readonly start: Vector2;
  readonly magnitude: number;
  readonly angleDeg: number;
}

export interface FileCommand extends SharedArgs {
  readonly command: "file";
  readonly path: string;
}

export interface HelpCommand {
  readonly command: "help";
}

export type CliCommand = ChainCommand | SingleCommand | FileCommand | HelpCommand;

export const USAGE = `Usage:
  phasor chain  --vector <label,magnitude,angle> [--vector ...] [--start-x <x>] [--start-y <y>]
  phasor single --magnitude <m> --angle <deg> [--name <label>] [--start-x <x>] [--start-y <y>]
  phasor file   <diagram.json>

Options:
  --out <file>     Output file, .svg or .png (default: phasor_diagram.svg)
  --title <text>   Diagram title
  --debug          Log every phasor resolution
  --help           Show this message`;

export const DEFAULT_OUT = "phasor_diagram.svg";

const OPTIONS = {
  "start-x": { type: "string" },
  "start-y": { type: "string" },
  vector: { type: "string", multiple: true },
  magnitude: { type: "string" },
  angle: { type: "string" },
  name: { type: "string" },
  out: { type: "string" },
  title: { type: "string" },
  debug: { type: "boolean" },
  help: { type: "boolean", short: "h" },
} as const;

const FiniteNumber = z.coerce.number().finite();

/**
 * Parse a numeric flag. Absent flags take the fallback; absent flags
 * without one are an error.
 */
function numberFlag(flag: string, value: string | undefined, fallback?: number): number {
  if (value === undefined) {
    if (fallback === undefined) {
      throw new InvalidPhasorInputError(`Missing required option --${flag}`);
    }
    return fallback;
  }
  const parsed = FiniteNumber.safeParse(value.trim() === "" ? Number.NaN : value);
  if (!parsed.success) {
    throw new InvalidPhasorInputError(`Option --${flag} expects a number, got '${value}'`);
  }
  return parsed.data;
}

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: OPTIONS, allowPositionals: true, strict: true });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InvalidPhasorInputError(message);
  }
}

/**
 * Turn argv (without the node and script entries) into a command.
 *
 * @throws InvalidPhasorInputError for unknown commands, unknown options,
 * missing required options and malformed values
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const { values, positionals } = readArgs(argv);
  const [command, ...rest] = positionals;

  if (values.help || command === undefined || command === "help") {
    return { command: "help" };
  }

  const shared: SharedArgs = {
    out: values.out ?? DEFAULT_OUT,
    title: values.title,
    debug: values.debug ?? false,
  };
  const start = {
    x: numberFlag("start-x", values["start-x"], 0),
    y: numberFlag("start-y", values["start-y"], 0),
  };

  switch (command) {
    case "chain": {
      const vectors = values.vector ?? [];
      if (vectors.length === 0) {
        throw new InvalidPhasorInputError("Missing required option --vector");
      }
      return { command, ...shared, start, links: vectors.map(parseChainLink) };
    }
    case "single":
      return {
        command,
        ...shared,
        name: values.name ?? "V",
        start,
        magnitude: numberFlag("magnitude", values.magnitude),
        angleDeg: numberFlag("angle", values.angle),
      };
    case "file": {
      const path = rest[0];
      if (path === undefined) {
        throw new InvalidPhasorInputError("Missing diagram file path");
      }
      return { command, ...shared, path };
    }
    default:
      throw new InvalidPhasorInputError(`Unknown command '${command}'`);
  }
}
