import { readFileSync } from "node:fs";
import { PhasorDebugLogger } from "@/debug/PhasorDebugLogger";
import { PhasorDiagram } from "@/diagram/PhasorDiagram";
import { PhasorError, InvalidPhasorInputError } from "@/phasor/errors";
import { buildPhasorChain } from "@/phasor/PhasorChain";
import { parseDiagramFile } from "@/phasor/PhasorInputSchema";
import { USAGE, parseCliArgs, type CliCommand } from "./args";

/** Where the CLI writes messages; swapped out in tests */
export interface CliOutput {
  log(message: string): void;
  error(message: string): void;
}

const consoleOutput: CliOutput = {
  log: (message) => console.log(message),
  error: (message) => console.error(message),
};

function readJson(path: string): unknown {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidPhasorInputError(`Cannot read diagram file '${path}': ${reason}`);
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidPhasorInputError(`Diagram file '${path}' is not valid JSON: ${reason}`);
  }
}

/**
 * Build the diagram a command describes. Help has no diagram.
 */
export function buildDiagram(command: Exclude<CliCommand, { command: "help" }>): PhasorDiagram {
  switch (command.command) {
    case "chain": {
      const diagram = new PhasorDiagram({
        title: command.title ?? "Phasor Chain Diagram",
        axesOrigin: command.start,
      });
      buildPhasorChain(diagram.registry, command.start, command.links);
      return diagram;
    }
    case "single": {
      // Axes through the start and the circle the tip sweeps as the angle varies
      const diagram = new PhasorDiagram({
        title: command.title ?? `Phasor Diagram (Magnitude = ${command.magnitude}, Angle = ${command.angleDeg}°)`,
        axesOrigin: command.start,
        referenceCircles: [{ center: command.start, radius: command.magnitude }],
        bounds: { includeOrigin: false },
      });
      diagram.add(command.name, {
        geometry: { kind: "polar", magnitude: command.magnitude, angleDeg: command.angleDeg },
        anchor: { kind: "absolute", x: command.start.x, y: command.start.y },
      });
      return diagram;
    }
    case "file": {
      const file = parseDiagramFile(readJson(command.path));
      const diagram = new PhasorDiagram({ title: command.title ?? file.title ?? "Phasor Diagram" });
      for (const options of file.phasors) {
        diagram.drawPhasor(options);
      }
      return diagram;
    }
  }
}

/**
 * Run the CLI and return the process exit code.
 *
 * Phasor errors are reported and give exit code 1; anything else propagates.
 */
export function runCli(argv: readonly string[], output: CliOutput = consoleOutput): number {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    if (!(error instanceof PhasorError)) throw error;
    output.error(error.message);
    output.error(USAGE);
    return 1;
  }

  if (command.command === "help") {
    output.log(USAGE);
    return 0;
  }

  if (command.debug && !PhasorDebugLogger.isEnabled()) {
    PhasorDebugLogger.enable();
  }

  try {
    const diagram = buildDiagram(command);
    diagram.save(command.out);
    output.log(`Diagram saved to ${command.out}.`);
    return 0;
  } catch (error) {
    if (!(error instanceof PhasorError)) throw error;
    output.error(error.message);
    return 1;
  }
}
