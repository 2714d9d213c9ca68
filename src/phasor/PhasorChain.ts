/**
 * PhasorChain - Head-to-tail phasor sequences
 *
 * Each link starts where the previous one ended; the first starts at an
 * absolute point. Link labels are display text only and may repeat, so each
 * link is registered under its label and 1-based position ("V#1", "V#2").
 */

import { z } from "zod";
import type { ChainLink, Phasor, PhasorKind, Vector2 } from "@/types";
import { InvalidPhasorInputError } from "./errors";
import type { PhasorRegistry } from "./PhasorRegistry";

export interface ChainOptions {
  readonly kind?: PhasorKind;
  readonly color?: string;
}

/**
 * Registry name of the link at `index` (0-based).
 */
export function chainLinkName(label: string, index: number): string {
  return `${label}#${index + 1}`;
}

/**
 * Add every link to the registry, each anchored at the previous link's end.
 *
 * @returns The created phasors, in link order
 */
export function buildPhasorChain(
  registry: PhasorRegistry,
  start: Vector2,
  links: readonly ChainLink[],
  options: ChainOptions = {}
): Phasor[] {
  const created: Phasor[] = [];
  let previous: Phasor | null = null;

  for (const [index, link] of links.entries()) {
    const phasor: Phasor = registry.add(chainLinkName(link.label, index), {
      geometry: { kind: "polar", magnitude: link.magnitude, angleDeg: link.angleDeg },
      anchor: previous
        ? { kind: "relative", ref: previous.name, point: "end" }
        : { kind: "absolute", x: start.x, y: start.y },
      kind: options.kind,
      color: options.color,
      label: link.label,
    });
    created.push(phasor);
    previous = phasor;
  }

  return created;
}

const ChainLinkSchema = z.tuple([
  z.string().trim().min(1, "label must not be empty"),
  z.coerce.number().finite(),
  z.coerce.number().finite(),
]);

/**
 * Parse "label,magnitude,angle".
 *
 * @throws InvalidPhasorInputError for a wrong field count or non-numeric values
 */
export function parseChainLink(text: string): ChainLink {
  const parts = text.split(",").map((part) => part.trim());
  if (parts.length !== 3) {
    throw new InvalidPhasorInputError(
      `Error parsing vector '${text}': expected exactly 3 comma-separated values: label,magnitude,angle`
    );
  }

  // z.coerce turns "" into 0; an empty number field is an error, not zero
  if (parts[1] === "" || parts[2] === "") {
    throw new InvalidPhasorInputError(`Error parsing vector '${text}': magnitude and angle are required`);
  }

  const result = ChainLinkSchema.safeParse(parts);
  if (!result.success) {
    throw new InvalidPhasorInputError(
      `Error parsing vector '${text}'`,
      result.error.issues.map((issue) => `  ${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const [label, magnitude, angleDeg] = result.data;
  return { label, magnitude, angleDeg };
}
