/**
 * PhasorDiagram - A titled diagram: registry plus rendering and file output
 *
 * drawPhasor() takes keyword-style options (absolute start, reference to
 * another phasor, end point or magnitude/angle); add() takes a typed spec.
 */

import { writeFileSync } from "node:fs";
import { extname } from "node:path";
import {
  createDiagramConfig,
  type DiagramConfigInput,
  type DiagramOptions,
} from "@/config/diagramConfig";
import { InvalidPhasorInputError } from "@/phasor/errors";
import { parsePhasorOptions, toPhasorSpec } from "@/phasor/PhasorInputSchema";
import { PhasorRegistry } from "@/phasor/PhasorRegistry";
import type { IGraphics } from "@/render/IGraphics";
import { PhasorRenderSystem } from "@/render/PhasorRenderSystem";
import { PngGraphics } from "@/render/PngGraphics";
import { SvgGraphics } from "@/render/SvgGraphics";
import type { Phasor, PhasorSpec, RegistryOptions } from "@/types";

export type DiagramFormat = "svg" | "png";

export class PhasorDiagram {
  readonly registry: PhasorRegistry;
  readonly config: DiagramOptions;

  constructor(config: DiagramConfigInput = {}, registryOptions: Partial<RegistryOptions> = {}) {
    this.config = createDiagramConfig(config);
    this.registry = new PhasorRegistry(registryOptions);
  }

  /**
   * Validate loose options and add the phasor they describe.
   *
   * @throws InvalidPhasorInputError if the options fail validation
   * @throws MissingGeometryError if no complete geometry was given
   */
  drawPhasor(options: unknown): Phasor {
    const parsed = parsePhasorOptions(options);
    return this.registry.add(parsed.name, toPhasorSpec(parsed));
  }

  add(name: string, spec: PhasorSpec): Phasor {
    return this.registry.add(name, spec);
  }

  getPhasor(name: string): Phasor | undefined {
    return this.registry.get(name);
  }

  phasors(): readonly Phasor[] {
    return this.registry.list();
  }

  clear(): void {
    this.registry.clear();
  }

  render(graphics: IGraphics): void {
    new PhasorRenderSystem(graphics, this.config).render(this.registry.list());
  }

  toSvg(): string {
    const graphics = new SvgGraphics(this.config.width, this.config.height, this.config.backgroundColor);
    this.render(graphics);
    return graphics.toString();
  }

  toPng(): Buffer {
    const graphics = new PngGraphics(this.config.width, this.config.height, this.config.backgroundColor);
    this.render(graphics);
    return graphics.toBuffer();
  }

  /**
   * Write the diagram to `filename`; the format follows the extension.
   *
   * @throws InvalidPhasorInputError for an extension other than .svg or .png,
   * or when the file cannot be written
   */
  save(filename: string): DiagramFormat {
    const format = formatFromFilename(filename);
    const contents = format === "svg" ? this.toSvg() : this.toPng();
    try {
      writeFileSync(filename, contents);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InvalidPhasorInputError(`Cannot write '${filename}': ${reason}`);
    }
    return format;
  }
}

export function formatFromFilename(filename: string): DiagramFormat {
  const ext = extname(filename).toLowerCase();
  if (ext === ".svg") return "svg";
  if (ext === ".png") return "png";
  throw new InvalidPhasorInputError(`Unsupported output format '${ext || filename}': use .svg or .png`);
}
