export * from "./types";
export { Vec2, normalizeAngleDeg } from "./math/Vec2";
export { PhasorRegistry } from "./phasor/PhasorRegistry";
export {
  PhasorError,
  UnknownReferenceError,
  MissingGeometryError,
  DuplicatePhasorError,
  InvalidGeometryError,
  InvalidPhasorInputError,
  type PhasorErrorCode,
} from "./phasor/errors";
export {
  PhasorOptionsSchema,
  DiagramFileSchema,
  parsePhasorOptions,
  parseDiagramFile,
  toPhasorSpec,
  type PhasorOptions,
  type PhasorOptionsInput,
  type DiagramFile,
} from "./phasor/PhasorInputSchema";
export { buildPhasorChain, chainLinkName, parseChainLink, type ChainOptions } from "./phasor/PhasorChain";
export { computeDiagramBounds, type BoundsOptions } from "./phasor/DiagramBounds";
export { defaultColorForKind, colorToNumber, colorToHex, isKnownColor } from "./phasor/colors";
export { createDiagramConfig, DEFAULT_DIAGRAM_OPTIONS, type DiagramOptions } from "./config/diagramConfig";
export type { IGraphics } from "./render/IGraphics";
export { PhasorRenderSystem, labelPosition } from "./render/PhasorRenderSystem";
export { SvgGraphics } from "./render/SvgGraphics";
export { PngGraphics } from "./render/PngGraphics";
export { ViewTransform } from "./render/ViewTransform";
export { PhasorDiagram, type DiagramFormat } from "./diagram/PhasorDiagram";
export { PhasorDebugLogger } from "./debug/PhasorDebugLogger";
