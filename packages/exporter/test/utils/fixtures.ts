import type { FormatStyle } from "@matgraph/core/configuration";
import { grammarFor } from "../../src/encode/encode.js";
import {
  Color,
  MemoryHost,
  MemoryLibrary,
  MemoryNode,
  Point2,
} from "../../src/host/MemoryHost.js";
import { ExportLog, type ExportLogOptions } from "../../src/log/ExportLog.js";
import { Reflector } from "../../src/reflect/Reflector.js";
import { OutputSink } from "../../src/sink/OutputSink.js";
import { GraphWalker } from "../../src/walk/GraphWalker.js";
import {
  DEFAULT_MAX_DEPTH,
  type WalkOptions,
  type WalkReport,
} from "../../src/walk/types.js";

export const host = new MemoryHost();

export function material(
  name: string,
  properties: Record<string, unknown> = {}
): MemoryNode {
  return new MemoryNode(name, "StandardMaterial", "material", properties);
}

export function textureMap(
  name: string,
  properties: Record<string, unknown> = {}
): MemoryNode {
  return new MemoryNode(name, "Bitmaptexture", "textureMap", properties);
}

/** Log that records without printing. */
export function quietLog(options: ExportLogOptions = {}): ExportLog {
  return new ExportLog({ ...options, echo: false });
}

/**
 * The "Brick" material: a color, an integer and a bitmap whose coordinates
 * node holds a float and a point.
 */
export function createBrick(): MemoryNode {
  const coords = textureMap("Coords", {
    blur: 0.5,
    tiling: new Point2(2, 2),
  });
  const bitmap = textureMap("Brick Bitmap", {
    filename: "brick.png",
    coords,
  });
  return material("Brick", {
    diffuse: new Color(200, 64, 32),
    glossiness: 10n,
    texmap_diffuse: bitmap,
  });
}

export function createGlass(): MemoryNode {
  return material("Glass", {
    opacity: 25.0,
    refraction: true,
    shader: Symbol.for("Phong"),
  });
}

export function createLibrary(...materials: MemoryNode[]): MemoryLibrary {
  return new MemoryLibrary("Bricks", materials);
}

export type WalkResult = {
  text: string;
  report: WalkReport;
  log: ExportLog;
};

/**
 * Walk `root` into a fresh sink and return the document text.
 */
export function walkToText(
  root: MemoryNode,
  style: FormatStyle,
  options: Partial<WalkOptions> = {},
  log: ExportLog = quietLog()
): WalkResult {
  const walker = new GraphWalker(new Reflector(host), grammarFor(style), log, {
    maxDepth: DEFAULT_MAX_DEPTH,
    ...options,
  });
  const sink = new OutputSink();
  const report = walker.walk(root, sink);
  return { text: sink.toString(), report, log };
}
