import { describeThrown, tryCatch } from "@matgraph/core/result";
import { HostClass } from "../host/HostClass.js";
import type { MaterialHost } from "../host/MaterialHost.js";
import {
  type ClassifiedValue,
  type ScalarValue,
  type UnknownValue,
  type Vector3,
  floatValue,
} from "../model/values.js";
import {
  BitPositions,
  ColorShape,
  Matrix3Shape,
  Point2Shape,
  Point3Shape,
  Point4Shape,
} from "./shapes.js";

const INTEGER_CLASSES: ReadonlySet<string> = new Set([
  HostClass.Integer,
  HostClass.Integer64,
  HostClass.IntegerPtr,
]);

const FLOAT_CLASSES: ReadonlySet<string> = new Set([
  HostClass.Float,
  HostClass.Double,
]);

const DEFAULT_ALPHA = 255;

export function unknownValue(raw: unknown): UnknownValue {
  return {
    kind: "unknown",
    raw,
    text: tryCatch(
      () => String(raw),
      (thrown) => ({ type: "coercion", message: describeThrown(thrown) })
    ),
  };
}

const isIterableCollection = (value: unknown): value is Iterable<unknown> =>
  typeof value === "object" && value !== null && Symbol.iterator in value;

const toVector3 = (point: { x: number; y: number; z: number }): Vector3 => [
  point.x,
  point.y,
  point.z,
];

function toInteger(raw: unknown): ScalarValue | undefined {
  if (typeof raw === "number" && Number.isInteger(raw)) {
    return { kind: "int", value: BigInt(raw) };
  }
  if (typeof raw === "bigint") return { kind: "int", value: raw };
  return undefined;
}

function toSymbolName(raw: unknown): string | undefined {
  if (typeof raw === "string") return raw;
  if (typeof raw === "symbol") return Symbol.keyFor(raw) ?? raw.description;
  return undefined;
}

function toBitSet(raw: unknown): ScalarValue | undefined {
  if (!isIterableCollection(raw)) return undefined;
  const parsed = BitPositions.safeParse(Array.from(raw));
  if (!parsed.success) return undefined;
  const bits = [...new Set(parsed.data)].sort((a, b) => a - b);
  return { kind: "bitset", bits };
}

/**
 * Maps raw host values onto the closed ClassifiedValue model.
 *
 * Exact class checks run before structural ones: a Point3 is iterable on some
 * hosts and a Color may look like a node handle, so the structural checks
 * only see values no exact check claimed.
 */
export class TypeClassifier<TNode extends object> {
  constructor(private readonly host: MaterialHost<TNode>) {}

  classify(raw: unknown): ClassifiedValue<TNode> {
    return this.classifyWithin(raw, new Set());
  }

  private classifyWithin(
    raw: unknown,
    enclosing: Set<object>
  ): ClassifiedValue<TNode> {
    const classified = tryCatch(() => {
      const className = this.host.classOf(raw);
      return (
        this.classifyExact(className, raw) ??
        this.classifyStructural(raw, enclosing)
      );
    }, describeThrown);
    if (classified.success && classified.data !== undefined) {
      return classified.data;
    }
    return unknownValue(raw);
  }

  private classifyExact(
    className: string,
    raw: unknown
  ): ScalarValue | undefined {
    if (INTEGER_CLASSES.has(className)) return toInteger(raw);
    if (FLOAT_CLASSES.has(className)) {
      return typeof raw === "number" ? floatValue(raw) : undefined;
    }

    switch (className) {
      case HostClass.Boolean:
        return typeof raw === "boolean" ? { kind: "bool", value: raw } : undefined;
      case HostClass.String:
        return typeof raw === "string" ? { kind: "string", value: raw } : undefined;
      case HostClass.Name: {
        const name = toSymbolName(raw);
        return name === undefined ? undefined : { kind: "symbol", name };
      }
      case HostClass.Color: {
        const parsed = ColorShape.safeParse(raw);
        if (!parsed.success) return undefined;
        const { r, g, b, a } = parsed.data;
        return { kind: "color", channels: [r, g, b, a ?? DEFAULT_ALPHA] };
      }
      case HostClass.Point2: {
        const parsed = Point2Shape.safeParse(raw);
        if (!parsed.success) return undefined;
        return { kind: "point2", components: [parsed.data.x, parsed.data.y] };
      }
      case HostClass.Point3: {
        const parsed = Point3Shape.safeParse(raw);
        if (!parsed.success) return undefined;
        return { kind: "point3", components: toVector3(parsed.data) };
      }
      case HostClass.Point4: {
        const parsed = Point4Shape.safeParse(raw);
        if (!parsed.success) return undefined;
        const { x, y, z, w } = parsed.data;
        return { kind: "point4", components: [x, y, z, w] };
      }
      case HostClass.Matrix3: {
        const parsed = Matrix3Shape.safeParse(raw);
        if (!parsed.success) return undefined;
        const { row1, row2, row3, row4 } = parsed.data;
        return {
          kind: "matrix3",
          rows: [toVector3(row1), toVector3(row2), toVector3(row3), toVector3(row4)],
        };
      }
      case HostClass.BitArray:
        return toBitSet(raw);
      default:
        return undefined;
    }
  }

  private classifyStructural(
    raw: unknown,
    enclosing: Set<object>
  ): ClassifiedValue<TNode> | undefined {
    if (this.host.isNode(raw)) {
      return { kind: "reference", node: raw };
    }
    if (!isIterableCollection(raw) || enclosing.has(raw)) {
      return undefined;
    }

    enclosing.add(raw);
    try {
      const items = Array.from(raw, (item) => this.classifyWithin(item, enclosing));
      return { kind: "sequence", items };
    } finally {
      enclosing.delete(raw);
    }
  }
}
