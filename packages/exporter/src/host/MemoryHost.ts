import { HostClass } from "./HostClass.js";
import type { MaterialHost, MaterialLibrary } from "./MaterialHost.js";

export class Color {
  constructor(
    readonly r: number,
    readonly g: number,
    readonly b: number,
    readonly a: number = 255
  ) {}
}

export class Point2 {
  constructor(
    readonly x: number,
    readonly y: number
  ) {}
}

export class Point3 {
  constructor(
    readonly x: number,
    readonly y: number,
    readonly z: number
  ) {}
}

export class Point4 {
  constructor(
    readonly x: number,
    readonly y: number,
    readonly z: number,
    readonly w: number
  ) {}
}

export class Matrix3 {
  constructor(
    readonly row1: Point3,
    readonly row2: Point3,
    readonly row3: Point3,
    readonly row4: Point3
  ) {}

  static identity(): Matrix3 {
    return new Matrix3(
      new Point3(1, 0, 0),
      new Point3(0, 1, 0),
      new Point3(0, 0, 1),
      new Point3(0, 0, 0)
    );
  }
}

export class BitArray implements Iterable<number> {
  private readonly bits: ReadonlySet<number>;

  constructor(bits: Iterable<number>) {
    this.bits = new Set(bits);
  }

  [Symbol.iterator](): Iterator<number> {
    return this.bits[Symbol.iterator]();
  }
}

/**
 * Stored in place of a property value to make reading that property throw.
 */
export class ReadFailure {
  constructor(readonly message: string) {}
}

export type MemoryNodeKind = "material" | "textureMap";

/**
 * A material or texture map held in memory. Properties keep insertion order.
 */
export class MemoryNode {
  private readonly properties = new Map<string, unknown>();
  private enumerationFailure: string | undefined;

  constructor(
    readonly name: string,
    readonly className: string,
    readonly kind: MemoryNodeKind = "material",
    properties: Record<string, unknown> = {}
  ) {
    for (const [key, value] of Object.entries(properties)) {
      this.properties.set(key, value);
    }
  }

  set(name: string, value: unknown): this {
    this.properties.set(name, value);
    return this;
  }

  /** Make property enumeration throw with `message`. */
  failEnumeration(message: string): this {
    this.enumerationFailure = message;
    return this;
  }

  names(): string[] {
    if (this.enumerationFailure !== undefined) {
      throw new Error(this.enumerationFailure);
    }
    return [...this.properties.keys()];
  }

  get(name: string): unknown {
    if (!this.properties.has(name)) {
      throw new Error(`Unknown property: ${name}`);
    }
    const value = this.properties.get(name);
    if (value instanceof ReadFailure) {
      throw new Error(value.message);
    }
    return value;
  }
}

/**
 * MaterialHost over MemoryNode graphs. A bigint is an Integer, a number a
 * Float and a JS symbol a Name.
 */
export class MemoryHost implements MaterialHost<MemoryNode> {
  classOf(value: unknown): string {
    if (typeof value === "bigint") return HostClass.Integer;
    if (typeof value === "number") return HostClass.Float;
    if (typeof value === "boolean") return HostClass.Boolean;
    if (typeof value === "string") return HostClass.String;
    if (typeof value === "symbol") return HostClass.Name;
    if (value === undefined) return HostClass.Undefined;
    if (value instanceof Color) return HostClass.Color;
    if (value instanceof Point2) return HostClass.Point2;
    if (value instanceof Point3) return HostClass.Point3;
    if (value instanceof Point4) return HostClass.Point4;
    if (value instanceof Matrix3) return HostClass.Matrix3;
    if (value instanceof BitArray) return HostClass.BitArray;
    if (value instanceof MemoryNode) return value.className;
    if (Array.isArray(value)) return HostClass.Array;
    return HostClass.Value;
  }

  isNode(value: unknown): value is MemoryNode {
    return value instanceof MemoryNode;
  }

  nodeName(node: MemoryNode): string {
    return node.name;
  }

  propertyNames(node: MemoryNode): string[] {
    return node.names();
  }

  getProperty(node: MemoryNode, name: string): unknown {
    return node.get(name);
  }
}

export class MemoryLibrary implements MaterialLibrary<MemoryNode> {
  constructor(
    readonly name: string,
    private readonly entries: readonly MemoryNode[]
  ) {}

  materials(): readonly MemoryNode[] {
    return this.entries;
  }
}
