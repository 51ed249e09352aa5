import { describe, it, expect } from "vitest";
import { MemoryHost, type MemoryNode, ReadFailure } from "../src/host/MemoryHost.js";
import { Reflector } from "../src/reflect/Reflector.js";
import { host, material } from "./utils/fixtures.js";

class RepeatingHost extends MemoryHost {
  override propertyNames(node: MemoryNode): string[] {
    return [...node.names(), ...node.names()];
  }
}

class NamelessHost extends MemoryHost {
  override nodeName(): string {
    throw new Error("name unavailable");
  }
}

describe("Reflector", () => {
  const reflector = new Reflector(host);

  it("should list property names in host order", () => {
    const brick = material("Brick", { diffuse: 1.0, glossiness: 10n });
    expect(reflector.propertyNames(brick)).toEqual({
      success: true,
      data: ["diffuse", "glossiness"],
    });
  });

  it("should keep the first occurrence of repeated names", () => {
    const brick = material("Brick", { diffuse: 1.0, glossiness: 10n });
    expect(new Reflector(new RepeatingHost()).propertyNames(brick)).toEqual({
      success: true,
      data: ["diffuse", "glossiness"],
    });
  });

  it("should turn enumeration failures into introspection errors", () => {
    const brick = material("Brick").failEnumeration("handle lost");
    expect(reflector.propertyNames(brick)).toEqual({
      success: false,
      error: { type: "introspection", node: "Brick", message: "handle lost" },
    });
  });

  it("should classify property values", () => {
    const brick = material("Brick", { glossiness: 10n });
    expect(reflector.readProperty(brick, "glossiness")).toEqual({
      success: true,
      data: { kind: "int", value: 10n },
    });
  });

  it("should turn read failures into property errors", () => {
    const brick = material("Brick", {
      glossiness: new ReadFailure("access denied"),
    });
    expect(reflector.readProperty(brick, "glossiness")).toEqual({
      success: false,
      error: {
        type: "propertyRead",
        node: "Brick",
        property: "glossiness",
        message: "access denied",
      },
    });
  });

  it("should fall back to an empty name", () => {
    expect(new Reflector(new NamelessHost()).nodeName(material("Brick"))).toBe("");
    expect(reflector.nodeName(material("Brick"))).toBe("Brick");
  });
});
