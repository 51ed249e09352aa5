import { describe, it, expect } from "vitest";
import {
  ROOT_PATH,
  appendKeyPath,
  joinKeyPath,
  lastSegment,
  parseKeyPath,
} from "../src/key-path/index.js";

describe("KeyPath", () => {
  it("should join segments with dots", () => {
    expect(joinKeyPath(["texmap_diffuse", "coords", "blur"])).toBe(
      "texmap_diffuse.coords.blur"
    );
    expect(joinKeyPath(ROOT_PATH)).toBe("");
  });

  it("should append without touching the parent path", () => {
    const parent = ["maps"];
    const child = appendKeyPath(parent, "0");
    expect(child).toEqual(["maps", "0"]);
    expect(parent).toEqual(["maps"]);
  });

  it("should return the last segment", () => {
    expect(lastSegment(["texmap_diffuse", "coords"])).toBe("coords");
    expect(lastSegment(ROOT_PATH)).toBe("");
  });

  it("should parse joined paths", () => {
    expect(parseKeyPath("texmap_diffuse.coords.blur")).toEqual([
      "texmap_diffuse",
      "coords",
      "blur",
    ]);
    expect(parseKeyPath("")).toEqual([]);
  });
});
