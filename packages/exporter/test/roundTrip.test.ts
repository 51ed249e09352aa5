import { describe, it, expect } from "vitest";
import type { FormatStyle } from "@matgraph/core/configuration";
import { joinKeyPath } from "@matgraph/core/key-path";
import { decodeEntry } from "../src/decode/decode.js";
import type { DecodedValue } from "../src/decode/types.js";
import { encode } from "../src/encode/encode.js";
import {
  type ClassifiedValue,
  type ScalarValue,
  floatValue,
} from "../src/model/values.js";
import { textureMap } from "./utils/fixtures.js";

type Sample = {
  name: string;
  value: ClassifiedValue;
  decoded: DecodedValue;
};

const same = (name: string, value: ScalarValue): Sample => ({
  name,
  value,
  decoded: value,
});

const samples: Sample[] = [
  same("int", { kind: "int", value: 10n }),
  same("negative int", { kind: "int", value: -7n }),
  same("64-bit int", { kind: "int", value: 2n ** 60n }),
  same("min 64-bit int", { kind: "int", value: -(2n ** 63n) }),
  same("float", floatValue(0.5)),
  same("whole float", floatValue(1)),
  same("large float", floatValue(1e21)),
  same("negative zero", floatValue(-0)),
  same("infinity", floatValue(Infinity)),
  same("negative infinity", floatValue(-Infinity)),
  same("nan", floatValue(NaN)),
  same("bool", { kind: "bool", value: false }),
  same("string", { kind: "string", value: "brick.png" }),
  same("windows path", { kind: "string", value: "C:\\maps\\brick.png" }),
  same("quotes", { kind: "string", value: `it's "wet"` }),
  same("control characters", { kind: "string", value: "a\tb\u0085c" }),
  same("number-like string", { kind: "string", value: "1.0" }),
  same("name", { kind: "symbol", name: "Standard" }),
  same("name with space", { kind: "symbol", name: "Blinn Phong" }),
  same("color", { kind: "color", channels: [200, 64, 32, 255] }),
  same("point2", { kind: "point2", components: [0.5, 1] }),
  same("point3", { kind: "point3", components: [0, Infinity, -1] }),
  same("point4", { kind: "point4", components: [1, 2, 3, -Infinity] }),
  same("matrix3", {
    kind: "matrix3",
    rows: [
      [1, 0, 0],
      [0, 1, 0],
      [0, 0, 1],
      [10, 20, 30.5],
    ],
  }),
  same("bitarray", { kind: "bitset", bits: [1, 3, 5] }),
  same("empty bitarray", { kind: "bitset", bits: [] }),
  {
    name: "sequence",
    value: {
      kind: "sequence",
      items: [
        { kind: "int", value: 1n },
        floatValue(Infinity),
        { kind: "symbol", name: "Standard" },
        { kind: "point2", components: [0, 1] },
        { kind: "sequence", items: [] },
      ],
    },
    decoded: {
      kind: "sequence",
      items: [
        { kind: "int", value: 1n },
        floatValue(Infinity),
        { kind: "symbol", name: "Standard" },
        { kind: "point2", components: [0, 1] },
        { kind: "sequence", items: [] },
      ],
    },
  },
  {
    name: "unknown",
    value: {
      kind: "unknown",
      raw: null,
      text: { success: true, data: "<Bitmap:brick>" },
    },
    decoded: { kind: "unknown", text: "<Bitmap:brick>" },
  },
  {
    name: "unprintable",
    value: {
      kind: "unknown",
      raw: null,
      text: { success: false, error: { type: "coercion", message: "no text" } },
    },
    decoded: { kind: "unknown", text: "<unprintable>" },
  },
  {
    name: "reference",
    value: { kind: "reference", node: textureMap("Noise") },
    decoded: { kind: "truncated", reason: "reference" },
  },
];

const styles: FormatStyle[] = ["flow-mapping", "tagged-scalar", "prefixed-key"];

const path = ["texmap_diffuse", "coords", "blur"];

describe.each(styles)("round trip in %s", (style) => {
  const expectedKey = style === "prefixed-key" ? joinKeyPath(path) : "blur";

  it.each(samples)("should decode $name back to the same value", (sample) => {
    const fragment = encode(path, sample.value, style);
    const decoded = decodeEntry(fragment, style);

    expect(decoded).toEqual({
      success: true,
      data: { key: expectedKey, value: sample.decoded },
    });
  });

  it("should round trip keys longer than an implicit YAML key", () => {
    for (const key of ["k".repeat(1100), "long key ".repeat(150)]) {
      const decoded = decodeEntry(encode([key], floatValue(0.5), style), style);
      expect(decoded).toEqual({
        success: true,
        data: { key, value: floatValue(0.5) },
      });
    }
  });

  it("should round trip keys that need quoting", () => {
    for (const key of ["on", "diffuse color", "0", "it's"]) {
      const decoded = decodeEntry(encode([key], { kind: "int", value: 1n }, style), style);
      expect(decoded).toEqual({
        success: true,
        data: { key, value: { kind: "int", value: 1n } },
      });
    }
  });
});
