import { describe, it, expect } from "vitest";
import { digestText } from "../src/hash.js";

describe("digestText", () => {
  it("should return the md5 hex digest", () => {
    expect(digestText("")).toBe("d41d8cd98f00b204e9800998ecf8427e");
    expect(digestText("abc")).toBe("900150983cd24fb0d6963f7d28e17f72");
  });

  it("should tell different documents apart", () => {
    expect(digestText("glossiness: 10\n")).not.toBe(
      digestText("glossiness: 11\n")
    );
  });
});
