import { describe, it, expect } from "vitest";
import dedent from "dedent";
import { joinKeyPath } from "@matgraph/core/key-path";
import { Color, ReadFailure } from "../src/host/MemoryHost.js";
import {
  createBrick,
  material,
  quietLog,
  textureMap,
  walkToText,
} from "./utils/fixtures.js";

const lines = (text: string): string => dedent(text) + "\n";

describe("GraphWalker", () => {
  describe("layout", () => {
    it("should nest referenced nodes in tagged-scalar", () => {
      const { text, report } = walkToText(createBrick(), "tagged-scalar");

      expect(text).toBe(
        lines(`
          diffuse: !color [200.0, 64.0, 32.0, 255.0]
          glossiness: 10
          texmap_diffuse:
            filename: "brick.png"
            coords:
              blur: 0.5
              tiling: !point2 [2.0, 2.0]
        `)
      );
      expect(report.properties).toBe(5);
    });

    it("should spell full key paths in prefixed-key", () => {
      const { text } = walkToText(createBrick(), "prefixed-key");

      expect(text).toBe(
        lines(`
          diffuse: !color [200.0, 64.0, 32.0, 255.0]
          glossiness: 10
          texmap_diffuse:
            texmap_diffuse.filename: 'brick.png'
            texmap_diffuse.coords:
              texmap_diffuse.coords.blur: 0.5
              texmap_diffuse.coords.tiling: !point2 [2.0, 2.0]
        `)
      );
    });

    it("should write separators and braces in flow-mapping", () => {
      const { text } = walkToText(createBrick(), "flow-mapping");

      expect(text).toBe(
        lines(`
          {
            "diffuse": {"type": "color", "value": [200.0, 64.0, 32.0, 255.0]},
            "glossiness": {"type": "int", "value": 10},
            "texmap_diffuse": {
              "filename": {"type": "string", "value": "brick.png"},
              "coords": {
                "blur": {"type": "float", "value": 0.5},
                "tiling": {"type": "point2", "value": [2.0, 2.0]}
              }
            }
          }
        `)
      );
      expect(JSON.parse(text)).toEqual({
        diffuse: { type: "color", value: [200, 64, 32, 255] },
        glossiness: { type: "int", value: 10 },
        texmap_diffuse: {
          filename: { type: "string", value: "brick.png" },
          coords: {
            blur: { type: "float", value: 0.5 },
            tiling: { type: "point2", value: [2, 2] },
          },
        },
      });
    });

    it("should write an empty mapping for a material without properties", () => {
      expect(walkToText(material("Empty"), "tagged-scalar").text).toBe("{}\n");
      expect(walkToText(material("Empty"), "flow-mapping").text).toBe("{}\n");
    });

    it("should write an empty mapping for a node without properties", () => {
      const brick = material("Brick", { map: textureMap("Blank"), ior: 1.5 });
      expect(walkToText(brick, "flow-mapping").text).toBe(
        lines(`
          {
            "map": {},
            "ior": {"type": "float", "value": 1.5}
          }
        `)
      );
    });
  });

  describe("long keys", () => {
    it("should open a nested node under an explicit key", () => {
      const long = "k".repeat(1100);
      const brick = material("Brick", {
        [long]: textureMap("Coords", { blur: 0.5 }),
      });

      expect(walkToText(brick, "tagged-scalar").text).toBe(
        `? ${long}\n:\n  blur: 0.5\n`
      );
    });
  });

  describe("cycles", () => {
    it("should cut a cycle with exactly one placeholder", () => {
      const loop = material("Loop", { glossiness: 5n });
      const mix = textureMap("Mix", { amount: 0.25, parent: loop });
      loop.set("map", mix);

      const { text, report, log } = walkToText(loop, "tagged-scalar");

      expect(text).toBe(
        lines(`
          glossiness: 5
          map:
            amount: 0.25
            parent: !truncated cycle
        `)
      );
      expect(text.split("!truncated cycle")).toHaveLength(2);
      expect(report.cycles).toBe(1);
      expect(log.entries).toEqual([
        {
          level: "info",
          message: 'Cycle at map.parent: "Loop" is already being exported',
        },
      ]);
    });

    it("should cut a node that references itself", () => {
      const node = material("Self");
      node.set("self", node);

      expect(walkToText(node, "flow-mapping").text).toBe(
        lines(`
          {
            "self": {"type": "truncated", "value": "cycle"}
          }
        `)
      );
    });

    it("should expand shared siblings at each occurrence", () => {
      const shared = textureMap("Shared", { amount: 1n });
      const brick = material("Brick", { a: shared, b: shared });

      const { text, report } = walkToText(brick, "tagged-scalar");

      expect(text).toBe(
        lines(`
          a:
            amount: 1
          b:
            amount: 1
        `)
      );
      expect(report.cycles).toBe(0);
    });
  });

  describe("depth limit", () => {
    const chain = (length: number) => {
      const nodes = Array.from({ length }, (_, index) =>
        textureMap(`Level${index}`, { level: BigInt(index) })
      );
      nodes.forEach((node, index) => {
        const next = nodes[index + 1];
        if (next) node.set("next", next);
      });
      return nodes;
    };

    it("should stop descending at maxDepth", () => {
      const [root] = chain(5);
      if (!root) throw new Error("empty chain");

      const { text, report, log } = walkToText(root, "tagged-scalar", {
        maxDepth: 2,
      });

      expect(text).toBe(
        lines(`
          level: 0
          next:
            level: 1
            next:
              level: 2
              next: !truncated depth
        `)
      );
      expect(report.depthLimited).toBe(1);
      expect(log.entries).toEqual([
        { level: "warn", message: "Depth limit of 2 reached at next.next.next" },
      ]);
    });

    it("should not descend at all with maxDepth 0", () => {
      const [root] = chain(2);
      if (!root) throw new Error("empty chain");

      expect(walkToText(root, "prefixed-key", { maxDepth: 0 }).text).toBe(
        lines(`
          level: 0
          next: !truncated depth
        `)
      );
    });
  });

  describe("failures", () => {
    it("should leave out a property that cannot be read and go on", () => {
      const brick = material("Brick", {
        diffuse: new Color(1, 2, 3),
        glossiness: new ReadFailure("access denied"),
        coords: textureMap("Coords", { blur: 0.5 }),
      });

      const { text, report, log } = walkToText(brick, "prefixed-key");

      expect(text).toBe(
        lines(`
          diffuse: !color [1.0, 2.0, 3.0, 255.0]
          coords:
            coords.blur: 0.5
        `)
      );
      expect(report.readFailures).toBe(1);
      expect(report.properties).toBe(2);
      expect(log.entries).toEqual([
        {
          level: "warn",
          message: 'Cannot read "glossiness" of "Brick": access denied (at glossiness)',
        },
      ]);
    });

    it("should keep separators valid when the last property fails", () => {
      const brick = material("Brick", {
        glossiness: 1n,
        opacity: new ReadFailure("access denied"),
      });

      expect(walkToText(brick, "flow-mapping").text).toBe(
        lines(`
          {
            "glossiness": {"type": "int", "value": 1}
          }
        `)
      );
    });

    it("should treat a node that cannot list its properties as empty", () => {
      const brick = material("Brick", {
        map: textureMap("Broken").failEnumeration("handle lost"),
        glossiness: 1n,
      });

      const { text, report, log } = walkToText(brick, "tagged-scalar");

      expect(text).toBe(
        lines(`
          map: {}
          glossiness: 1
        `)
      );
      expect(report.introspectionFailures).toBe(1);
      expect(log.entries).toEqual([
        {
          level: "warn",
          message: 'Cannot list properties of "Broken": handle lost (at map)',
        },
      ]);
    });

    it("should write an empty document when the material cannot be listed", () => {
      const brick = material("Brick").failEnumeration("handle lost");
      const { text, log } = walkToText(brick, "prefixed-key");

      expect(text).toBe("{}\n");
      expect(log.entries).toEqual([
        {
          level: "warn",
          message: 'Cannot list properties of "Brick": handle lost (at <root>)',
        },
      ]);
    });

    it("should write the sentinel for values that refuse to become text", () => {
      const brick = material("Brick", {
        handle: {
          toString(): string {
            throw new Error("no text");
          },
        },
      });

      const { text, report, log } = walkToText(brick, "tagged-scalar");

      expect(text).toBe('handle: !unknown "<unprintable>"\n');
      expect(report.coercionFailures).toBe(1);
      expect(log.entries).toEqual([
        {
          level: "warn",
          message: "Cannot render value as text: no text (at handle)",
        },
      ]);
    });
  });

  describe("sequences", () => {
    it("should write sequences of plain values inline", () => {
      const brick = material("Brick", { levels: [1n, 0.5, "a"] });
      expect(walkToText(brick, "tagged-scalar").text).toBe(
        'levels: [1, 0.5, "a"]\n'
      );
    });

    it("should expand sequences holding nodes by index", () => {
      const brick = material("Brick", {
        maps: [textureMap("A", { filename: "a.png" }), 0.5],
      });

      expect(walkToText(brick, "tagged-scalar").text).toBe(
        lines(`
          maps:
            "0":
              filename: "a.png"
            "1": 0.5
        `)
      );
      expect(walkToText(brick, "prefixed-key").text).toBe(
        lines(`
          maps:
            'maps.0':
              'maps.0.filename': 'a.png'
            'maps.1': 0.5
        `)
      );
    });

    it("should detect cycles through sequences", () => {
      const brick = material("Brick");
      brick.set("maps", [textureMap("A", { owner: brick })]);

      expect(walkToText(brick, "flow-mapping").text).toBe(
        lines(`
          {
            "maps": {
              "0": {
                "owner": {"type": "truncated", "value": "cycle"}
              }
            }
          }
        `)
      );
    });
  });

  describe("exclusion", () => {
    it("should neither read nor write excluded properties", () => {
      const brick = material("Brick", {
        secret: new ReadFailure("access denied"),
        glossiness: 1n,
      });

      const { text, report } = walkToText(brick, "tagged-scalar", {
        isExcluded: (path) => joinKeyPath(path) === "secret",
      });

      expect(text).toBe("glossiness: 1\n");
      expect(report.readFailures).toBe(0);
    });
  });

  describe("logging", () => {
    it("should log visited nodes at debug level", () => {
      const log = quietLog({ debug: true });
      walkToText(createBrick(), "tagged-scalar", {}, log);

      expect(log.entries.map((entry) => entry.message)).toEqual([
        'Visiting "Brick" at <root>',
        'Visiting "Brick Bitmap" at texmap_diffuse',
        'Visiting "Coords" at texmap_diffuse.coords',
      ]);
      expect(log.count("debug")).toBe(3);
    });
  });
});
