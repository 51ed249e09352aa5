import {
  type KeyPath,
  ROOT_PATH,
  appendKeyPath,
  joinKeyPath,
} from "@matgraph/core/key-path";
import type { Grammar } from "../encode/Grammar.js";
import type { Logger } from "../log/ExportLog.js";
import { displayNodeName, formatExportError } from "../model/errors.js";
import {
  type ClassifiedValue,
  type SequenceValue,
  coercionFailures,
  containsReference,
} from "../model/values.js";
import type { Reflector } from "../reflect/Reflector.js";
import type { OutputSink } from "../sink/OutputSink.js";
import {
  type VisitState,
  type WalkOptions,
  type WalkReport,
  emptyWalkReport,
} from "./types.js";

const INDENT = 2;

type PendingItem<TNode> = {
  path: KeyPath;
  value: ClassifiedValue<TNode>;
};

interface WalkContext<TNode> {
  state: VisitState<TNode>;
  sink: OutputSink;
  report: WalkReport;
}

/**
 * Depth-first traversal of one material graph. Property values are encoded
 * in place; node references are followed and their properties appear nested
 * under the referencing key. Nothing thrown by the host escapes a walk.
 */
export class GraphWalker<TNode extends object> {
  constructor(
    private readonly reflector: Reflector<TNode>,
    private readonly grammar: Grammar,
    private readonly log: Logger,
    private readonly options: WalkOptions
  ) {}

  walk(root: TNode, sink: OutputSink): WalkReport {
    const ctx: WalkContext<TNode> = {
      state: { visitedOnPath: new Set([root]), depth: 0 },
      sink,
      report: emptyWalkReport(),
    };

    const items = this.collect(root, ROOT_PATH, ctx);
    if (items.length === 0) {
      sink.line(this.grammar.emptyDocument());
      return ctx.report;
    }

    const open = this.grammar.documentOpen();
    if (open !== undefined) sink.line(open).pushIndentation(INDENT);
    this.emitItems(items, ctx);
    const close = this.grammar.documentClose();
    if (open !== undefined) sink.popIndentation();
    if (close !== undefined) sink.line(close);

    return ctx.report;
  }

  /**
   * Read every property of `node` that is not excluded. Failures are logged
   * and leave the property out.
   */
  private collect(
    node: TNode,
    path: KeyPath,
    ctx: WalkContext<TNode>
  ): PendingItem<TNode>[] {
    this.log.debug(
      `Visiting ${displayNodeName(this.reflector.nodeName(node))} at ${describePath(path)}`
    );

    const names = this.reflector.propertyNames(node);
    if (!names.success) {
      ctx.report.introspectionFailures++;
      this.log.warn(`${formatExportError(names.error)} (at ${describePath(path)})`);
      return [];
    }

    const items: PendingItem<TNode>[] = [];
    for (const name of names.data) {
      const propertyPath = appendKeyPath(path, name);
      if (this.options.isExcluded?.(propertyPath)) continue;

      const value = this.reflector.readProperty(node, name);
      if (!value.success) {
        ctx.report.readFailures++;
        this.log.warn(
          `${formatExportError(value.error)} (at ${joinKeyPath(propertyPath)})`
        );
        continue;
      }
      items.push({ path: propertyPath, value: value.data });
    }
    return items;
  }

  private emitItems(items: PendingItem<TNode>[], ctx: WalkContext<TNode>): void {
    items.forEach((item, index) => {
      const separator =
        index === items.length - 1 ? "" : this.grammar.separator;
      this.emitItem(item, separator, ctx);
    });
  }

  private emitItem(
    { path, value }: PendingItem<TNode>,
    separator: string,
    ctx: WalkContext<TNode>
  ): void {
    if (value.kind === "reference") {
      this.emitReference(path, value.node, separator, ctx);
      return;
    }
    if (value.kind === "sequence" && containsReference(value)) {
      this.emitBlock(path, expandSequence(path, value), separator, ctx);
      return;
    }

    for (const failure of coercionFailures(value)) {
      ctx.report.coercionFailures++;
      this.log.warn(`${formatExportError(failure)} (at ${joinKeyPath(path)})`);
    }
    ctx.sink.line(this.grammar.entry(path, value) + separator);
    ctx.report.properties++;
  }

  private emitReference(
    path: KeyPath,
    target: TNode,
    separator: string,
    ctx: WalkContext<TNode>
  ): void {
    const { state, sink, report } = ctx;

    if (state.visitedOnPath.has(target)) {
      report.cycles++;
      this.log.info(
        `Cycle at ${joinKeyPath(path)}: ${displayNodeName(this.reflector.nodeName(target))} is already being exported`
      );
      sink.line(this.grammar.truncated(path, "cycle") + separator);
      return;
    }
    if (state.depth >= this.options.maxDepth) {
      report.depthLimited++;
      this.log.warn(
        `Depth limit of ${this.options.maxDepth} reached at ${joinKeyPath(path)}`
      );
      sink.line(this.grammar.truncated(path, "depth") + separator);
      return;
    }

    state.visitedOnPath.add(target);
    state.depth++;
    try {
      this.emitBlock(path, this.collect(target, path, ctx), separator, ctx);
    } finally {
      state.depth--;
      state.visitedOnPath.delete(target);
    }
  }

  private emitBlock(
    path: KeyPath,
    children: PendingItem<TNode>[],
    separator: string,
    ctx: WalkContext<TNode>
  ): void {
    const { sink } = ctx;
    if (children.length === 0) {
      sink.line(this.grammar.emptyNode(path) + separator);
      return;
    }

    sink.line(this.grammar.nodeOpen(path)).pushIndentation(INDENT);
    this.emitItems(children, ctx);
    sink.popIndentation();
    const close = this.grammar.nodeClose();
    if (close !== undefined) sink.line(close + separator);
  }
}

/**
 * Sequences holding node references become mappings keyed by element index,
 * so each referenced node can be expanded under its own key path.
 */
function expandSequence<TNode>(
  path: KeyPath,
  sequence: SequenceValue<TNode>
): PendingItem<TNode>[] {
  return sequence.items.map((value, index) => ({
    path: appendKeyPath(path, String(index)),
    value,
  }));
}

function describePath(path: KeyPath): string {
  return path.length === 0 ? "<root>" : joinKeyPath(path);
}
