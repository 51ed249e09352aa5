/**
 * Generic introspection surface of the application that owns the material
 * graph. Every method except `isNode` may throw; callers isolate failures.
 */
export interface MaterialHost<TNode extends object> {
  /** Runtime class name of a value, e.g. "Float" or "Point3". */
  classOf(value: unknown): string;
  /** Whether the value is a material or texture map handle. */
  isNode(value: unknown): value is TNode;
  nodeName(node: TNode): string;
  /** Property names in authoring order. */
  propertyNames(node: TNode): Iterable<string>;
  getProperty(node: TNode, name: string): unknown;
}

export interface MaterialLibrary<TNode extends object> {
  readonly name: string;
  /** Top-level materials in library order. May throw. */
  materials(): Iterable<TNode>;
}
