import {
  type Result,
  describeThrown,
  tryCatch,
  unwrapOr,
} from "@matgraph/core/result";
import { TypeClassifier } from "../classify/TypeClassifier.js";
import type { MaterialHost } from "../host/MaterialHost.js";
import type { IntrospectionError, PropertyReadError } from "../model/errors.js";
import type { ClassifiedValue } from "../model/values.js";

/**
 * Reads nodes through the host and turns every host exception into an error
 * value scoped to one node or one property.
 */
export class Reflector<TNode extends object> {
  private readonly classifier: TypeClassifier<TNode>;

  constructor(private readonly host: MaterialHost<TNode>) {
    this.classifier = new TypeClassifier(host);
  }

  /** Node name, or "" when the host cannot provide one. */
  nodeName(node: TNode): string {
    return unwrapOr(
      tryCatch(() => String(this.host.nodeName(node)), describeThrown),
      ""
    );
  }

  /**
   * Property names in host order. Repeated names keep their first position.
   */
  propertyNames(node: TNode): Result<readonly string[], IntrospectionError> {
    return tryCatch(
      () => [...new Set(Array.from(this.host.propertyNames(node), String))],
      (thrown): IntrospectionError => ({
        type: "introspection",
        node: this.nodeName(node),
        message: describeThrown(thrown),
      })
    );
  }

  readProperty(
    node: TNode,
    name: string
  ): Result<ClassifiedValue<TNode>, PropertyReadError> {
    return tryCatch(
      () => this.classifier.classify(this.host.getProperty(node, name)),
      (thrown): PropertyReadError => ({
        type: "propertyRead",
        node: this.nodeName(node),
        property: name,
        message: describeThrown(thrown),
      })
    );
  }
}
