/**
 * Runtime class names a host reports through `classOf` for the values the
 * classifier understands. Anything else is classified structurally.
 */
export const HostClass = {
  Integer: "Integer",
  Integer64: "Integer64",
  IntegerPtr: "IntegerPtr",
  Float: "Float",
  Double: "Double",
  Boolean: "BooleanClass",
  String: "String",
  Name: "Name",
  Color: "Color",
  Point2: "Point2",
  Point3: "Point3",
  Point4: "Point4",
  Matrix3: "Matrix3",
  BitArray: "BitArray",
  Array: "Array",
  Undefined: "UndefinedClass",
  Value: "Value",
} as const;

export type HostClass = (typeof HostClass)[keyof typeof HostClass];
