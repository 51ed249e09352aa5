import { z } from "zod";

// Channels and components may legitimately be infinite or NaN, which
// z.number() rejects.
const HostNumber = z.custom<number>((value) => typeof value === "number");

export const ColorShape = z.object({
  r: HostNumber,
  g: HostNumber,
  b: HostNumber,
  a: HostNumber.optional(),
});

export const Point2Shape = z.object({ x: HostNumber, y: HostNumber });

export const Point3Shape = z.object({
  x: HostNumber,
  y: HostNumber,
  z: HostNumber,
});

export const Point4Shape = z.object({
  x: HostNumber,
  y: HostNumber,
  z: HostNumber,
  w: HostNumber,
});

export const Matrix3Shape = z.object({
  row1: Point3Shape,
  row2: Point3Shape,
  row3: Point3Shape,
  row4: Point3Shape,
});

export const BitPositions = z.array(z.number().int().nonnegative());
