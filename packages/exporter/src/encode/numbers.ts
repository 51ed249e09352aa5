import {
  type FloatValue,
  type SpecialFloatState,
  floatValue,
} from "../model/values.js";

export type SpecialFloatLiterals = Readonly<Record<SpecialFloatState, string>>;

/** YAML 1.2 core schema spellings. */
export const YAML_SPECIAL_FLOATS: SpecialFloatLiterals = {
  positiveInfinity: ".inf",
  negativeInfinity: "-.inf",
  nan: ".nan",
};

/** JSON has no literal for these, so they travel as strings. */
export const JSON_SPECIAL_FLOATS: SpecialFloatLiterals = {
  positiveInfinity: '"inf"',
  negativeInfinity: '"-inf"',
  nan: '"nan"',
};

export function formatInteger(value: number | bigint): string {
  if (typeof value === "bigint") return value.toString();
  if (Number.isSafeInteger(value)) return String(value);
  if (Number.isInteger(value)) return BigInt(value).toString();
  return String(Math.trunc(value));
}

/**
 * Shortest round-tripping text for a finite float, always with a decimal
 * point so the value cannot be read back as an integer.
 *
 * @example
 * formatFiniteFloat(1)     // "1.0"
 * formatFiniteFloat(0.25)  // "0.25"
 * formatFiniteFloat(1e21)  // "1.0e+21"
 * formatFiniteFloat(-0)    // "-0.0"
 */
export function formatFiniteFloat(value: number): string {
  if (Object.is(value, -0)) return "-0.0";
  const text = String(value);
  if (text.includes(".")) return text;
  const exponent = text.indexOf("e");
  if (exponent === -1) return `${text}.0`;
  return `${text.slice(0, exponent)}.0${text.slice(exponent)}`;
}

export function formatFloat(
  value: FloatValue,
  specials: SpecialFloatLiterals
): string {
  if (value.state === "finite") return formatFiniteFloat(value.value);
  return specials[value.state];
}

/**
 * Components of colors, points and matrices are floats on every host.
 */
export function formatComponents(
  components: readonly number[],
  specials: SpecialFloatLiterals
): string {
  const parts = components.map((component) =>
    formatFloat(floatValue(component), specials)
  );
  return `[${parts.join(", ")}]`;
}
