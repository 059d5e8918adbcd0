/**
 * Deep merge of config.local.yaml over config.yaml. Defaults are applied
 * afterwards by the zod schema.
 *
 * - Objects: recursive deep merge
 * - Arrays: replace entirely
 * - null values: delete the key from result
 * - Scalars: override
 */

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export function isPlainObject(value: unknown): value is Record<string, JsonValue> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function deepMerge(
  base: Record<string, JsonValue>,
  override: Record<string, JsonValue>
): Record<string, JsonValue> {
  const result: Record<string, JsonValue> = { ...base };

  for (const [key, overrideValue] of Object.entries(override)) {
    if (overrideValue === null) {
      delete result[key];
      continue;
    }

    const baseValue = result[key];
    if (isPlainObject(baseValue) && isPlainObject(overrideValue)) {
      result[key] = deepMerge(baseValue, overrideValue);
      continue;
    }

    result[key] = overrideValue;
  }

  return result;
}
