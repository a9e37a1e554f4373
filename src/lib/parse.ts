import type z from "zod";

export function tryParse<T, F>(jsonString: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: F): T | F {
  try {
    const result = schema.safeParse(JSON.parse(jsonString));
    return result.success ? result.data : fallback;
  } catch {
    return fallback;
  }
}
