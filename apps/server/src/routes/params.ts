import { z } from "zod";

export const IdParamsZ = z.object({ id: z.coerce.number().int().positive() });

export const LimitQueryZ = z.object({ limit: z.coerce.number().int().min(1).max(500).default(100) });

export function clampLimit(q: unknown): number {
  return LimitQueryZ.parse(q ?? {}).limit;
}
