// node/src/routes/query-params.ts — shared ?q=&k= validation for the search endpoints
import { z } from 'zod';

export const MAX_K = 50;

export function clampK(k: number): number {
  return Math.min(MAX_K, Math.max(1, Math.trunc(k)));
}

/** A blank `k` counts as absent rather than as zero. */
function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

/** `q` must be non-blank; a missing, blank or non-numeric `k` falls back to `defaultK`, then clamps. */
export function searchParamsSchema(defaultK: number) {
  return z.object({
    q: z
      .string({ required_error: 'q is required', invalid_type_error: 'q must be a single string' })
      .trim()
      .min(1, 'q is required'),
    k: z.preprocess(blankToUndefined, z.coerce.number().finite()).catch(defaultK).transform(clampK),
  });
}

export type SearchParams = z.infer<ReturnType<typeof searchParamsSchema>>;

export function formatIssues(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.errors.map((e) => ({ path: e.path.join('.') || 'query', message: e.message }));
}
