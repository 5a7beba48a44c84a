import { z } from "zod";
import type { ManualMatch } from "../types";

const articleNumberSchema = z.coerce.number().int();

const manualMatchSchema = z.object({
  old_number: articleNumberSchema,
  new_number: articleNumberSchema,
});

const manualMatchesFileSchema = z.object({
  manual_matches: z.array(manualMatchSchema).default([]),
});

export type ManualMatchesFile = z.input<typeof manualMatchesFileSchema>;

/**
 * Validates a `{ "manual_matches": [{ "old_number": 5, "new_number": 9 }] }`
 * payload. Numeric strings are accepted. Any integer passes here, since
 * alignment reports pairs naming a missing article. Anything else throws a
 * ZodError.
 */
export function parseManualMatches(payload: unknown): ManualMatch[] {
  const parsed = manualMatchesFileSchema.parse(payload);

  return parsed.manual_matches.map((match) => ({
    oldNumber: match.old_number,
    newNumber: match.new_number,
  }));
}

export function toManualMatchesFile(matches: readonly ManualMatch[]): ManualMatchesFile {
  return {
    manual_matches: matches.map((match) => ({
      old_number: match.oldNumber,
      new_number: match.newNumber,
    })),
  };
}
