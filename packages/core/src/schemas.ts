// packages/core/src/schemas.ts
import { z } from 'zod';

// Optional override; blank strings and "(auto)" mean "detect".
const FieldOverride = z
  .string()
  .trim()
  .max(200)
  .optional()
  .transform((v) => (v && v !== '(auto)' ? v : undefined));

// POST /translate, POST /ask
export const AskRequestSchema = z.object({
  question: z.string().trim().min(1, 'question is required').max(1000),
  dateField: FieldOverride,
  costField: FieldOverride,
}).strict();
export type AskRequest = z.infer<typeof AskRequestSchema>;

// POST /ingest querystring
export const IngestQuerySchema = z.object({
  sheet: z.string().trim().min(1).optional(),
  debug: z.string().optional(),
}).passthrough();
export type IngestQuery = z.infer<typeof IngestQuerySchema>;

// Notice messages shown to the caller (never errors)
export const Notices = {
  UNRECOGNIZED_INTENT: () => ({
    code: 'UNRECOGNIZED_INTENT' as const,
    message: 'Could not tell what to compute; showing a count of matching shipments. Try "how many", "total cost", "top 5" or "grouped by <field>".'
  }),
  NO_COST_FIELD: () => ({
    code: 'NO_COST_FIELD' as const,
    message: 'No cost field is available in this dataset; pick one with the cost field override.'
  }),
  NO_DATE_FIELD: (phrase: string) => ({
    code: 'NO_DATE_FIELD' as const,
    message: `No date field is available, so "${phrase}" was ignored.`
  }),
  NO_GROUP_FIELD: (token: string) => ({
    code: 'NO_GROUP_FIELD' as const,
    message: `Cannot resolve a field to group by from "${token}".`
  }),
  NO_IDENTIFIER_FIELD: () => ({
    code: 'NO_IDENTIFIER_FIELD' as const,
    message: 'No reference/tracking field was found to check for duplicates.'
  }),
} as const;
