import { z } from 'zod';
import { NARRATIVE_LABELS, type NarrativeLabel } from '../../shared/types';
import keywordLabelsJson from './keywordLabels.json';

const KeywordTableSchema = z
  .array(
    z.object({
      label: z.enum(NARRATIVE_LABELS),
      keywords: z.array(z.string().trim().toLowerCase().min(1)).min(1),
    }),
  )
  .superRefine((rows, ctx) => {
    const seen = new Set<string>();
    for (const row of rows) {
      if (seen.has(row.label)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate label: ${row.label}` });
      }
      seen.add(row.label);
    }
  });

export type KeywordTable = ReadonlyArray<{ label: NarrativeLabel; keywords: readonly string[] }>;

export const parseKeywordTable = (input: unknown): KeywordTable => KeywordTableSchema.parse(input);

export const KEYWORD_LABELS: KeywordTable = parseKeywordTable(keywordLabelsJson);
