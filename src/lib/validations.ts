import { z } from 'zod';

/**
 * Zod schemas for the knowledge base file and search queries
 */

export const rawDocumentSchema = z
  .object({
    question: z.string({ required_error: 'question is required' }),
    text: z.string({ required_error: 'text is required' }),
    section: z.string({ required_error: 'section is required' }),
  })
  .passthrough();

/**
 * A group whose identifier lives under `groupField`, normalized to `{ groupId, documents }`
 */
export const rawGroupSchema = (groupField: string) =>
  z
    .object({
      documents: z.array(rawDocumentSchema, {
        required_error: 'documents is required',
        invalid_type_error: 'documents must be an array',
      }),
    })
    .passthrough()
    .transform((group, ctx) => {
      const groupId = group[groupField];
      if (typeof groupId !== 'string') {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [groupField],
          message: groupId === undefined ? `${groupField} is required` : `${groupField} must be a string`,
        });
        return z.NEVER;
      }
      return { groupId, documents: group.documents };
    });

export const rawCollectionSchema = (groupField: string) =>
  z.array(rawGroupSchema(groupField), {
    invalid_type_error: 'Knowledge base must be an array of groups',
  });

export const searchQuerySchema = z.object({
  text: z.string({ invalid_type_error: 'Query text must be a string' }),
  boosts: z
    .record(z.number().finite().positive('Boost weights must be positive'))
    .optional(),
  filters: z.record(z.string()).optional(),
  limit: z
    .number()
    .int('limit must be an integer')
    .positive('limit must be a positive integer')
    .default(5),
});

export type ValidatedSearchQuery = z.infer<typeof searchQuerySchema>;
