import { z } from 'zod';

const searchModeSchema = z.enum(['keyword', 'semantic', 'hybrid']);

export const contextRequestSchema = z.object({
  query: z.string().trim().min(1, 'Query is required and cannot be empty'),
  maxTokens: z.number().int().min(100).max(100000).default(4000),
  searchMode: searchModeSchema.default('hybrid'),
});

export const multiQueryRequestSchema = z.object({
  queries: z
    .array(
      z.object({
        query: z.string().trim().min(1, 'Query cannot be empty'),
        maxTokens: z.number().int().positive().optional(),
      }),
    )
    .min(1, 'At least one query is required')
    .max(10, 'At most 10 queries per request'),
  maxTokens: z.number().int().min(500).max(50000).default(8000),
  searchMode: searchModeSchema.default('hybrid'),
});

export type ContextRequestBody = z.infer<typeof contextRequestSchema>;
export type MultiQueryRequestBody = z.infer<typeof multiQueryRequestSchema>;

type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: Array<{ path: string; message: string }> };

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    return {
      success: false,
      error: result.error.errors.map((e) => ({
        path: e.path.join('.') || 'root',
        message: e.message,
      })),
    };
  }
  return { success: true, data: result.data };
}

export function validateContextRequest(data: unknown): ValidationResult<ContextRequestBody> {
  return validate(contextRequestSchema, data);
}

export function validateMultiQueryRequest(data: unknown): ValidationResult<MultiQueryRequestBody> {
  return validate(multiQueryRequestSchema, data);
}
