/**
 * Income Verification MCP - Zod Validation Schemas
 *
 * Input validation for every MCP tool.
 *
 * @module utils/validation
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @throws ValidationError listing every failing path
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Applicant's declared record
 */
export const ApplicationRecordSchema = z.object({
  full_name: z.string().describe('Applicant full name as declared'),
  annual_salary: z
    .number()
    .int('annual_salary must be a whole number')
    .min(0, 'annual_salary cannot be negative')
    .describe('Declared annual salary (0 = not provided)'),
  employer_name: z.string().describe('Declared employer name'),
  ssn: z.string().describe('Declared SSN (full or last 4); only the last 4 characters are compared'),
});

/**
 * Raw extraction: either model text (JSON possibly wrapped in prose/fences)
 * or an already-parsed field mapping
 */
export const RawExtractionSchema = z.union([
  z.string().min(1, 'Extraction text cannot be empty'),
  z.record(z.string(), z.unknown()),
]);

const IdSchema = z.string().trim().min(1, 'ID is required').max(200);

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL INPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const NormalizeInput = z.object({
  extraction: RawExtractionSchema,
});

export const CompareInput = z.object({
  application: ApplicationRecordSchema,
  extraction: RawExtractionSchema,
});

export const SimilarityInput = z.object({
  a: z.string(),
  b: z.string(),
  kind: z.enum(['name', 'employer']).default('name'),
});

export const VerifyDocumentInput = z.object({
  application_id: IdSchema,
  document_id: IdSchema,
  application: ApplicationRecordSchema,
  document_ref: z
    .string()
    .trim()
    .min(1, 'document_ref is required')
    .describe('Local file path or http(s) URL of the pay document image'),
});

export const HistoryInput = z.object({
  application_id: IdSchema.optional(),
  limit: z.number().int().min(1).max(100).default(20),
  offset: z.number().int().min(0).default(0),
});

export const ApplicationIdInput = z.object({
  application_id: IdSchema,
});
