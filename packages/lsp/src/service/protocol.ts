import { z } from 'zod';

import { ProtocolError } from '../errors.js';

const positionSchema = z.object({
  line: z.number().int().nonnegative(),
  character: z.number().int().nonnegative(),
});

const rangeSchema = z.object({
  start: positionSchema,
  end: positionSchema,
});

const locationSchema = z.object({
  uri: z.string(),
  range: rangeSchema,
});

const locationLinkSchema = z.object({
  originSelectionRange: rangeSchema.optional(),
  targetUri: z.string(),
  targetRange: rangeSchema,
  targetSelectionRange: rangeSchema,
});

const markupContentSchema = z.object({
  kind: z.string(),
  value: z.string(),
});

const languageStringSchema = z.object({
  language: z.string(),
  value: z.string(),
});

const markedStringSchema = z.union([z.string(), languageStringSchema]);

export const hoverSchema = z
  .object({
    contents: z.union([
      markupContentSchema,
      markedStringSchema,
      z.array(markedStringSchema),
    ]),
    range: rangeSchema.optional(),
  })
  .nullable();

export const definitionSchema = z
  .union([locationSchema, z.array(locationSchema), z.array(locationLinkSchema)])
  .nullable();

export const referencesSchema = z.array(locationSchema).nullable();

const diagnosticSchema = z.object({
  range: rangeSchema,
  severity: z.number().int().optional(),
  code: z.union([z.string(), z.number()]).optional(),
  source: z.string().optional(),
  message: z.string(),
});

export const documentDiagnosticReportSchema = z.union([
  z.object({
    kind: z.literal('full'),
    resultId: z.string().optional(),
    items: z.array(diagnosticSchema),
  }),
  z.object({
    kind: z.literal('unchanged'),
    resultId: z.string(),
  }),
]);

export const initializeResultSchema = z
  .object({ capabilities: z.record(z.unknown()) })
  .passthrough();

export type Position = z.infer<typeof positionSchema>;
export type Range = z.infer<typeof rangeSchema>;
export type Location = z.infer<typeof locationSchema>;
export type LocationLink = z.infer<typeof locationLinkSchema>;
export type MarkedString = z.infer<typeof markedStringSchema>;
export type Hover = NonNullable<z.infer<typeof hoverSchema>>;
export type Diagnostic = z.infer<typeof diagnosticSchema>;
export type DocumentDiagnosticReport = z.infer<
  typeof documentDiagnosticReportSchema
>;
export type InitializeResult = z.infer<typeof initializeResultSchema>;

export const DiagnosticSeverity = {
  Error: 1,
  Warning: 2,
  Information: 3,
  Hint: 4,
} as const;

/**
 * Validates a response `result` against `schema`.
 */
export function parseResult<T extends z.ZodTypeAny>(
  method: string,
  schema: T,
  result: unknown,
): z.infer<T> {
  const parsed = schema.safeParse(result);
  if (!parsed.success) {
    throw new ProtocolError(
      `failed to deserialize '${method}' response: ${parsed.error.message}`,
      { cause: parsed.error },
    );
  }
  return parsed.data;
}

/**
 * Flattens every definition answer shape to plain locations. Links point at
 * their target's selection range.
 */
export function normalizeDefinition(
  result: z.infer<typeof definitionSchema>,
): Location[] | null {
  if (result === null) {
    return null;
  }
  if (!Array.isArray(result)) {
    return [result];
  }
  const items: Array<Location | LocationLink> = result;
  return items.map((item) =>
    'targetUri' in item
      ? { uri: item.targetUri, range: item.targetSelectionRange }
      : item,
  );
}
