import { z } from 'zod';

export const RubricStageSchema = z.object({
  stage: z.number().int().min(1).max(4),
  description: z.string().min(1),
  patterns: z.array(z.string().min(1)).default([]),
  keywords: z.array(z.string().min(1)).default([]),
  min_matches: z.number().int().min(1).default(1),
}).strict().superRefine((stage, ctx) => {
  if (stage.patterns.length === 0 && stage.keywords.length === 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Stage ${stage.stage} must define at least one pattern or keyword`,
    });
  }
  stage.patterns.forEach((pattern, index) => {
    try {
      new RegExp(pattern, 'i');
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid pattern: ${err instanceof Error ? err.message : String(err)}`,
        path: ['patterns', index],
      });
    }
  });
});

export const RubricThemeSchema = z.object({
  id: z.string().regex(/^[A-Za-z0-9_-]+$/, 'Theme id may only contain letters, digits, "_" and "-"'),
  name: z.string().min(1),
  description: z.string().optional(),
  /** Retrieval query used to rank evidence for this theme. Defaults to the name. */
  query: z.string().min(1).optional(),
  min_quotes: z.number().int().min(1).optional(),
  stage_0: z.string().optional(),
  stages: z.array(RubricStageSchema).min(1),
}).strict().superRefine((theme, ctx) => {
  for (let i = 1; i < theme.stages.length; i++) {
    if (theme.stages[i].stage <= theme.stages[i - 1].stage) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Theme "${theme.id}": stages must be listed in strictly increasing order`,
        path: ['stages', i, 'stage'],
      });
    }
  }
});

export const RubricSchema = z.object({
  version: z.string().min(1),
  name: z.string().min(1),
  min_quotes: z.number().int().min(1).optional(),
  themes: z.array(RubricThemeSchema).min(1),
}).strict().superRefine((rubric, ctx) => {
  const seen = new Set<string>();
  rubric.themes.forEach((theme, index) => {
    if (seen.has(theme.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate theme id "${theme.id}"`,
        path: ['themes', index, 'id'],
      });
    }
    seen.add(theme.id);
  });
});

export type RawRubric = z.infer<typeof RubricSchema>;
export type RawRubricTheme = z.infer<typeof RubricThemeSchema>;
