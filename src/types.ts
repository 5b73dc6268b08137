import z from 'zod';

export type QuizScalar = string | number | bigint | boolean | Date;
export type QuizValue = QuizScalar | QuizValue[] | QuizTable;
export type QuizTable = { [key: string]: QuizValue };

export type QuizDefinition = {
  name: string;
  path: string;
  content: QuizTable;
};

export const quizConfigSchema = z.object({
  logEndpoint: z.string().optional(),
  fullscreen: z.boolean().optional(),
});

export type QuizConfig = z.infer<typeof quizConfigSchema>;

export const failurePolicySchema = z.enum(['abort', 'skip']);

export type FailurePolicy = z.infer<typeof failurePolicySchema>;

export type Chapter = {
  name: string;
  content: string;
  path: string | null;
  sub_items: BookItem[];
  [field: string]: unknown;
};

export type BookItem = { Chapter: Chapter } | { PartTitle: string } | 'Separator';

export type Book = {
  sections?: BookItem[];
  items?: BookItem[];
  [field: string]: unknown;
};

const chapterSchema: z.ZodType<Chapter, z.ZodTypeDef, unknown> = z.lazy(() =>
  z
    .object({
      name: z.string(),
      content: z.string(),
      // NOTE: Draft chapters have no source file
      path: z.string().nullable().default(null),
      sub_items: z.array(bookItemSchema).default([]),
    })
    .passthrough(),
);

const bookItemSchema: z.ZodType<BookItem, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    z.object({ Chapter: chapterSchema }),
    z.object({ PartTitle: z.string() }),
    z.literal('Separator'),
  ]),
);

export const bookSchema: z.ZodType<Book, z.ZodTypeDef, unknown> = z
  .object({
    sections: z.array(bookItemSchema).optional(),
    items: z.array(bookItemSchema).optional(),
  })
  .passthrough();

export const preprocessorContextSchema = z
  .object({
    root: z.string(),
    config: z
      .object({
        book: z.object({ src: z.string().default('src') }).passthrough().default({}),
        preprocessor: z.record(z.string(), z.record(z.string(), z.unknown())).optional(),
      })
      .passthrough(),
    renderer: z.string(),
    mdbook_version: z.string(),
  })
  .passthrough();

export type PreprocessorContext = z.infer<typeof preprocessorContextSchema>;

export const preprocessorInputSchema = z.tuple([preprocessorContextSchema, bookSchema]);
