import { z } from 'zod';

export const TransactionItem = z.record(z.string(), z.unknown());

export type TransactionItem = z.infer<typeof TransactionItem>;

const optionalCursor: z.ZodType<string | undefined, z.ZodTypeDef, unknown> = z
  .unknown()
  .transform((value: unknown) => {
    if (typeof value !== 'string') {
      return undefined;
    }
    return value.trim().length > 0 ? value : undefined;
  });

export const TimelinePage = z
  .object({
    items: z.array(z.unknown()).optional(),
    cursors: z
      .object({
        after: optionalCursor,
        before: optionalCursor,
      })
      .passthrough()
      .optional()
      .catch(undefined),
  })
  .passthrough();

export type TimelinePage = z.infer<typeof TimelinePage>;

const optionalText: z.ZodType<string | undefined, z.ZodTypeDef, unknown> = z
  .unknown()
  .transform((value: unknown) => {
    if (typeof value === 'number' && Number.isFinite(value)) {
      return String(value);
    }
    if (typeof value !== 'string') {
      return undefined;
    }
    return value.length > 0 ? value : undefined;
  });

export const DetailEntry = z
  .object({
    title: optionalText,
    detail: z.object({ text: optionalText }).passthrough().optional().catch(undefined),
  })
  .passthrough();

export const DetailSection = z
  .object({
    title: optionalText,
    data: z.array(z.unknown()).optional().catch(undefined),
  })
  .passthrough();

export const TransactionDetail = z
  .object({
    sections: z.array(z.unknown()).optional().catch(undefined),
  })
  .passthrough();

export type DetailEntry = z.infer<typeof DetailEntry>;
export type DetailSection = z.infer<typeof DetailSection>;
