import { z } from 'zod';

const BooleanLikeSchema = z
  .preprocess((value) => {
    if (typeof value === 'number') {
      if (value === 1) {
        return true;
      }
      if (value === 0) {
        return false;
      }
      return value;
    }
    if (typeof value === 'string') {
      const normalized = value.trim().toLowerCase();
      if (['1', 'true', 'yes', 'on'].includes(normalized)) {
        return true;
      }
      if (['0', 'false', 'no', 'off'].includes(normalized)) {
        return false;
      }
      return value;
    }
    return value;
  }, z.boolean())
  .optional();

const PositiveIntegerLikeSchema = z
  .preprocess((value) => {
    if (value === undefined || value === null || value === '') {
      return undefined;
    }
    if (typeof value === 'number') {
      return value;
    }
    const parsed = Number.parseInt(String(value), 10);
    return Number.isFinite(parsed) ? parsed : value;
  }, z.number().int().positive())
  .optional();

const TextSchema = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .optional();

export const ConfigFileSchema = z
  .object({
    secret: z
      .object({
        phone_number: TextSchema,
        pin: TextSchema,
        session_token: TextSchema,
      })
      .default({}),
    general: z
      .object({
        output_format: TextSchema,
        output_folder: TextSchema,
        extract_details: BooleanLikeSchema,
      })
      .default({}),
    network: z
      .object({
        receive_timeout_ms: PositiveIntegerLikeSchema,
        connect_attempts: PositiveIntegerLikeSchema,
        request_attempts: PositiveIntegerLikeSchema,
      })
      .default({}),
  })
  .passthrough();

export type ConfigFile = z.output<typeof ConfigFileSchema>;
export type ConfigFileInput = z.input<typeof ConfigFileSchema>;

export const EMPTY_CONFIG_FILE: ConfigFile = ConfigFileSchema.parse({});
