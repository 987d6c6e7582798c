import { z } from 'zod';

export const idParamsSchema = z.object({ id: z.string().trim().min(1) });

export const trimmedText = (max: number) => z.string().trim().min(1).max(max);

export const emailSchema = z.string().trim().toLowerCase().email();

export const phoneSchema = z
  .string()
  .trim()
  .regex(/^\+?[0-9]{10,15}$/, 'Invalid phone number');

/** Treats `?status=` like an absent parameter. */
export const optionalQueryParam = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === '' ? undefined : value), schema.optional());
