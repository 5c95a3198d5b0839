import { z } from 'zod';

export const IdParamsSchema = z.object({
  id: z.coerce.number().int('ID must be an integer').positive('ID must be positive'),
});

export const nullableText = (max: number) => z.string().trim().max(max).nullable().optional();

export const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be formatted as YYYY-MM-DD');

export const nonEmptyPatch = <T extends z.ZodRawShape>(shape: T) =>
  z
    .object(shape)
    .partial()
    .refine((data) => Object.values(data).some((value) => value !== undefined), {
      message: 'At least one field must be provided',
    });
