/**
 * Zod schemas for the wizard's free-text stages, shared with the
 * post-creation edit forms.
 */
import { z } from 'zod';
import { ValidationError } from '../../types/index.js';
import { clampIoWeight } from './derive.js';

export const basicsSchema = z.object({
  name: z
    .string({ required_error: 'Server name is required' })
    .trim()
    .min(1, 'Server name is required')
    .max(191, 'Server name must be at most 191 characters'),
  description: z
    .string()
    .trim()
    .max(255, 'Description must be at most 255 characters')
    .default(''),
  externalId: z
    .string()
    .trim()
    .max(191, 'External ID must be at most 191 characters')
    .default(''),
});

const RESOURCE_MESSAGE = 'All resource fields must be whole numbers';

const wholeNumber = z
  .string({ required_error: RESOURCE_MESSAGE })
  .trim()
  .regex(/^-?\d+$/, RESOURCE_MESSAGE)
  .transform(Number);

/** memory / disk / cpu / swap / io as entered; io is clamped to 10..1000. */
export const resourcesSchema = z.object({
  memory: wholeNumber,
  disk: wholeNumber,
  cpu: wholeNumber,
  swap: wholeNumber,
  io: wholeNumber.transform(clampIoWeight),
});

export type BasicsValues = z.infer<typeof basicsSchema>;
export type ResourceValues = z.infer<typeof resourcesSchema>;

/** Parses form values, turning the first zod issue into a ValidationError. */
export function parseForm<T extends z.ZodTypeAny>(schema: T, values: Record<string, string>): z.infer<T> {
  const result = schema.safeParse(values);
  if (!result.success) {
    const issue = result.error.errors[0];
    const field = issue?.path[0];
    throw new ValidationError(
      issue?.message ?? 'Invalid input',
      typeof field === 'string' ? field : undefined,
    );
  }
  return result.data;
}
