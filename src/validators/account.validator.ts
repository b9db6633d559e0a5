import { z } from 'zod';
import { AccountInput } from '@/models';
import { ValidationError } from '@/errors';

/**
 * Column limits from db/schema.sql
 */
const ACCOUNT_FIELD_LIMITS = {
  NAME: 64,
  EMAIL: 64,
  ADDRESS: 256,
  PHONE_NUMBER: 32,
} as const;

/**
 * Account payload schema (wire format, snake_case)
 *
 * - name and email are required strings
 * - address and phone_number may be omitted or null
 * - date_joined may be omitted; when present it must be YYYY-MM-DD
 * - unknown keys (id included) are stripped
 */
const accountSchema = z
  .object(
    {
      name: z
        .string({ required_error: 'missing name', invalid_type_error: 'name must be a string' })
        .max(ACCOUNT_FIELD_LIMITS.NAME, `name must be at most ${ACCOUNT_FIELD_LIMITS.NAME} characters`),
      email: z
        .string({ required_error: 'missing email', invalid_type_error: 'email must be a string' })
        .max(ACCOUNT_FIELD_LIMITS.EMAIL, `email must be at most ${ACCOUNT_FIELD_LIMITS.EMAIL} characters`),
      address: z
        .string({ invalid_type_error: 'address must be a string' })
        .max(ACCOUNT_FIELD_LIMITS.ADDRESS, `address must be at most ${ACCOUNT_FIELD_LIMITS.ADDRESS} characters`)
        .nullish(),
      phone_number: z
        .string({ invalid_type_error: 'phone_number must be a string' })
        .max(
          ACCOUNT_FIELD_LIMITS.PHONE_NUMBER,
          `phone_number must be at most ${ACCOUNT_FIELD_LIMITS.PHONE_NUMBER} characters`
        )
        .nullish(),
      date_joined: z
        .string({ invalid_type_error: 'date_joined must be a string' })
        .date('date_joined must be an ISO date (YYYY-MM-DD)')
        .nullish(),
    },
    {
      required_error: 'body must be a JSON object',
      invalid_type_error: 'body must be a JSON object',
    }
  )
  .transform(
    (data): AccountInput => ({
      name: data.name,
      email: data.email,
      address: data.address ?? null,
      phoneNumber: data.phone_number ?? null,
      ...(data.date_joined ? { dateJoined: data.date_joined } : {}),
    })
  );

/**
 * Build an AccountInput from an inbound JSON body
 * @throws ValidationError listing every problem found, with zod's flattened issues as details
 */
export function deserializeAccount(data: unknown): AccountInput {
  const result = accountSchema.safeParse(data);

  if (!result.success) {
    const problems = result.error.issues.map((issue) => issue.message).join(', ');
    throw new ValidationError(`Invalid Account: ${problems}`, result.error.flatten());
  }

  return result.data;
}
