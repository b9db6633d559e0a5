import { deserializeAccount } from '@/validators/account.validator';
import { ValidationError } from '@/errors';

/**
 * Run deserializeAccount and return the ValidationError it throws
 */
function captureValidationError(data: unknown): ValidationError {
  try {
    deserializeAccount(data);
  } catch (error) {
    if (error instanceof ValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected deserializeAccount to throw');
}

describe('deserializeAccount', () => {
  it('should map a complete payload to an AccountInput', () => {
    const input = deserializeAccount({
      name: 'Jane Doe',
      email: 'jane@example.com',
      address: '12 Main Street',
      phone_number: '555-0100',
      date_joined: '2024-03-01',
    });

    expect(input).toEqual({
      name: 'Jane Doe',
      email: 'jane@example.com',
      address: '12 Main Street',
      phoneNumber: '555-0100',
      dateJoined: '2024-03-01',
    });
  });

  it('should default missing optional fields to null and leave dateJoined unset', () => {
    const input = deserializeAccount({ name: 'Jane Doe', email: 'jane@example.com' });

    expect(input).toEqual({
      name: 'Jane Doe',
      email: 'jane@example.com',
      address: null,
      phoneNumber: null,
    });
    expect(input).not.toHaveProperty('dateJoined');
  });

  it('should accept explicit nulls for optional fields', () => {
    const input = deserializeAccount({
      name: 'Jane Doe',
      email: 'jane@example.com',
      address: null,
      phone_number: null,
      date_joined: null,
    });

    expect(input.address).toBeNull();
    expect(input.phoneNumber).toBeNull();
    expect(input).not.toHaveProperty('dateJoined');
  });

  it('should ignore unknown keys such as id', () => {
    const input = deserializeAccount({ id: 42, name: 'Jane Doe', email: 'jane@example.com' });

    expect(input).not.toHaveProperty('id');
  });

  it('should reject a payload missing email', () => {
    const error = captureValidationError({ name: 'not enough data' });

    expect(error.statusCode).toBe(400);
    expect(error.message).toBe('Invalid Account: missing email');
    expect(error.errors).toEqual({
      formErrors: [],
      fieldErrors: { email: ['missing email'] },
    });
  });

  it('should list every missing required field', () => {
    const error = captureValidationError({});

    expect(error.message).toBe('Invalid Account: missing name, missing email');
  });

  it.each([[null], [undefined], [[]], ['name=Jane']])('should reject a non-object body (%p)', (body) => {
    const error = captureValidationError(body);

    expect(error.message).toBe('Invalid Account: body must be a JSON object');
  });

  it('should reject fields of the wrong type', () => {
    const error = captureValidationError({ name: 123, email: 'jane@example.com' });

    expect(error.message).toBe('Invalid Account: name must be a string');
  });

  it('should reject a malformed date_joined', () => {
    const error = captureValidationError({
      name: 'Jane Doe',
      email: 'jane@example.com',
      date_joined: 'yesterday',
    });

    expect(error.message).toBe('Invalid Account: date_joined must be an ISO date (YYYY-MM-DD)');
  });

  it('should reject values longer than their column', () => {
    const error = captureValidationError({ name: 'a'.repeat(65), email: 'jane@example.com' });

    expect(error.message).toBe('Invalid Account: name must be at most 64 characters');
  });
});
