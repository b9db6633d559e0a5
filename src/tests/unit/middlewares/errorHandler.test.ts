import { sanitizeRequestBody, sanitizeErrorMessage } from '@/middlewares/errorHandler';

describe('errorHandler helpers', () => {
  describe('sanitizeRequestBody', () => {
    it('should redact personal fields and keep the rest', () => {
      const sanitized = sanitizeRequestBody({
        name: 'Jane Doe',
        email: 'jane@example.com',
        address: '12 Main Street',
        phone_number: '555-0100',
        date_joined: '2024-03-01',
      });

      expect(sanitized).toEqual({
        name: 'Jane Doe',
        email: '[REDACTED]',
        address: '[REDACTED]',
        phone_number: '[REDACTED]',
        date_joined: '2024-03-01',
      });
    });

    it('should redact nested objects and arrays', () => {
      const sanitized = sanitizeRequestBody({ contacts: [{ email: 'a@example.com', name: 'A' }] });

      expect(sanitized).toEqual({ contacts: [{ email: '[REDACTED]', name: 'A' }] });
    });

    it('should pass primitives and empty bodies through', () => {
      expect(sanitizeRequestBody(undefined)).toBeUndefined();
      expect(sanitizeRequestBody('raw text')).toBe('raw text');
    });
  });

  describe('sanitizeErrorMessage', () => {
    it('should return messages unchanged outside production', () => {
      expect(sanitizeErrorMessage('relation "accounts" does not exist')).toBe(
        'relation "accounts" does not exist'
      );
    });
  });
});
