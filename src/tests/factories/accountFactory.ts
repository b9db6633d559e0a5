import { Account } from '@/models';

/**
 * Account request body with every field filled in
 */
export interface AccountPayloadFixture {
  name: string;
  email: string;
  address: string | null;
  phone_number: string | null;
  date_joined: string;
}

let sequence = 0;

/**
 * Distinct, valid account payloads: each call bumps a sequence number
 */
export function buildAccountPayload(
  overrides: Partial<AccountPayloadFixture> = {}
): AccountPayloadFixture {
  sequence += 1;
  return {
    name: `Test User ${sequence}`,
    email: `user${sequence}@example.com`,
    address: `${sequence} Test Street`,
    phone_number: `555-${String(sequence).padStart(4, '0')}`,
    date_joined: '2024-01-15',
    ...overrides,
  };
}

export function buildAccount(overrides: Partial<Account> = {}): Account {
  return {
    id: 1,
    name: 'Test User',
    email: 'test@example.com',
    address: '1 Test Street',
    phoneNumber: '555-0001',
    dateJoined: '2024-01-15',
    ...overrides,
  };
}
