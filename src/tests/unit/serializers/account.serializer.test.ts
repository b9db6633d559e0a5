import { serializeAccount } from '@/serializers/account.serializer';
import { buildAccount } from '@/tests/factories/accountFactory';

describe('serializeAccount', () => {
  it('should produce the snake_case wire shape', () => {
    const account = buildAccount({
      id: 9,
      name: 'Jane Doe',
      email: 'jane@example.com',
      address: '12 Main Street',
      phoneNumber: '555-0100',
      dateJoined: '2024-03-01',
    });

    expect(serializeAccount(account)).toEqual({
      id: 9,
      name: 'Jane Doe',
      email: 'jane@example.com',
      address: '12 Main Street',
      phone_number: '555-0100',
      date_joined: '2024-03-01',
    });
  });

  it('should keep null optional fields as null', () => {
    const serialized = serializeAccount(buildAccount({ address: null, phoneNumber: null }));

    expect(serialized.address).toBeNull();
    expect(serialized.phone_number).toBeNull();
  });
});
