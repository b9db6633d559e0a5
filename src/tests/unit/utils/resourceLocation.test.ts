import { resourceLocation } from '@/utils/resourceLocation';

describe('resourceLocation', () => {
  it('should build an absolute URL from protocol and host', () => {
    expect(resourceLocation('http', 'localhost:3000', '/accounts/7')).toBe('http://localhost:3000/accounts/7');
  });

  it('should fall back to the path when there is no host', () => {
    expect(resourceLocation('http', undefined, '/accounts/7')).toBe('/accounts/7');
  });

  it('should fall back to the path when the host is empty', () => {
    expect(resourceLocation('https', '', '/accounts/7')).toBe('/accounts/7');
  });
});
