import { describe, it, expect } from 'vitest';
import { isFqdn } from '../../parser/fqdn.js';
import { isMacAddress } from '../../parser/mac-address.js';

describe('isFqdn', () => {
  it.each([
    'example.com',
    'ntp1.pool.example.org',
    'a-b.example.',
    'A.COM.',
    'xn--bcher-kva.example',
    '1.2.3.4.com',
    'bmc',
    '123',
    '1host.example',
  ])(
    'accepts %s',
    name => {
      expect(isFqdn(name)).toBe(true);
    },
  );

  it.each(['', '.', '-bad.com', 'bad-.com', 'a..b', 'under_score.com', 'host.123', '1.2.3'])(
    'rejects "%s"',
    name => {
      expect(isFqdn(name)).toBe(false);
    },
  );

  it('limits label length to 63', () => {
    expect(isFqdn(`${'a'.repeat(63)}.com`)).toBe(true);
    expect(isFqdn(`${'a'.repeat(64)}.com`)).toBe(false);
  });

  it('limits total length to 255', () => {
    const label = 'a'.repeat(63);
    const name = [label, label, label, label].join('.');
    expect(name.length).toBe(255);
    expect(isFqdn(name)).toBe(true);
    expect(isFqdn(`${name}b`)).toBe(false);
  });
});

describe('isMacAddress', () => {
  it('accepts colon and dash notation', () => {
    expect(isMacAddress('01:23:45:67:89:ab')).toBe(true);
    expect(isMacAddress('01-23-45-67-89-AB')).toBe(true);
    expect(isMacAddress('1:2:3:4:5:6')).toBe(true);
  });

  it('rejects mixed separators', () => {
    expect(isMacAddress('01-23:45:67:89:ab')).toBe(false);
  });

  it('rejects wrong octet count or bad digits', () => {
    expect(isMacAddress('01:23:45:67:89')).toBe(false);
    expect(isMacAddress('01:23:45:67:89:ab:cd')).toBe(false);
    expect(isMacAddress('01:23:45:67:89:xz')).toBe(false);
    expect(isMacAddress('012:3:45:67:89:ab')).toBe(false);
  });
});
