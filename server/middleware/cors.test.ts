import { afterEach, describe, expect, it } from 'vitest';
import { isOriginAllowed } from './cors.js';

describe('isOriginAllowed', () => {
  const original = process.env.FRONTEND_URL;

  afterEach(() => {
    if (original === undefined) {
      delete process.env.FRONTEND_URL;
    } else {
      process.env.FRONTEND_URL = original;
    }
  });

  it('allows missing origins and any localhost port', () => {
    expect(isOriginAllowed(undefined)).toBe(true);
    expect(isOriginAllowed('http://localhost:4200')).toBe(true);
  });

  it('allows the configured frontend and blocks other hosts', () => {
    process.env.FRONTEND_URL = 'https://ledger.example.org';

    expect(isOriginAllowed('https://ledger.example.org')).toBe(true);
    expect(isOriginAllowed('https://evil.example.com')).toBe(false);
    expect(isOriginAllowed('http://localhost.evil.com')).toBe(false);
  });
});
