import { describe, expect, it } from 'vitest';
import { createOriginPolicy, normalizeOrigin } from '../config/cors.js';

describe('normalizeOrigin', () => {
  it('lowercases scheme and host and drops paths', () => {
    expect(normalizeOrigin(' HTTPS://Dashboard.Test:8443/app ')).toBe('https://dashboard.test:8443');
  });

  it('returns an empty string for blank input', () => {
    expect(normalizeOrigin('   ')).toBe('');
  });
});

describe('createOriginPolicy', () => {
  it('allows listed origins and requests without an origin', () => {
    const policy = createOriginPolicy('http://dashboard.test, https://ops.test', false);

    expect(policy.allowed).toEqual(['http://dashboard.test', 'https://ops.test']);
    expect(policy.isAllowed('HTTP://DASHBOARD.TEST')).toBe(true);
    expect(policy.isAllowed(undefined)).toBe(true);
    expect(policy.isAllowed('http://elsewhere.test')).toBe(false);
  });

  it('allows loopback origins only when asked to', () => {
    expect(createOriginPolicy('', true).isAllowed('http://localhost:3000')).toBe(true);
    expect(createOriginPolicy('', true).isAllowed('http://127.0.0.1:5173')).toBe(true);
    expect(createOriginPolicy('', false).isAllowed('http://localhost:3000')).toBe(false);
  });
});
