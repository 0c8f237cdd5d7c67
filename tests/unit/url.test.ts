import { canonicalizeUrl, keyFingerprint } from '../../src/utils/url';

describe('canonicalizeUrl', () => {
  it('should drop fragments, tracking parameters and trailing slashes', () => {
    expect(canonicalizeUrl('https://example.com/jobs/42/?utm_source=feed&ref=home&b=2&a=1#apply')).toBe(
      'https://example.com/jobs/42?a=1&b=2'
    );
  });

  it('should resolve relative links against a base', () => {
    expect(canonicalizeUrl('/jobs/7/', 'https://www.python.org/jobs/')).toBe('https://www.python.org/jobs/7');
  });

  it('should drop default ports but keep the root path', () => {
    expect(canonicalizeUrl('http://example.com:80/')).toBe('http://example.com/');
    expect(canonicalizeUrl('https://example.com:8443/x')).toBe('https://example.com:8443/x');
  });

  it.each(['', '#top', 'javascript:void(0)', 'mailto:jobs@example.com', 'ftp://example.com/file', '/relative'])(
    'should return null for %p without a usable base',
    (href) => {
      expect(canonicalizeUrl(href)).toBeNull();
    }
  );
});

describe('keyFingerprint', () => {
  it('should collapse URL keys that differ only in noise and host case', () => {
    expect(keyFingerprint('HTTPS://Example.COM/jobs/1/?utm_medium=x')).toBe('https://example.com/jobs/1');
  });

  it('should keep the case of URL paths and query values', () => {
    expect(keyFingerprint('https://example.com/Jobs/1')).toBe('https://example.com/Jobs/1');
    expect(keyFingerprint('https://example.com/view?id=AbC')).not.toBe(keyFingerprint('https://example.com/view?id=aBc'));
  });

  it('should normalise whitespace and case of non-URL keys', () => {
    expect(keyFingerprint('  chat:Upwork:Jane   Doe:2024-05-01 ')).toBe('chat:upwork:jane doe:2024-05-01');
  });
});
