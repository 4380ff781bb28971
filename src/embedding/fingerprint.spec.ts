import {
  digestContent,
  FINGERPRINT_WINDOW_BYTES,
  fingerprintContent,
  fingerprintQuery,
  normalizeQueryText,
} from './fingerprint';

describe('fingerprintContent', () => {
  it('depends only on the bytes', () => {
    const a = fingerprintContent(Buffer.from('segment bytes'));
    const b = fingerprintContent(Buffer.from('segment bytes'));

    expect(a).toBe(b);
    expect(a).toMatch(/^seg_[0-9a-f]{64}$/);
    expect(fingerprintContent(Buffer.from('segment bytez'))).not.toBe(a);
  });

  it('samples head, middle and tail of large content', () => {
    const length = FINGERPRINT_WINDOW_BYTES * 4;
    const original = Buffer.alloc(length, 7);

    // between the head window and the middle window
    const outsideWindows = Buffer.from(original);
    outsideWindows[FINGERPRINT_WINDOW_BYTES + 100] = 8;

    // inside the middle window, which starts at 1.5 windows
    const insideMiddle = Buffer.from(original);
    insideMiddle[FINGERPRINT_WINDOW_BYTES * 2] = 8;

    expect(fingerprintContent(outsideWindows)).toBe(fingerprintContent(original));
    expect(fingerprintContent(insideMiddle)).not.toBe(fingerprintContent(original));
    expect(digestContent(outsideWindows)).not.toBe(digestContent(original));
  });

  it('includes the length', () => {
    const length = FINGERPRINT_WINDOW_BYTES * 4;
    expect(fingerprintContent(Buffer.alloc(length, 1))).not.toBe(
      fingerprintContent(Buffer.alloc(length + 1, 1)),
    );
  });
});

describe('normalizeQueryText', () => {
  it('folds case, width and whitespace', () => {
    expect(normalizeQueryText('  Person   in\tRED\njacket ')).toBe(
      'person in red jacket',
    );
    expect(normalizeQueryText('ｐｅｒｓｏｎ')).toBe('person');
  });

  it('gives equivalent queries the same fingerprint', () => {
    expect(fingerprintQuery(normalizeQueryText('Red  Jacket'))).toBe(
      fingerprintQuery(normalizeQueryText('red jacket')),
    );
    expect(fingerprintQuery('red jacket')).toMatch(/^qry_[0-9a-f]{64}$/);
  });
});
