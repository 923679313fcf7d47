import { describe, it, expect } from 'vitest';
import { MimeEntity } from '../../src/mime/mime-entity.js';

describe('MimeEntity', () => {

  it('should generate a boundary for multipart types', () => {
    const entity = new MimeEntity('multipart/mixed');
    expect(entity.boundary).toMatch(/^={15}[0-9a-f]{24}==$/);
    expect(entity.getHeader('content-type')).toBe(`multipart/mixed; boundary="${entity.boundary}"`);
  });

  it('should serialize children between boundary lines', () => {
    const entity = new MimeEntity('multipart/mixed', { boundary: 'b' });
    entity.attach(MimeEntity.text('one'));

    expect(entity.toString()).toBe([
      'Content-Type: multipart/mixed; boundary="b"',
      'MIME-Version: 1.0',
      '',
      '--b',
      'Content-Type: text/plain; charset="utf-8"',
      'MIME-Version: 1.0',
      'Content-Transfer-Encoding: 7bit',
      '',
      'one',
      '--b--',
      '',
    ].join('\r\n'));
  });

  it('should base64 encode text with overlong lines', () => {
    expect(MimeEntity.text('a'.repeat(1000)).getHeader('Content-Transfer-Encoding')).toBe('base64');
  });

  it('should write RFC 2231 filenames for non-ASCII names', () => {
    const part = MimeEntity.attachment(Buffer.from('x'), 'application/pdf', 'résumé.pdf');
    expect(part.getHeader('Content-Disposition')).toBe("attachment; filename*=utf-8''r%C3%A9sum%C3%A9.pdf");
  });

  it('should keep repeated headers in order', () => {
    const entity = MimeEntity.text('x').addHeader('Received', 'one').addHeader('Received', 'two');
    expect(entity.headers.filter(h => h.name === 'Received').map(h => h.value)).toEqual(['one', 'two']);
    expect(entity.getHeader('received')).toBe('one');
  });

  it('should reject line breaks in generated headers', () => {
    expect(() => MimeEntity.attachment(Buffer.from('x'), 'text/plain', 'a\r\nb.txt')).toThrow(TypeError);
  });

  it('should refuse content on multipart and parts on leaves', () => {
    expect(() => new MimeEntity('multipart/mixed').setContent('x')).toThrow(TypeError);
    expect(() => MimeEntity.text('x').attach(MimeEntity.text('y'))).toThrow('Cannot attach parts to text/plain');
  });
});
