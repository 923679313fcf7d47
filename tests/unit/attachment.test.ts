import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Attachment } from '../../src/message/attachment.js';
import { MailError } from '../../src/types/errors.js';

describe('Attachment', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'attachment-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('size', () => {
    it('should round the payload length to whole kilobytes', () => {
      expect(new Attachment('a.bin', Buffer.alloc(1499)).size).toBe(1);
      expect(new Attachment('a.bin', Buffer.alloc(1501)).size).toBe(2);
      expect(new Attachment('a.bin', Buffer.alloc(400)).size).toBe(0);
    });

    it('should round exact halves to the even kilobyte', () => {
      expect(new Attachment('a.bin', Buffer.alloc(500)).size).toBe(0);
      expect(new Attachment('a.bin', Buffer.alloc(1500)).size).toBe(2);
      expect(new Attachment('a.bin', Buffer.alloc(2500)).size).toBe(2);
      expect(new Attachment('a.bin', Buffer.alloc(3500)).size).toBe(4);
    });

    it('should count an attachment under half a kilobyte as empty', () => {
      const attachment = new Attachment('a.bin', Buffer.alloc(499));
      expect(attachment.size).toBe(0);
      expect(attachment.isEmpty).toBe(true);
      expect(new Attachment('a.bin', Buffer.alloc(501)).isEmpty).toBe(false);
    });

    it('should treat a missing payload as empty', () => {
      const attachment = new Attachment('a.bin', undefined);
      expect(attachment.payload.length).toBe(0);
      expect(attachment.isEmpty).toBe(true);
    });
  });

  it('should keep its own copy of the payload', () => {
    const source = Buffer.from('abc');
    const attachment = new Attachment('a.txt', source);
    source[0] = 0x7a;
    expect(attachment.payload.toString()).toBe('abc');
  });

  it('should not be changed through the returned payload', () => {
    const attachment = new Attachment('a.txt', Buffer.from('abc'));
    const payload = attachment.payload;
    payload[0] = 0x7a;
    payload.fill(0x21, 1);
    expect(attachment.payload.toString()).toBe('abc');
  });

  describe('save', () => {
    it('should write into a directory under its own name', async () => {
      const attachment = new Attachment('notes.txt', Buffer.from('hello'));

      const written = await attachment.save(dir);

      expect(written).toBe(join(dir, 'notes.txt'));
      expect(await readFile(written, 'utf-8')).toBe('hello');
    });

    it('should write to an explicit file path, replacing what is there', async () => {
      const target = join(dir, 'copy.bin');
      await writeFile(target, 'old contents');
      const attachment = new Attachment('notes.txt', Buffer.from([1, 2, 3]));

      await attachment.save(target);

      expect(await readFile(target)).toEqual(Buffer.from([1, 2, 3]));
    });

    it('should drop directory parts from the attachment name', async () => {
      const attachment = new Attachment('../../escape.txt', Buffer.from('x'));

      const written = await attachment.save(dir);

      expect(written).toBe(join(dir, 'escape.txt'));
    });

    it('should refuse to save into a directory without a name', async () => {
      const attachment = new Attachment(undefined, Buffer.from('x'));

      const error = await attachment.save(dir).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(MailError);
      expect(error).toMatchObject({ code: 'NO_ATTACHMENT_NAME', source: 'io' });
    });
  });

  it('should describe itself by name', () => {
    expect(new Attachment('report.pdf', Buffer.from('x')).toString()).toBe('<Attachment report.pdf>');
  });
});
