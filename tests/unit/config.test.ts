import { describe, it, expect } from 'vitest';
import {
  DEFAULT_ARCHIVE_MAILBOX,
  loadConfigFromEnv,
  resolveConfig,
} from '../../src/config.js';
import { MailConfigError, MailError, MailParseError, MailProtocolError } from '../../src/types/errors.js';

describe('Configuration', () => {

  it('should apply defaults', () => {
    expect(resolveConfig()).toEqual({
      trashMailboxes: ['[Gmail]/Trash', '[Gmail]/Bin'],
      archiveMailbox: '[Gmail]/All Mail',
      logLevel: 'warn',
    });
  });

  it('should keep given values', () => {
    const config = resolveConfig({ archiveMailbox: 'Archive', trashMailboxes: ['Deleted Items'] });
    expect(config.archiveMailbox).toBe('Archive');
    expect(config.trashMailboxes).toEqual(['Deleted Items']);
  });

  it('should reject an empty trash list', () => {
    let caught: unknown;
    try {
      resolveConfig({ trashMailboxes: [] });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(MailConfigError);
    expect(caught).toMatchObject({ code: 'CONFIG_ERROR', source: 'config' });
    if (caught instanceof MailConfigError) {
      expect(caught.issues).toHaveLength(1);
      expect(caught.issues[0]).toMatch(/^trashMailboxes: /);
    }
  });

  describe('loadConfigFromEnv', () => {
    it('should read comma separated trash mailboxes and a log level', () => {
      const config = loadConfigFromEnv({
        GMAIL_TRASH_MAILBOXES: 'Trash, Deleted Items,',
        GMAIL_LOG_LEVEL: 'DEBUG',
      });
      expect(config.trashMailboxes).toEqual(['Trash', 'Deleted Items']);
      expect(config.logLevel).toBe('debug');
      expect(config.archiveMailbox).toBe(DEFAULT_ARCHIVE_MAILBOX);
    });

    it('should reject unknown log levels', () => {
      expect(() => loadConfigFromEnv({ GMAIL_LOG_LEVEL: 'verbose' })).toThrow(MailConfigError);
    });
  });
});

describe('Error types', () => {

  it('should carry code and source', () => {
    const parse = new MailParseError('bad date', 'Date: nope');
    expect(parse).toBeInstanceOf(MailError);
    expect(parse).toBeInstanceOf(Error);
    expect(parse.name).toBe('MailParseError');
    expect(parse.code).toBe('PARSE_ERROR');
    expect(parse.source).toBe('parse');
    expect(parse.rawData).toBe('Date: nope');

    const protocol = new MailProtocolError('UID COPY failed: no', 'NO no', 'UID COPY 1 Work');
    expect(protocol.code).toBe('PROTOCOL_ERROR');
    expect(protocol.command).toBe('UID COPY 1 Work');

    const generic = new MailError('disk full', 'WRITE_FAILED', 'io');
    expect(generic.name).toBe('MailError');
    expect(generic.source).toBe('io');
  });
});
