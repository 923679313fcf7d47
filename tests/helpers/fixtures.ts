/**
 * Shared raw messages and an in-process Mail Session stand-in
 */

import { vi } from 'vitest';
import { createMailLogger } from '../../src/logger.js';
import type { MailSession, RawFetchResult, StoreAction } from '../../src/types/session.js';

export const crlf = (lines: string[]): string => lines.join('\r\n');

/** Logger that drops everything */
export const silentLogger = createMailLogger('error', true);

export const FETCH_LINE =
  '* 1 FETCH (X-GM-THRID 1790000000000000001 X-GM-MSGID 1790000000000000002 ' +
  'X-GM-LABELS ("Work" "Important") UID 42 FLAGS (\\Seen) BODY[] {300}';

export const PLAIN_MESSAGE = crlf([
  'From: Alice Example <alice@example.com>',
  'To: bob@example.com',
  'Cc: carol@example.com',
  'Delivered-To: bob@example.com',
  'Subject: =?UTF-8?B?SGVsbG8gV29ybGQ=?=',
  'Date: Tue, 01 Jul 2025 10:15:00 +0200',
  'Content-Type: text/plain; charset=utf-8',
  '',
  'Hi Bob,',
  'See you soon.',
]);

/** Payload of the PDF attachment in MULTIPART_MESSAGE, 1.2 kB */
export const PDF_PAYLOAD = Buffer.alloc(1200, 'PDF-DATA');

export const MULTIPART_MESSAGE = crlf([
  'From: carol@example.com',
  'To: bob@example.com',
  'Subject: Report',
  'Date: Wed, 2 Jul 2025 09:00:00 -0500',
  'MIME-Version: 1.0',
  'Content-Type: multipart/mixed; boundary="outer"',
  '',
  'This is a multi-part message.',
  '--outer',
  'Content-Type: multipart/alternative; boundary="inner"',
  '',
  '--inner',
  'Content-Type: text/plain; charset=utf-8',
  '',
  'First plain',
  '--inner',
  'Content-Type: text/html; charset=utf-8',
  '',
  '<p>First html</p>',
  '--inner--',
  '--outer',
  'Content-Type: text/plain; charset=utf-8',
  'Content-Transfer-Encoding: quoted-printable',
  '',
  'Second plain caf=C3=A9',
  '--outer',
  'Content-Type: application/pdf; name="report.pdf"',
  'Content-Transfer-Encoding: base64',
  'Content-Disposition: attachment; filename="report.pdf"',
  '',
  PDF_PAYLOAD.toString('base64'),
  '--outer',
  'Content-Type: application/octet-stream',
  'Content-Transfer-Encoding: base64',
  'Content-Disposition: attachment; filename="tiny.bin"',
  '',
  Buffer.alloc(100, 'x').toString('base64'),
  '--outer',
  'Content-Type: application/octet-stream',
  'Content-Transfer-Encoding: base64',
  'Content-Disposition: attachment; filename="empty.bin"',
  '',
  '',
  '--outer',
  'Content-Type: image/png',
  'Content-Disposition: inline; filename="logo.png"',
  'Content-Transfer-Encoding: base64',
  '',
  'iVBORw==',
  '--outer--',
  '',
]);

export interface FakeSessionOptions {
  headerBlock?: string;
  rawBody?: string;
  /** Mailbox names returned by listLabels() */
  labels?: string[];
}

/**
 * Mail Session whose every operation is a vi.fn spy
 */
export function createFakeSession(options: FakeSessionOptions = {}) {
  const result: RawFetchResult = {
    headerBlock: options.headerBlock ?? FETCH_LINE,
    rawBody: Buffer.from(options.rawBody ?? PLAIN_MESSAGE, 'utf-8'),
  };
  const labels = options.labels ?? ['INBOX', '[Gmail]/All Mail', '[Gmail]/Trash'];

  return {
    fetchByUid: vi.fn(async (_uid: number, _items: string): Promise<RawFetchResult> => result),
    storeFlags: vi.fn(async (_uid: number, _action: StoreAction, _flag: string): Promise<void> => undefined),
    storeLabel: vi.fn(async (_uid: number, _action: StoreAction, _label: string): Promise<void> => undefined),
    copy: vi.fn(async (_uid: number, _target: string, _source: string): Promise<void> => undefined),
    listLabels: vi.fn(async (): Promise<Set<string>> => new Set(labels)),
  } satisfies MailSession;
}
