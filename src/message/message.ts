/**
 * MailMessage - one message in a Gmail mailbox
 *
 * A message starts out knowing only its UID and mailbox. The first read of
 * any data field fetches and parses the whole message once; mutations issue
 * one protocol command each and then update the cached flags and labels.
 *
 * @packageDocumentation
 */

import { resolveConfig, type MessageConfigInput } from '../config.js';
import { getDefaultLogger, type Logger } from '../logger.js';
import { formatShortDate } from '../mime/date.js';
import { parseRawMessage } from './raw-parser.js';
import { MESSAGE_FETCH_ITEMS, SYSTEM_FLAGS, type LoadState, type MessageData } from '../types/message.js';
import type { MessageConfig } from '../types/config.js';
import type { MailboxHandle, MailSession, StoreAction } from '../types/session.js';

/**
 * Options for a MailMessage
 */
export interface MailMessageOptions {
  /** Account conventions (trash and archive mailboxes, log level) */
  config?: MessageConfigInput;
  /** Logger; defaults to the library's shared logger */
  logger?: Logger;
}

/**
 * MailMessage provides lazy access to a message's data and the
 * operations that change its flags, labels and location.
 *
 * @example
 * ```typescript
 * const message = new MailMessage({ name: 'INBOX', session }, 4211);
 * if (!(await message.isRead())) {
 *   console.log(await message.get('subject'));
 *   await message.read();
 * }
 * ```
 */
export class MailMessage {
  /** UID, unique within the mailbox */
  readonly uid: number;
  /** Mailbox the message was found in */
  readonly mailbox: MailboxHandle;
  private readonly config: MessageConfig;
  private readonly logger: Logger;
  private data: MessageData | undefined;
  private pending: Promise<MessageData> | undefined;

  constructor(mailbox: MailboxHandle, uid: number, options: MailMessageOptions = {}) {
    this.mailbox = mailbox;
    this.uid = uid;
    this.config = resolveConfig(options.config);
    this.logger = options.logger ?? getDefaultLogger();
  }

  private get session(): MailSession {
    return this.mailbox.session;
  }

  /**
   * Where the message's data is in its lifecycle
   */
  get state(): LoadState {
    if (this.pending) return 'fetching';
    return this.data ? 'loaded' : 'unloaded';
  }

  /**
   * Cached data without triggering a fetch; undefined until loaded
   */
  get snapshot(): MessageData | undefined {
    return this.data;
  }

  /**
   * Fetches and parses the message unless it is already loaded.
   * Concurrent callers share one fetch; a failed fetch leaves the
   * message unloaded and the next call tries again.
   *
   * @throws MailParseError if the message cannot be parsed
   */
  load(): Promise<MessageData> {
    if (this.data) return Promise.resolve(this.data);
    return this.pending ?? this.startFetch();
  }

  /**
   * Fetches the message again, replacing cached data once the new
   * data is parsed
   */
  refresh(): Promise<MessageData> {
    return this.pending ?? this.startFetch();
  }

  /**
   * Reads one data field, fetching the message first if needed
   */
  async get<K extends keyof MessageData>(field: K): Promise<MessageData[K]> {
    const data = await this.load();
    return data[field];
  }

  /**
   * Sender address: the part inside angle brackets when there is one,
   * otherwise the raw From value
   */
  async fromAddress(): Promise<string | undefined> {
    const fr = await this.get('fr');
    if (fr !== undefined && fr.includes('<') && fr.includes('>')) {
      const parts = fr.split('<');
      return parts[parts.length - 1].replace(/>/g, '');
    }
    return fr;
  }

  /** Time the message was sent, from its Date header */
  date(): Promise<Date> {
    return this.get('sentAt');
  }

  /**
   * Send date as M/D/YY (UTC)
   */
  async sentAtString(): Promise<string> {
    return formatShortDate(await this.get('sentAt'));
  }

  stringDate(): Promise<string> {
    return this.sentAtString();
  }

  async isRead(): Promise<boolean> {
    return (await this.get('flags')).has(SYSTEM_FLAGS.seen);
  }

  async isStarred(): Promise<boolean> {
    return (await this.get('flags')).has(SYSTEM_FLAGS.flagged);
  }

  async isDraft(): Promise<boolean> {
    return (await this.get('flags')).has(SYSTEM_FLAGS.draft);
  }

  async isDeleted(): Promise<boolean> {
    return (await this.get('flags')).has(SYSTEM_FLAGS.deleted);
  }

  async hasLabel(label: string): Promise<boolean> {
    return (await this.get('labels')).has(label);
  }

  /** Marks the message as seen */
  read(): Promise<void> {
    return this.storeFlag('add', SYSTEM_FLAGS.seen);
  }

  markAsRead(): Promise<void> {
    return this.read();
  }

  unread(): Promise<void> {
    return this.storeFlag('remove', SYSTEM_FLAGS.seen);
  }

  markAsUnread(): Promise<void> {
    return this.unread();
  }

  star(): Promise<void> {
    return this.storeFlag('add', SYSTEM_FLAGS.flagged);
  }

  unstar(): Promise<void> {
    return this.storeFlag('remove', SYSTEM_FLAGS.flagged);
  }

  /**
   * Adds a Gmail label. The command is sent even when the label is
   * already present locally.
   */
  addLabel(label: string): Promise<void> {
    return this.storeLabel('add', label);
  }

  removeLabel(label: string): Promise<void> {
    return this.storeLabel('remove', label);
  }

  /**
   * Flags the message \Deleted and, unless it already sits in a trash
   * mailbox, moves it to the account's trash
   */
  async delete(): Promise<void> {
    await this.storeFlag('add', SYSTEM_FLAGS.deleted);
    if (this.isTrash(this.mailbox.name)) return;
    await this.moveTo(await this.resolveTrashMailbox());
  }

  /**
   * Copies the message to `name` and, unless `name` is a trash mailbox,
   * deletes the original. The two steps are not atomic: a failure after
   * the copy leaves the message in both mailboxes.
   */
  async moveTo(name: string): Promise<void> {
    this.logger.debug('Copying message', { uid: this.uid, from: this.mailbox.name, to: name });
    await this.session.copy(this.uid, name, this.mailbox.name);
    if (!this.isTrash(name)) {
      await this.delete();
    }
  }

  archive(): Promise<void> {
    return this.moveTo(this.config.archiveMailbox);
  }

  toString(): string {
    return `<Message ${this.uid}>`;
  }

  private startFetch(): Promise<MessageData> {
    const pending = this.fetchAndParse().finally(() => {
      if (this.pending === pending) this.pending = undefined;
    });
    this.pending = pending;
    return pending;
  }

  private async fetchAndParse(): Promise<MessageData> {
    this.logger.debug('Fetching message', { uid: this.uid, mailbox: this.mailbox.name });
    try {
      const { headerBlock, rawBody } = await this.session.fetchByUid(this.uid, MESSAGE_FETCH_ITEMS);
      this.data = parseRawMessage(headerBlock, rawBody);
      return this.data;
    } catch (err) {
      this.logger.warn('Message fetch failed', {
        uid: this.uid,
        mailbox: this.mailbox.name,
        error: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }
  }

  /**
   * Cached data once any in-flight fetch has settled
   */
  private async settledData(): Promise<MessageData | undefined> {
    if (this.pending) {
      await Promise.allSettled([this.pending]);
    }
    return this.data;
  }

  private async storeFlag(action: StoreAction, flag: string): Promise<void> {
    this.logger.debug('Storing flag', { uid: this.uid, action, flag });
    await this.session.storeFlags(this.uid, action, flag);

    const data = await this.settledData();
    if (!data) return;
    if (action === 'add') {
      data.flags.add(flag);
    } else {
      data.flags.delete(flag);
    }
  }

  private async storeLabel(action: StoreAction, label: string): Promise<void> {
    this.logger.debug('Storing label', { uid: this.uid, action, label });
    await this.session.storeLabel(this.uid, action, label);

    const data = await this.settledData();
    if (!data) return;
    if (action === 'add') {
      data.labels.add(label);
    } else {
      data.labels.delete(label);
    }
  }

  private isTrash(name: string): boolean {
    return this.config.trashMailboxes.includes(name);
  }

  /**
   * First configured trash mailbox that exists on the account, else the
   * last configured one
   */
  private async resolveTrashMailbox(): Promise<string> {
    const existing = await this.session.listLabels();
    const candidates = this.config.trashMailboxes;
    return candidates.find(name => existing.has(name)) ?? candidates[candidates.length - 1];
  }
}
