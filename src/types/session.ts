/**
 * Mail Session types for gmail-imap-message
 *
 * The session is the only way the message model talks to a server. It is
 * implemented by {@link CommandMailSession} or by any caller-provided adapter.
 */

/**
 * Direction of a STORE command
 */
export type StoreAction = 'add' | 'remove';

/**
 * One message as returned by a UID FETCH
 */
export interface RawFetchResult {
  /** FETCH response line holding FLAGS, X-GM-* attributes and UID */
  headerBlock: string;
  /** Full RFC 822 message bytes (BODY[] literal) */
  rawBody: Buffer;
}

/**
 * Authenticated protocol operations against one mail account
 */
export interface MailSession {
  /** Retrieves flags, Gmail attributes and the full body of one message */
  fetchByUid(uid: number, items: string): Promise<RawFetchResult>;
  /** Adds or removes one flag on one message */
  storeFlags(uid: number, action: StoreAction, flag: string): Promise<void>;
  /** Adds or removes one Gmail label on one message */
  storeLabel(uid: number, action: StoreAction, label: string): Promise<void>;
  /** Copies a message from `sourceMailbox` to `targetMailbox` */
  copy(uid: number, targetMailbox: string, sourceMailbox: string): Promise<void>;
  /** Names of every mailbox (Gmail label) on the account */
  listLabels(): Promise<Set<string>>;
}

/**
 * Non-owning handle to the mailbox a message was found in
 */
export interface MailboxHandle {
  /** Mailbox name, e.g. "INBOX" or "[Gmail]/Trash" */
  readonly name: string;
  /** Session of the account that owns the mailbox */
  readonly session: MailSession;
}
