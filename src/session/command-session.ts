/**
 * CommandMailSession - Mail Session over raw IMAP commands
 *
 * Builds UID-addressed commands and interprets their responses. Sending
 * the commands (tagging, sockets, TLS, authentication) is left to an
 * injected {@link CommandExecutor}.
 *
 * @packageDocumentation
 */

import { CommandBuilder } from '../commands/builder.js';
import { getDefaultLogger, type Logger } from '../logger.js';
import { parseUid } from '../protocol/fetch-attributes.js';
import { parseListResponse } from '../protocol/list-parser.js';
import { MailProtocolError } from '../types/errors.js';
import type { MailSession, RawFetchResult, StoreAction } from '../types/session.js';

/**
 * Untagged response received while a command ran
 */
export interface UntaggedResponse {
  /** Response type (e.g., 'FETCH', 'LIST', 'EXISTS') */
  type: string;
  /** Raw response line, without any literal payload */
  raw: string;
  /** Literal payload announced by `{n}` at the end of the line */
  literal?: Buffer;
}

/**
 * Complete response for one command
 */
export interface CommandResponse {
  /** Tagged completion status */
  status: 'OK' | 'NO' | 'BAD';
  /** Tagged completion text */
  text: string;
  /** Untagged responses received */
  untagged: UntaggedResponse[];
}

/**
 * Sends one command (the executor adds the tag) and collects its response
 */
export interface CommandExecutor {
  execute(command: string): Promise<CommandResponse>;
}

export interface CommandMailSessionOptions {
  /** Mailbox already selected on the connection */
  selectedMailbox?: string;
  logger?: Logger;
}

export class CommandMailSession implements MailSession {
  private readonly executor: CommandExecutor;
  private readonly logger: Logger;
  private selected: string | null;

  constructor(executor: CommandExecutor, options: CommandMailSessionOptions = {}) {
    this.executor = executor;
    this.selected = options.selectedMailbox ?? null;
    this.logger = options.logger ?? getDefaultLogger();
  }

  /**
   * The currently selected mailbox, or null if none selected
   */
  get selectedMailbox(): string | null {
    return this.selected;
  }

  /**
   * Runs a command and rejects on a NO or BAD completion
   *
   * @throws MailProtocolError if the server rejects the command
   */
  private async run(command: string): Promise<CommandResponse> {
    this.logger.debug('IMAP command', { command });
    const response = await this.executor.execute(command);
    if (response.status !== 'OK') {
      throw new MailProtocolError(
        `${command.split(' ').slice(0, 2).join(' ')} failed: ${response.text}`,
        `${response.status} ${response.text}`,
        command
      );
    }
    return response;
  }

  async select(mailbox: string): Promise<void> {
    await this.run(CommandBuilder.select(mailbox));
    this.selected = mailbox;
  }

  async fetchByUid(uid: number, items: string): Promise<RawFetchResult> {
    const command = CommandBuilder.uidFetch(uid, items);
    const response = await this.run(command);

    // Servers may interleave unsolicited FETCH responses for other messages
    const entry = response.untagged.find(r => {
      if (r.type !== 'FETCH' || r.literal === undefined) return false;
      const fetchedUid = parseUid(r.raw);
      return fetchedUid === undefined || fetchedUid === uid;
    });

    if (!entry || entry.literal === undefined) {
      throw new MailProtocolError(`No message with UID ${uid}`, `${response.status} ${response.text}`, command);
    }

    return { headerBlock: entry.raw, rawBody: entry.literal };
  }

  async storeFlags(uid: number, action: StoreAction, flag: string): Promise<void> {
    await this.run(CommandBuilder.uidStoreFlags(uid, [flag], action));
  }

  async storeLabel(uid: number, action: StoreAction, label: string): Promise<void> {
    await this.run(CommandBuilder.uidStoreLabels(uid, [label], action));
  }

  async copy(uid: number, targetMailbox: string, sourceMailbox: string): Promise<void> {
    if (this.selected !== sourceMailbox) {
      await this.select(sourceMailbox);
    }
    await this.run(CommandBuilder.uidCopy(uid, targetMailbox));
  }

  async listLabels(): Promise<Set<string>> {
    const response = await this.run(CommandBuilder.list('', '*'));
    const lines = response.untagged.filter(r => r.type === 'LIST').map(r => r.raw);
    return new Set(parseListResponse(lines).map(mailbox => mailbox.name));
  }
}
