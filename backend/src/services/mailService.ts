import { ImapFlow } from "imapflow";
import { MessageUnavailableError, TransportError, errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

export interface MailAccount {
  username: string;
  password: string;
  server: string;
  port: number;
}

/** Mailbox operations the reconciler consumes; ids are opaque per source. */
export interface MailSource {
  connect(): Promise<void>;
  search(since: Date): Promise<string[]>;
  fetch(id: string): Promise<Buffer>;
  disconnect(): Promise<void>;
}

export type MailSourceFactory = (account: MailAccount) => MailSource;

/** The slice of the ImapFlow client this source drives. */
export interface ImapClient {
  connect(): Promise<void>;
  mailboxOpen(path: string): Promise<unknown>;
  search(query: { since: Date }, options: { uid: boolean }): Promise<number[] | false>;
  fetchOne(id: string, query: { source: boolean }, options: { uid: boolean }): Promise<{ source?: Buffer } | false>;
  logout(): Promise<void>;
  on(event: "error", listener: (error: unknown) => void): unknown;
}

export type ImapClientOptions = ConstructorParameters<typeof ImapFlow>[0];

export type ImapClientFactory = (options: ImapClientOptions) => ImapClient;

const MAILBOX = "INBOX";

const createImapFlowClient: ImapClientFactory = (options) => new ImapFlow(options);

export class ImapMailSource implements MailSource {
  private client: ImapClient | null = null;

  constructor(
    private readonly account: MailAccount,
    private readonly createClient: ImapClientFactory = createImapFlowClient,
  ) {}

  async connect(): Promise<void> {
    await this.disconnect();

    const client = this.createClient({
      host: this.account.server,
      port: this.account.port,
      secure: this.account.port === 993,
      auth: {
        user: this.account.username,
        pass: this.account.password,
      },
      logger: false,
    });
    client.on("error", (error: unknown) => {
      logger.warn("IMAP connection error", { account: this.account.username, reason: errorMessage(error) });
    });

    try {
      await client.connect();
      await client.mailboxOpen(MAILBOX);
    } catch (error) {
      throw new TransportError(`Unable to open ${MAILBOX} for ${this.account.username}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    this.client = client;
  }

  async search(since: Date): Promise<string[]> {
    const client = this.requireClient();
    try {
      const uids = await client.search({ since }, { uid: true });
      if (!uids) {
        return [];
      }
      return uids.map((uid) => String(uid));
    } catch (error) {
      throw new TransportError(`IMAP search failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async fetch(id: string): Promise<Buffer> {
    const client = this.requireClient();
    let source: Buffer | undefined;
    try {
      const message = await client.fetchOne(id, { source: true }, { uid: true });
      source = message ? message.source : undefined;
    } catch (error) {
      throw new TransportError(`IMAP fetch of message ${id} failed: ${errorMessage(error)}`, { cause: error });
    }
    // An empty answer on a live connection means the UID is gone, not that the link dropped.
    if (!source) {
      throw new MessageUnavailableError(id);
    }
    return source;
  }

  async disconnect(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (!client) {
      return;
    }
    try {
      await client.logout();
    } catch (error) {
      logger.debug("IMAP logout failed", { account: this.account.username, reason: errorMessage(error) });
    }
  }

  private requireClient(): ImapClient {
    if (!this.client) {
      throw new TransportError(`Not connected to ${this.account.server}`);
    }
    return this.client;
  }
}

export const createImapMailSource: MailSourceFactory = (account) => new ImapMailSource(account);
