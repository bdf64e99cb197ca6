export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
  }
}

/** The mailbox no longer holds the message (expunged or moved); the connection itself is fine. */
export class MessageUnavailableError extends Error {
  readonly messageId: string;

  constructor(messageId: string) {
    super(`Message ${messageId} is no longer in the mailbox`);
    this.name = "MessageUnavailableError";
    this.messageId = messageId;
  }
}

export class EmailParseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EmailParseError";
  }
}

export class StoreReadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreReadError";
  }
}

/** Raised when the tracking file cannot be written; fatal for the account being reconciled. */
export class StoreWriteError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreWriteError";
  }
}

export class UnknownApplicationError extends Error {
  readonly jobId: string;

  constructor(jobId: string) {
    super(`Job ID '${jobId}' not found`);
    this.name = "UnknownApplicationError";
    this.jobId = jobId;
  }
}

export class InvalidDateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidDateError";
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
