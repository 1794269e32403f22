export type SupportErrorCode =
  | 'classification_failed'
  | 'invalid_transition'
  | 'storage_unavailable'
  | 'concurrent_modification'
  | 'ticket_not_found'
  | 'invalid_request'
  | 'corrupt_record';

export class SupportError extends Error {
  constructor(readonly code: SupportErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Provider error, timeout or malformed result. Recovered inside the classifier. */
export class ClassificationFailure extends SupportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('classification_failed', message, options);
  }
}

export class InvalidTransitionError extends SupportError {
  constructor(message: string) {
    super('invalid_transition', message);
  }
}

export class StorageUnavailableError extends SupportError {
  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('storage_unavailable', `Ticket store unavailable during ${operation}: ${detail}`, { cause });
  }
}

export class ConcurrentModificationError extends SupportError {
  constructor(readonly ticketId: number) {
    super('concurrent_modification', `Ticket ${ticketId} was modified concurrently`);
  }
}

export class TicketNotFoundError extends SupportError {
  constructor(ref: number | string) {
    super('ticket_not_found', `Ticket ${ref} not found`);
  }
}

export class InvalidRequestError extends SupportError {
  constructor(message: string) {
    super('invalid_request', message);
  }
}

/** A stored ticket that no longer matches the record schema. */
export class CorruptTicketRecordError extends SupportError {
  constructor(readonly documentId: string, detail: string, cause?: unknown) {
    super('corrupt_record', `Corrupt ticket record ${documentId}: ${detail}`, { cause });
  }
}
