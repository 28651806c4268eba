/**
 * Invalid user input, raised before any retrieval or rendering starts
 */
export class ExportInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class DateRangeError extends ExportInputError {}

export class TemplateError extends ExportInputError {}

export class MediaKindError extends ExportInputError {}

/**
 * A normalized record whose fields contradict its kind
 */
export class MalformedRecordError extends Error {
  constructor(
    message: string,
    public readonly messageId: number
  ) {
    super(`Message ${messageId}: ${message}`);
    this.name = 'MalformedRecordError';
  }
}

/**
 * Failure of the chat source (credentials, connectivity, unreadable export)
 */
export class ChatSourceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ChatSourceError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
