import { Message } from "../../../shared/types/chat";

export class TranscriptBusyError extends Error {
  constructor() {
    super("Transcript already has an open writer; runs must be serialized.");
    this.name = "TranscriptBusyError";
  }
}

export class TranscriptWriterClosedError extends Error {
  constructor() {
    super("Transcript writer is closed.");
    this.name = "TranscriptWriterClosedError";
  }
}

export interface TranscriptWriter {
  last(): Readonly<Message> | undefined;
  push(message: Message): void;
  appendToLast(content: string): void;
  updateLast(update: (content: string) => string): void;
  close(): void;
}

function copyMessage(message: Message): Message {
  const copy: Message = {
    role: message.role,
    kind: message.kind,
    content: message.content,
  };
  if (message.format !== undefined) {
    copy.format = message.format;
  }
  return copy;
}

/**
 * Ordered conversation record. Only the holder of the open writer may change
 * it, and only at the tail.
 */
export class Transcript {
  private readonly entries: Message[];
  private activeWriter: TranscriptWriter | undefined;

  constructor(initial: Message[] = []) {
    this.entries = initial.map(copyMessage);
  }

  get messages(): ReadonlyArray<Readonly<Message>> {
    return this.entries;
  }

  get length(): number {
    return this.entries.length;
  }

  get isWriting(): boolean {
    return this.activeWriter !== undefined;
  }

  last(): Readonly<Message> | undefined {
    return this.entries[this.entries.length - 1];
  }

  toJSON(): Message[] {
    return this.entries.map(copyMessage);
  }

  clear(): void {
    if (this.activeWriter) {
      throw new TranscriptBusyError();
    }
    this.entries.length = 0;
  }

  openWriter(): TranscriptWriter {
    if (this.activeWriter) {
      throw new TranscriptBusyError();
    }

    const entries = this.entries;
    let closed = false;
    const ensureOpen = (): void => {
      if (closed) {
        throw new TranscriptWriterClosedError();
      }
    };
    const tailIndex = (): number => {
      if (entries.length === 0) {
        throw new Error("Transcript is empty; nothing to extend.");
      }
      return entries.length - 1;
    };

    const writer: TranscriptWriter = {
      last: () => entries[entries.length - 1],
      push: (message) => {
        ensureOpen();
        entries.push(copyMessage(message));
      },
      appendToLast: (content) => {
        ensureOpen();
        entries[tailIndex()].content += content;
      },
      updateLast: (update) => {
        ensureOpen();
        const index = tailIndex();
        entries[index].content = update(entries[index].content);
      },
      close: () => {
        if (closed) {
          return;
        }
        closed = true;
        if (this.activeWriter === writer) {
          this.activeWriter = undefined;
        }
      },
    };

    this.activeWriter = writer;
    return writer;
  }
}
