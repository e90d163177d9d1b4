import { Transcript } from "../../domain/conversation/entities/transcript";
import { truncateOutput } from "../../domain/streaming/services/output-truncation";
import {
  Chunk,
  ChunkKind,
  CodeChunk,
  ConsoleOutputChunk,
  GroupKey,
  Message,
  MessageChunk,
  PipelineEvent,
} from "../../shared/types/chat";

export interface AggregatorSettings {
  /** When on, confirmation chunks are consumed instead of forwarded. */
  autoRun: boolean;
  maxOutputChars: number;
  scrollbarHint: boolean;
}

type StorableChunk = MessageChunk | CodeChunk | ConsoleOutputChunk;

function isConsoleKind(kind: ChunkKind): boolean {
  return kind === "console_active_line" || kind === "console_output";
}

function isStorable(chunk: Chunk): chunk is StorableChunk {
  return (
    chunk.kind === "message" ||
    chunk.kind === "code" ||
    chunk.kind === "console_output"
  );
}

function formatOf(chunk: Chunk): string | undefined {
  return "format" in chunk ? chunk.format : undefined;
}

function toGroupKey(chunk: Chunk): GroupKey {
  const key: GroupKey = { role: chunk.role, kind: chunk.kind };
  const format = formatOf(chunk);
  // Active-line and output chunks of one execution share a console group.
  if (format !== undefined && !isConsoleKind(chunk.kind)) {
    key.format = format;
  }
  return key;
}

function belongsToGroup(group: GroupKey, chunk: Chunk): boolean {
  if (group.role !== chunk.role) {
    return false;
  }
  if (isConsoleKind(group.kind) && isConsoleKind(chunk.kind)) {
    return true;
  }
  return group.kind === chunk.kind && group.format === formatOf(chunk);
}

function hasSameShape(message: Readonly<Message>, chunk: StorableChunk): boolean {
  return (
    message.role === chunk.role &&
    message.kind === chunk.kind &&
    message.format === formatOf(chunk)
  );
}

function toMessage(chunk: StorableChunk): Message {
  const message: Message = {
    role: chunk.role,
    kind: chunk.kind,
    content: chunk.content,
  };
  const format = formatOf(chunk);
  if (format !== undefined) {
    message.format = format;
  }
  return message;
}

/**
 * Groups a chunk stream into start/end delimited runs, writes the persistent
 * messages into `transcript` and forwards every chunk to the caller.
 *
 * The signal is checked once per incoming chunk. Once it is seen the generator
 * returns at once: the open group is left without an `end` marker and the
 * transcript is not touched again.
 */
export async function* aggregateMessages(
  source: AsyncIterable<Chunk>,
  transcript: Transcript,
  settings: AggregatorSettings,
  signal?: AbortSignal,
): AsyncGenerator<PipelineEvent> {
  const writer = transcript.openWriter();
  let openGroup: GroupKey | undefined;

  try {
    for await (const chunk of source) {
      if (signal?.aborted) {
        return;
      }

      if (chunk.content === "") {
        continue;
      }

      // Execution finished; make sure it left an output record.
      if (chunk.kind === "console_active_line" && chunk.content === undefined) {
        if (writer.last()?.role !== "computer") {
          writer.push({ role: "computer", kind: "console_output", content: "" });
        }
      }

      if (chunk.kind === "confirmation") {
        if (openGroup) {
          yield { ...openGroup, end: true };
          openGroup = undefined;
        }
        if (!settings.autoRun) {
          yield chunk;
        }
        continue;
      }

      if (openGroup && belongsToGroup(openGroup, chunk)) {
        if (isStorable(chunk)) {
          const last = writer.last();
          if (last && hasSameShape(last, chunk)) {
            writer.appendToLast(chunk.content);
          } else {
            writer.push(toMessage(chunk));
          }
        }
      } else {
        if (openGroup) {
          yield { ...openGroup, end: true };
        }
        openGroup = toGroupKey(chunk);
        yield { ...openGroup, start: true };
        if (isStorable(chunk)) {
          writer.push(toMessage(chunk));
        }
      }

      yield chunk;

      if (chunk.kind === "console_output") {
        writer.updateLast((content) =>
          truncateOutput(content, settings.maxOutputChars, settings.scrollbarHint),
        );
      }
    }

    if (openGroup) {
      yield { ...openGroup, end: true };
    }
  } finally {
    writer.close();
  }
}
