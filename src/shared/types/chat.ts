export type ChatRole = "user" | "assistant" | "computer" | "system";

export type ChunkKind =
  | "message"
  | "code"
  | "console_active_line"
  | "console_output"
  | "confirmation"
  | "review";

export interface MessageChunk {
  role: "user" | "assistant" | "system";
  kind: "message";
  content: string;
}

export interface CodeChunk {
  role: "assistant";
  kind: "code";
  format: string;
  content: string;
}

/**
 * Marks the line currently running. A chunk without `content` means the
 * execution finished.
 */
export interface ConsoleActiveLineChunk {
  role: "computer";
  kind: "console_active_line";
  content?: string;
}

export interface ConsoleOutputChunk {
  role: "computer";
  kind: "console_output";
  content: string;
}

/** Code waiting for approval; `format` carries the language. */
export interface ConfirmationChunk {
  role: "computer";
  kind: "confirmation";
  format: string;
  content: string;
}

export interface ReviewChunk {
  role: "assistant";
  kind: "review";
  format?: string;
  content: string;
}

export type Chunk =
  | MessageChunk
  | CodeChunk
  | ConsoleActiveLineChunk
  | ConsoleOutputChunk
  | ConfirmationChunk
  | ReviewChunk;

export type StoredKind = "message" | "code" | "console_output";

export interface Message {
  role: ChatRole;
  kind: StoredKind;
  format?: string;
  content: string;
}

export interface GroupKey {
  role: ChatRole;
  kind: ChunkKind;
  format?: string;
}

export type BoundaryMarker = GroupKey & ({ start: true } | { end: true });

export type PipelineEvent = Chunk | BoundaryMarker;

export function isBoundaryMarker(event: PipelineEvent): event is BoundaryMarker {
  return "start" in event || "end" in event;
}

/** Plain chat turn sent to the model client. */
export interface ChatMessage {
  role: "user" | "assistant" | "system";
  content: string;
}

export interface ModelDelta {
  content?: string;
  done: boolean;
}

export type ModelResolutionSource = "cli" | "default";
