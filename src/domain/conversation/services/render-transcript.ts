import { ChatMessage, Message } from "../../../shared/types/chat";
import { FENCE } from "../../streaming/services/code-block-extractor";

export interface TranscriptTemplates {
  codeOutputTemplate: string;
  emptyCodeOutputTemplate: string;
}

export const DEFAULT_TRANSCRIPT_TEMPLATES: Readonly<TranscriptTemplates> = {
  codeOutputTemplate:
    "Code output: {content}\n\nWhat does this output mean / what's next (if anything, or are we done)?",
  emptyCodeOutputTemplate:
    "The code above was executed on my machine. It produced no text output. what's next (if anything, or are we done?)",
};

function fill(template: string, content: string): string {
  return template.split("{content}").join(content);
}

function toTurn(
  message: Readonly<Message>,
  templates: Readonly<TranscriptTemplates>,
): ChatMessage {
  switch (message.kind) {
    case "code": {
      const body = message.content.endsWith("\n")
        ? message.content
        : `${message.content}\n`;
      return {
        role: "assistant",
        content: `${FENCE}${message.format ?? ""}\n${body}${FENCE}`,
      };
    }
    case "console_output": {
      const output = message.content.trim();
      return {
        role: "user",
        content: output
          ? fill(templates.codeOutputTemplate, output)
          : templates.emptyCodeOutputTemplate,
      };
    }
    case "message":
      return {
        role: message.role === "computer" ? "user" : message.role,
        content: message.content,
      };
  }
}

/**
 * Flattens the transcript into chat turns for the model. Code goes back as
 * fenced markdown, console output as a user turn, and neighbouring turns of
 * one role are joined.
 */
export function renderTranscript(
  messages: ReadonlyArray<Readonly<Message>>,
  systemMessage?: string,
  templates: Readonly<TranscriptTemplates> = DEFAULT_TRANSCRIPT_TEMPLATES,
): ChatMessage[] {
  const turns: ChatMessage[] = [];
  if (systemMessage) {
    turns.push({ role: "system", content: systemMessage });
  }

  for (const message of messages) {
    const turn = toTurn(message, templates);
    const previous = turns[turns.length - 1];
    if (previous && previous.role === turn.role) {
      previous.content = `${previous.content.trimEnd()}\n\n${turn.content}`;
    } else {
      turns.push(turn);
    }
  }
  return turns;
}
