import {
  extractCodeBlocks,
  ExtractedChunk,
} from "../../domain/streaming/services/code-block-extractor";
import { LlmClientPort } from "../../ports/outbound/llm-client.port";
import { ChatMessage } from "../../shared/types/chat";

export const DEFAULT_EXECUTION_INSTRUCTIONS =
  "To execute code on the user's machine, write a markdown code block. Specify the language after the ```. You will receive the output. Use any programming language.";

export interface ModelResponseOptions {
  defaultLanguageIsText: boolean;
  appendExecutionInstructions: boolean;
  executionInstructions?: string;
}

export function prepareModelMessages(
  messages: ChatMessage[],
  options: Pick<
    ModelResponseOptions,
    "appendExecutionInstructions" | "executionInstructions"
  >,
): ChatMessage[] {
  const prepared = messages.map((m) => ({ ...m }));
  if (!options.appendExecutionInstructions) {
    return prepared;
  }

  const instructions =
    options.executionInstructions ?? DEFAULT_EXECUTION_INSTRUCTIONS;
  const first = prepared[0];
  if (first && first.role === "system") {
    first.content = first.content
      ? `${first.content}\n${instructions}`
      : instructions;
    return prepared;
  }
  return [{ role: "system", content: instructions }, ...prepared];
}

async function* contentDeltas(
  llmClient: LlmClientPort,
  model: string,
  messages: ChatMessage[],
  signal?: AbortSignal,
): AsyncGenerator<string> {
  for await (const delta of llmClient.chat(model, messages, signal)) {
    if (delta.content) {
      yield delta.content;
    }
    if (delta.done) {
      return;
    }
  }
}

export function streamModelResponse(
  llmClient: LlmClientPort,
  model: string,
  messages: ChatMessage[],
  options: ModelResponseOptions,
  signal?: AbortSignal,
): AsyncGenerator<ExtractedChunk> {
  const request = prepareModelMessages(messages, options);
  return extractCodeBlocks(contentDeltas(llmClient, model, request, signal), {
    defaultLanguageIsText: options.defaultLanguageIsText,
  });
}
