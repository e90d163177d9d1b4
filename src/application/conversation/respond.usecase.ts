import { Transcript } from "../../domain/conversation/entities/transcript";
import {
  renderTranscript,
  TranscriptTemplates,
} from "../../domain/conversation/services/render-transcript";
import { DEFAULT_CODE_LANGUAGE } from "../../domain/streaming/services/code-block-extractor";
import {
  CodeExecutionRequest,
  CodeExecutorPort,
  ExecutionApprovalPort,
} from "../../ports/outbound/code-executor.port";
import { PipelineSettings } from "../../ports/outbound/config.port";
import { LlmClientPort } from "../../ports/outbound/llm-client.port";
import { Chunk, Message } from "../../shared/types/chat";
import { streamModelResponse } from "../streaming/stream-model-response";

export const DEFAULT_SYSTEM_MESSAGE = [
  "You are a programming assistant that completes tasks by running code on the user's machine.",
  "Start larger requests with a short plan, then work in small steps: run a little code, read its output, continue.",
  "Write messages to the user in Markdown.",
].join("\n");

export interface RespondOptions {
  systemMessage?: string;
  templates?: TranscriptTemplates;
  executionInstructions?: string;
}

/**
 * The code block that ended the reply, if any. Whitespace the model wrote
 * after the closing fence does not count as prose.
 */
export function findTrailingCode(
  messages: ReadonlyArray<Readonly<Message>>,
): Readonly<Message> | undefined {
  for (let i = messages.length - 1; i >= 0; i -= 1) {
    const message = messages[i];
    if (message.kind === "message" && !message.content.trim()) {
      continue;
    }
    return message.kind === "code" ? message : undefined;
  }
  return undefined;
}

/**
 * Model/executor loop for one user turn. Reads the transcript to decide what
 * to do next, so it must be consumed through the message aggregator that
 * writes that transcript.
 */
export class RespondUseCase {
  constructor(
    private readonly llmClient: LlmClientPort,
    private readonly executor: CodeExecutorPort,
    private readonly approval: ExecutionApprovalPort,
    private readonly options: RespondOptions = {},
  ) {}

  async *respond(
    transcript: Transcript,
    model: string,
    settings: Readonly<PipelineSettings>,
    signal?: AbortSignal,
  ): AsyncGenerator<Chunk> {
    for (let round = 0; round < settings.maxIterations; round += 1) {
      if (signal?.aborted) {
        return;
      }

      const messages = renderTranscript(
        transcript.messages,
        this.options.systemMessage ?? DEFAULT_SYSTEM_MESSAGE,
        this.options.templates,
      );
      yield* streamModelResponse(
        this.llmClient,
        model,
        messages,
        {
          defaultLanguageIsText: settings.osMode,
          appendExecutionInstructions: settings.appendExecutionInstructions,
          executionInstructions: this.options.executionInstructions,
        },
        signal,
      );

      const last = findTrailingCode(transcript.messages);
      if (!last || signal?.aborted) {
        return;
      }

      const request: CodeExecutionRequest = {
        language: last.format ?? DEFAULT_CODE_LANGUAGE,
        code: last.content,
      };
      yield {
        role: "computer",
        kind: "confirmation",
        format: request.language,
        content: request.code,
      };

      if (!settings.autoRun && !(await this.approval.approve(request))) {
        return;
      }
      if (signal?.aborted) {
        return;
      }

      yield* this.executor.execute(request, signal);
    }
  }
}
