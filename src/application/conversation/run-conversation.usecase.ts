import { Transcript } from "../../domain/conversation/entities/transcript";
import { PipelineSettings } from "../../ports/outbound/config.port";
import { LlmClientPort } from "../../ports/outbound/llm-client.port";
import {
  Chunk,
  ModelResolutionSource,
  PipelineEvent,
} from "../../shared/types/chat";
import { ResolveModelUseCase } from "../model-endpoint/resolve-model.usecase";
import { aggregateMessages } from "../streaming/aggregate-messages";
import { RespondUseCase } from "./respond.usecase";

export interface ConversationStartInput {
  cliModel?: string;
}

export interface ConversationStartSuccess {
  ok: true;
  model: string;
  source: ModelResolutionSource;
}

export interface ConversationStartFailure {
  ok: false;
  code: "MODEL_NOT_FOUND";
  model: string;
  candidates: string[];
}

export type ConversationStartResult =
  | ConversationStartSuccess
  | ConversationStartFailure;

export interface TurnInput {
  model: string;
  prompt: string;
  settings: Readonly<PipelineSettings>;
  signal?: AbortSignal;
}

export class RunConversationUseCase {
  constructor(
    private readonly resolver: ResolveModelUseCase,
    private readonly llmClient: LlmClientPort,
    private readonly responder: RespondUseCase,
  ) {}

  async startSession(
    input: ConversationStartInput,
  ): Promise<ConversationStartResult> {
    const resolved = await this.resolver.execute({ cliModel: input.cliModel });

    const availableModels = await this.llmClient.listModels();
    const availableModelNames = availableModels.map((m) => m.name);
    if (!availableModelNames.includes(resolved.model)) {
      return {
        ok: false,
        code: "MODEL_NOT_FOUND",
        model: resolved.model,
        candidates: availableModelNames,
      };
    }

    return {
      ok: true,
      model: resolved.model,
      source: resolved.source,
    };
  }

  async *runTurn(
    transcript: Transcript,
    input: TurnInput,
  ): AsyncGenerator<PipelineEvent> {
    const settings = Object.freeze({ ...input.settings });
    const source = this.withUserMessage(transcript, input, settings);
    yield* aggregateMessages(
      source,
      transcript,
      {
        autoRun: settings.autoRun,
        maxOutputChars: settings.maxOutputChars,
        scrollbarHint: settings.scrollbarHint,
      },
      input.signal,
    );
  }

  reset(transcript: Transcript): void {
    transcript.clear();
  }

  private async *withUserMessage(
    transcript: Transcript,
    input: TurnInput,
    settings: Readonly<PipelineSettings>,
  ): AsyncGenerator<Chunk> {
    yield { role: "user", kind: "message", content: input.prompt };
    yield* this.responder.respond(
      transcript,
      input.model,
      settings,
      input.signal,
    );
  }
}
