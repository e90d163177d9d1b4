import { RespondUseCase } from "../../../application/conversation/respond.usecase";
import { RunConversationUseCase } from "../../../application/conversation/run-conversation.usecase";
import { ResolveModelUseCase } from "../../../application/model-endpoint/resolve-model.usecase";
import { Transcript } from "../../../domain/conversation/entities/transcript";
import { buildTruncationBanner } from "../../../domain/streaming/services/output-truncation";
import {
  CodeExecutorPort,
  EXECUTION_FINISHED,
  ExecutorChunk,
} from "../../../ports/outbound/code-executor.port";
import {
  ConfigPort,
  DEFAULT_PIPELINE_SETTINGS,
  PipelineSettings,
} from "../../../ports/outbound/config.port";
import { LlmClientPort, ModelSummary } from "../../../ports/outbound/llm-client.port";
import {
  ChatMessage,
  isBoundaryMarker,
  ModelDelta,
  PipelineEvent,
} from "../../../shared/types/chat";

class FixedConfig implements ConfigPort {
  async getDefaultModel(): Promise<string> {
    return "local-model";
  }

  async setDefaultModel(_model: string): Promise<void> {}

  async getPipelineSettings(): Promise<Readonly<PipelineSettings>> {
    return DEFAULT_PIPELINE_SETTINGS;
  }
}

class ScriptedModel implements LlmClientPort {
  readonly requests: ChatMessage[][] = [];

  async listModels(): Promise<ModelSummary[]> {
    return [{ name: "local-model" }];
  }

  async *chat(_model: string, messages: ChatMessage[]): AsyncGenerator<ModelDelta> {
    const reply = this.requests.length === 0 ? "```python\nprint('x')\n```" : "Seen.";
    this.requests.push(messages);
    yield { content: reply, done: false };
    yield { done: true };
  }
}

class ChattyExecutor implements CodeExecutorPort {
  async *execute(): AsyncGenerator<ExecutorChunk> {
    yield { role: "computer", kind: "console_output", content: "0123456789" };
    yield { role: "computer", kind: "console_output", content: "abcdef\n" };
    yield { ...EXECUTION_FINISHED };
  }
}

describe("F-005 Output truncation acceptance", () => {
  it("streams the full output but keeps only the tail for the model", async () => {
    const model = new ScriptedModel();
    const useCase = new RunConversationUseCase(
      new ResolveModelUseCase(new FixedConfig()),
      model,
      new RespondUseCase(model, new ChattyExecutor(), {
        approve: jest.fn().mockResolvedValue(true),
      }),
    );
    const transcript = new Transcript();

    const streamed: string[] = [];
    for await (const event of useCase.runTurn(transcript, {
      model: "local-model",
      prompt: "print a lot",
      settings: { ...DEFAULT_PIPELINE_SETTINGS, autoRun: true, maxOutputChars: 10 },
    })) {
      collectOutput(event, streamed);
    }

    const banner = buildTruncationBanner(10);
    expect(streamed.join("")).toBe("0123456789abcdef\n");
    expect(transcript.messages[2]).toEqual({
      role: "computer",
      kind: "console_output",
      content: `${banner}789abcdef\n`,
    });
    const followUp = model.requests[1];
    expect(followUp[followUp.length - 1]).toEqual({
      role: "user",
      content: `Code output: ${banner}789abcdef\n\nWhat does this output mean / what's next (if anything, or are we done)?`,
    });
  });
});

function collectOutput(event: PipelineEvent, into: string[]): void {
  if (!isBoundaryMarker(event) && event.kind === "console_output") {
    into.push(event.content);
  }
}
