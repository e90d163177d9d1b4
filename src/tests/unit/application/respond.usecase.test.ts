import {
  DEFAULT_SYSTEM_MESSAGE,
  findTrailingCode,
  RespondUseCase,
} from "../../../application/conversation/respond.usecase";
import { aggregateMessages } from "../../../application/streaming/aggregate-messages";
import { DEFAULT_EXECUTION_INSTRUCTIONS } from "../../../application/streaming/stream-model-response";
import { Transcript } from "../../../domain/conversation/entities/transcript";
import {
  CodeExecutionRequest,
  CodeExecutorPort,
  EXECUTION_FINISHED,
  ExecutorChunk,
} from "../../../ports/outbound/code-executor.port";
import {
  DEFAULT_PIPELINE_SETTINGS,
  PipelineSettings,
} from "../../../ports/outbound/config.port";
import { LlmClientPort } from "../../../ports/outbound/llm-client.port";
import { ChatMessage, Message, ModelDelta, PipelineEvent } from "../../../shared/types/chat";

function createClient(replies: string[]) {
  let call = 0;
  const chat = jest.fn(async function* (
    _model: string,
    _messages: ChatMessage[],
    _signal?: AbortSignal,
  ): AsyncGenerator<ModelDelta> {
    const reply = replies[Math.min(call, replies.length - 1)];
    call += 1;
    yield { content: reply, done: false };
    yield { done: true };
  });
  const client: LlmClientPort = {
    listModels: jest.fn().mockResolvedValue([]),
    chat,
  };
  return { client, chat };
}

function createExecutor(output: string, onRun?: () => void) {
  const execute = jest.fn(async function* (
    _request: CodeExecutionRequest,
    _signal?: AbortSignal,
  ): AsyncGenerator<ExecutorChunk> {
    onRun?.();
    yield { role: "computer", kind: "console_output", content: output };
    yield { ...EXECUTION_FINISHED };
  });
  const executor: CodeExecutorPort = { execute };
  return { executor, execute };
}

async function run(
  responder: RespondUseCase,
  transcript: Transcript,
  settings: PipelineSettings,
  signal?: AbortSignal,
): Promise<PipelineEvent[]> {
  const events: PipelineEvent[] = [];
  for await (const event of aggregateMessages(
    responder.respond(transcript, "test-model", settings, signal),
    transcript,
    settings,
    signal,
  )) {
    events.push(event);
  }
  return events;
}

const RUN_CODE = "Run:\n```python\nprint(2)\n```";

describe("RespondUseCase", () => {
  it("runs the last code block and feeds its output back to the model", async () => {
    const { client, chat } = createClient([RUN_CODE, "Done, it printed 2."]);
    const { executor, execute } = createExecutor("2\n");
    const approval = { approve: jest.fn().mockResolvedValue(true) };
    const responder = new RespondUseCase(client, executor, approval);
    const transcript = new Transcript([
      { role: "user", kind: "message", content: "print two" },
    ]);

    await run(responder, transcript, { ...DEFAULT_PIPELINE_SETTINGS, autoRun: true });

    expect(approval.approve).not.toHaveBeenCalled();
    expect(execute).toHaveBeenCalledTimes(1);
    expect(execute.mock.calls[0][0]).toEqual({ language: "python", code: "print(2)\n" });
    expect(chat).toHaveBeenCalledTimes(2);
    expect(chat.mock.calls[1][1]).toEqual([
      {
        role: "system",
        content: `${DEFAULT_SYSTEM_MESSAGE}\n${DEFAULT_EXECUTION_INSTRUCTIONS}`,
      },
      { role: "user", content: "print two" },
      { role: "assistant", content: "Run:\n\n```python\nprint(2)\n```" },
      {
        role: "user",
        content:
          "Code output: 2\n\nWhat does this output mean / what's next (if anything, or are we done)?",
      },
    ]);
    expect(transcript.toJSON()).toEqual([
      { role: "user", kind: "message", content: "print two" },
      { role: "assistant", kind: "message", content: "Run:\n" },
      { role: "assistant", kind: "code", format: "python", content: "print(2)\n" },
      { role: "computer", kind: "console_output", content: "2\n" },
      { role: "assistant", kind: "message", content: "Done, it printed 2." },
    ]);
  });

  it("runs a block followed only by newlines after the closing fence", async () => {
    const { client, chat } = createClient(["```python\nprint(1)\n```\n\n", "Printed."]);
    const { executor, execute } = createExecutor("1\n");
    const responder = new RespondUseCase(client, executor, {
      approve: jest.fn().mockResolvedValue(true),
    });
    const transcript = new Transcript();

    await run(responder, transcript, { ...DEFAULT_PIPELINE_SETTINGS, autoRun: true });

    expect(execute).toHaveBeenCalledTimes(1);
    expect(execute.mock.calls[0][0]).toEqual({ language: "python", code: "print(1)\n" });
    expect(chat).toHaveBeenCalledTimes(2);
    expect(transcript.toJSON()).toEqual([
      { role: "assistant", kind: "code", format: "python", content: "print(1)\n" },
      { role: "assistant", kind: "message", content: "\n\n" },
      { role: "computer", kind: "console_output", content: "1\n" },
      { role: "assistant", kind: "message", content: "Printed." },
    ]);
  });

  it("asks for approval and ends the turn when it is declined", async () => {
    const { client, chat } = createClient([RUN_CODE]);
    const { executor, execute } = createExecutor("2\n");
    const approval = { approve: jest.fn().mockResolvedValue(false) };
    const responder = new RespondUseCase(client, executor, approval);
    const transcript = new Transcript();

    const events = await run(responder, transcript, DEFAULT_PIPELINE_SETTINGS);

    expect(approval.approve).toHaveBeenCalledWith({
      language: "python",
      code: "print(2)\n",
    });
    expect(events).toContainEqual({
      role: "computer",
      kind: "confirmation",
      format: "python",
      content: "print(2)\n",
    });
    expect(execute).not.toHaveBeenCalled();
    expect(chat).toHaveBeenCalledTimes(1);
  });

  it("stops after a reply without code", async () => {
    const { client, chat } = createClient(["Nothing to run."]);
    const { executor, execute } = createExecutor("");
    const responder = new RespondUseCase(client, executor, {
      approve: jest.fn().mockResolvedValue(true),
    });

    await run(responder, new Transcript(), DEFAULT_PIPELINE_SETTINGS);

    expect(chat).toHaveBeenCalledTimes(1);
    expect(execute).not.toHaveBeenCalled();
  });

  it("gives up after the configured number of rounds", async () => {
    const { client, chat } = createClient([RUN_CODE]);
    const { executor, execute } = createExecutor("2\n");
    const responder = new RespondUseCase(client, executor, {
      approve: jest.fn().mockResolvedValue(true),
    });

    await run(responder, new Transcript(), {
      ...DEFAULT_PIPELINE_SETTINGS,
      autoRun: true,
      maxIterations: 2,
    });

    expect(chat).toHaveBeenCalledTimes(2);
    expect(execute).toHaveBeenCalledTimes(2);
  });

  it("does not call the model again once the turn is cancelled", async () => {
    const controller = new AbortController();
    const { client, chat } = createClient([RUN_CODE]);
    const { executor } = createExecutor("2\n", () => controller.abort());
    const responder = new RespondUseCase(client, executor, {
      approve: jest.fn().mockResolvedValue(true),
    });

    await run(
      responder,
      new Transcript(),
      { ...DEFAULT_PIPELINE_SETTINGS, autoRun: true },
      controller.signal,
    );

    expect(chat).toHaveBeenCalledTimes(1);
  });

  it("uses custom system message and templates", async () => {
    const { client, chat } = createClient([RUN_CODE, "ok"]);
    const { executor } = createExecutor("");
    const responder = new RespondUseCase(
      client,
      executor,
      { approve: jest.fn().mockResolvedValue(true) },
      {
        systemMessage: "sys",
        executionInstructions: "fences",
        templates: { codeOutputTemplate: "out={content}", emptyCodeOutputTemplate: "no output" },
      },
    );

    await run(responder, new Transcript(), { ...DEFAULT_PIPELINE_SETTINGS, autoRun: true });

    expect(chat.mock.calls[1][1]).toEqual([
      { role: "system", content: "sys\nfences" },
      { role: "assistant", content: "Run:\n\n```python\nprint(2)\n```" },
      { role: "user", content: "no output" },
    ]);
  });
});

describe("findTrailingCode", () => {
  it("skips whitespace-only prose after the last block", () => {
    const code: Message = { role: "assistant", kind: "code", format: "sh", content: "ls\n" };

    expect(
      findTrailingCode([code, { role: "assistant", kind: "message", content: " \n" }]),
    ).toEqual(code);
    expect(
      findTrailingCode([code, { role: "assistant", kind: "message", content: "\nok" }]),
    ).toBeUndefined();
    expect(findTrailingCode([])).toBeUndefined();
  });
});
