import * as readline from "readline";
import {
  isAffirmative,
  PromptApprovalAdapter,
} from "../../../adapters/approval/prompt-approval.adapter";
import { RunConversationUseCase } from "../../../application/conversation/run-conversation.usecase";
import { Transcript } from "../../../domain/conversation/entities/transcript";
import {
  ConfigPort,
  normalizePipelineSettings,
  PipelineSettings,
} from "../../../ports/outbound/config.port";
import {
  PipelineEventLogEntry,
  PipelineEventLogger,
  writePipelineEventLog,
} from "../../../operations/logging/pipeline-event-logger";
import { isBoundaryMarker, Message } from "../../../shared/types/chat";
import { ErrorPresenter } from "../../presenter/error-presenter";
import { PipelineRenderer } from "../renderers/pipeline-renderer";

export interface ChatCommandInput {
  prompt?: string;
  model?: string;
  autoRun?: boolean;
  osMode?: boolean;
  maxOutput?: number;
  enableEventLog?: boolean;
}

export interface ChatCommandDeps {
  useCase: RunConversationUseCase;
  config: ConfigPort;
  approvals: PromptApprovalAdapter;
  createConversationId: () => string;
  transcript?: Transcript;
  logEvent?: PipelineEventLogger;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function applyOverrides(
  base: Readonly<PipelineSettings>,
  input: ChatCommandInput,
): Readonly<PipelineSettings> {
  return normalizePipelineSettings({
    ...base,
    ...(input.autoRun ? { autoRun: true } : {}),
    ...(input.osMode ? { osMode: true } : {}),
    ...(input.maxOutput !== undefined ? { maxOutputChars: input.maxOutput } : {}),
  });
}

function lastCodeMessage(transcript: Transcript): Readonly<Message> | undefined {
  return [...transcript.messages].reverse().find((m) => m.kind === "code");
}

function askOnce(question: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer);
    });
  });
}

export async function runChatCommand(
  input: ChatCommandInput,
  deps: ChatCommandDeps,
): Promise<void> {
  const errorPresenter = new ErrorPresenter();
  const logEvent: PipelineEventLogger = input.enableEventLog
    ? (deps.logEvent ?? writePipelineEventLog)
    : async () => {};
  const conversationId = deps.createConversationId();
  const start = await deps.useCase.startSession({ cliModel: input.model });

  if (!start.ok) {
    console.error(errorPresenter.modelNotFound(start.model, start.candidates));
    process.exitCode = 1;
    return;
  }

  const settings = applyOverrides(await deps.config.getPipelineSettings(), input);
  const transcript = deps.transcript ?? new Transcript();
  let activeTurn: AbortController | undefined;

  const safeLog = async (
    entry: Omit<PipelineEventLogEntry, "timestamp" | "conversation_id" | "model">,
  ): Promise<void> => {
    try {
      await logEvent({
        ...entry,
        timestamp: new Date().toISOString(),
        conversation_id: conversationId,
        model: start.model,
      });
    } catch (error) {
      console.error(`Failed to write event log: ${errorMessage(error)}`);
    }
  };

  const withDecisionLog =
    (ask: (question: string) => Promise<string>) =>
    async (question: string): Promise<string> => {
      const answer = await ask(question);
      if (!isAffirmative(answer)) {
        const last = lastCodeMessage(transcript);
        await safeLog({
          event_type: "code_declined",
          language: last?.format,
          code: last?.content,
        });
      }
      return answer;
    };

  console.log(`\n--- Chat with ${start.model} (${start.source}) ---\n`);

  const streamOneTurn = async (prompt: string): Promise<void> => {
    const startedAt = Date.now();
    const controller = new AbortController();
    const firstNewIndex = transcript.length;
    const renderer = new PipelineRenderer((text) => {
      process.stdout.write(text);
    });
    activeTurn = controller;
    console.log("Generating...");

    const assistantResponse = (): string =>
      transcript.messages
        .slice(firstNewIndex)
        .filter((m) => m.role === "assistant")
        .map((m) => m.content)
        .join("");

    const reportCancelled = async (): Promise<void> => {
      console.log("Cancelled.");
      await safeLog({
        event_type: "turn_cancelled",
        user_input: prompt,
        assistant_response: assistantResponse(),
        duration_ms: Date.now() - startedAt,
      });
    };

    try {
      for await (const event of deps.useCase.runTurn(transcript, {
        model: start.model,
        prompt,
        settings,
        signal: controller.signal,
      })) {
        renderer.render(event);
        if (
          !isBoundaryMarker(event) &&
          event.kind === "console_active_line" &&
          event.content === undefined
        ) {
          const last = lastCodeMessage(transcript);
          await safeLog({
            event_type: "code_executed",
            language: last?.format,
            code: last?.content,
          });
        }
      }
      renderer.finish();

      if (controller.signal.aborted) {
        await reportCancelled();
        return;
      }

      console.log("Done.");
      await safeLog({
        event_type: "turn_completed",
        resolution_source: start.source,
        user_input: prompt,
        assistant_response: assistantResponse(),
        message_count: transcript.length,
        duration_ms: Date.now() - startedAt,
      });
    } catch (error) {
      renderer.finish();
      // Aborting an in-flight request rejects it; that is a cancellation.
      if (controller.signal.aborted) {
        await reportCancelled();
        return;
      }
      await safeLog({
        event_type: "turn_failed",
        resolution_source: start.source,
        user_input: prompt,
        assistant_response: assistantResponse(),
        duration_ms: Date.now() - startedAt,
        error_message: errorMessage(error),
      });
      throw error;
    } finally {
      activeTurn = undefined;
    }
  };

  if (input.prompt) {
    deps.approvals.usePrompter(withDecisionLog(askOnce));
    const interrupt = (): void => {
      activeTurn?.abort();
    };
    process.once("SIGINT", interrupt);
    try {
      await streamOneTurn(input.prompt);
    } catch (error) {
      console.error(`An error occurred: ${errorMessage(error)}`);
      process.exitCode = 1;
    } finally {
      process.removeListener("SIGINT", interrupt);
      deps.approvals.usePrompter(undefined);
    }
    return;
  }

  console.log("Type /exit or /quit to end the chat, /reset to clear the transcript.");

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: "> ",
  });

  // While a turn waits for approval the next line is its answer.
  let pendingAnswer: ((line: string) => void) | undefined;
  deps.approvals.usePrompter(
    withDecisionLog(
      (question) =>
        new Promise<string>((resolve) => {
          process.stdout.write(question);
          pendingAnswer = resolve;
        }),
    ),
  );

  rl.prompt();
  let lineQueue = Promise.resolve();

  const handleLine = async (line: string): Promise<void> => {
    const trimmed = line.trim();
    if (trimmed === "/exit" || trimmed === "/quit") {
      rl.close();
      return;
    }

    if (trimmed === "/reset") {
      deps.useCase.reset(transcript);
      console.log("Transcript cleared.");
      await safeLog({ event_type: "transcript_reset" });
      rl.prompt();
      return;
    }

    if (!trimmed) {
      rl.prompt();
      return;
    }

    try {
      await streamOneTurn(trimmed);
    } catch (error) {
      console.error(`An error occurred: ${errorMessage(error)}`);
    } finally {
      rl.prompt();
    }
  };

  rl.on("line", (line) => {
    const answer = pendingAnswer;
    if (answer) {
      pendingAnswer = undefined;
      answer(line);
      return;
    }
    lineQueue = lineQueue
      .then(() => handleLine(line))
      .catch((error) => {
        console.error(`An error occurred: ${errorMessage(error)}`);
        rl.prompt();
      });
  })
    .on("SIGINT", () => {
      if (activeTurn) {
        activeTurn.abort();
        const answer = pendingAnswer;
        pendingAnswer = undefined;
        answer?.("n");
        return;
      }
      rl.close();
    })
    .on("close", () => {
      deps.approvals.usePrompter(undefined);
      console.log("Chat ended.");
    });
}
