import { Command, InvalidArgumentError } from "commander";
import { randomUUID } from "crypto";
import { FileConfigAdapter } from "./adapters/config/file-config.adapter";
import { PromptApprovalAdapter } from "./adapters/approval/prompt-approval.adapter";
import { SubprocessExecutorAdapter } from "./adapters/executor/subprocess-executor.adapter";
import { OllamaClientAdapter } from "./adapters/ollama/ollama-client.adapter";
import { RespondUseCase } from "./application/conversation/respond.usecase";
import { RunConversationUseCase } from "./application/conversation/run-conversation.usecase";
import { ResolveModelUseCase } from "./application/model-endpoint/resolve-model.usecase";
import { runChatCommand } from "./interaction/cli/commands/chat.command";
import { ErrorPresenter } from "./interaction/presenter/error-presenter";
import { CodeExecutorPort } from "./ports/outbound/code-executor.port";
import { ConfigPort } from "./ports/outbound/config.port";
import { LlmClientPort } from "./ports/outbound/llm-client.port";

function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer: ${value}`);
  }
  return Math.floor(parsed);
}

export function createProgram(deps?: {
  useCase?: RunConversationUseCase;
  llmClient?: LlmClientPort;
  executor?: CodeExecutorPort;
  config?: ConfigPort;
  approvals?: PromptApprovalAdapter;
}): Command {
  const config = deps?.config ?? new FileConfigAdapter();
  const llmClient = deps?.llmClient ?? new OllamaClientAdapter();
  const executor = deps?.executor ?? new SubprocessExecutorAdapter();
  const approvals = deps?.approvals ?? new PromptApprovalAdapter();
  const resolver = new ResolveModelUseCase(config);
  const responder = new RespondUseCase(llmClient, executor, approvals);
  const useCase =
    deps?.useCase ?? new RunConversationUseCase(resolver, llmClient, responder);
  const presenter = new ErrorPresenter();

  const program = new Command();

  program
    .name("fence-agent")
    .description(
      "Chat with a local model that answers in markdown and runs its code blocks.",
    )
    .version("0.1.0");

  program
    .command("chat [prompt]")
    .description("Run single-shot or interactive chat.")
    .option("-m, --model <model_name>", "Model name to use")
    .option("--auto-run", "Run code blocks without asking for confirmation")
    .option("--os", "Treat untagged code blocks as plain text")
    .option(
      "--max-output <n>",
      "Characters of console output kept per execution",
      parsePositiveInteger,
    )
    .option("--log-events", "Enable local pipeline event logging (masked + rotated)")
    .action(
      async (
        prompt: string | undefined,
        options: {
          model?: string;
          autoRun?: boolean;
          os?: boolean;
          maxOutput?: number;
          logEvents?: boolean;
        },
      ) => {
        try {
          await runChatCommand(
            {
              prompt,
              model: options.model,
              autoRun: options.autoRun,
              osMode: options.os,
              maxOutput: options.maxOutput,
              enableEventLog: Boolean(options.logEvents),
            },
            {
              useCase,
              config,
              approvals,
              createConversationId: () => `conversation-${randomUUID()}`,
            },
          );
        } catch (error) {
          console.error(presenter.commandFailed("run chat", error));
          process.exitCode = 1;
        }
      },
    );

  const modelCommand = program
    .command("model")
    .description("Model operations.");

  modelCommand
    .command("list")
    .description("List available models from Ollama.")
    .action(async () => {
      try {
        const models = await llmClient.listModels();
        if (models.length === 0) {
          console.log("No models available.");
          return;
        }
        console.log("Available models:");
        models.forEach((m) => console.log(`  - ${m.name}`));
      } catch (error) {
        console.error(presenter.commandFailed("list models", error));
        process.exitCode = 1;
      }
    });

  modelCommand
    .command("use <model_name>")
    .description("Set default model.")
    .action(async (modelName: string) => {
      try {
        const models = await llmClient.listModels();
        if (!models.some((m) => m.name === modelName)) {
          console.error(
            presenter.modelNotFound(
              modelName,
              models.map((m) => m.name),
            ),
          );
          process.exitCode = 1;
          return;
        }
        await config.setDefaultModel(modelName);
        console.log(`Default model set to '${modelName}'.`);
      } catch (error) {
        console.error(presenter.commandFailed("set the default model", error));
        process.exitCode = 1;
      }
    });

  program
    .command("config")
    .description("Configuration operations.")
    .command("show")
    .description("Show the effective model and pipeline settings.")
    .action(async () => {
      try {
        const [model, settings] = await Promise.all([
          config.getDefaultModel(),
          config.getPipelineSettings(),
        ]);
        console.log(`default_model=${model}`);
        console.log(`auto_run=${settings.autoRun ? "on" : "off"}`);
        console.log(`os_mode=${settings.osMode ? "on" : "off"}`);
        console.log(`max_output_chars=${settings.maxOutputChars}`);
        console.log(`scrollbar_hint=${settings.scrollbarHint ? "on" : "off"}`);
        console.log(`max_iterations=${settings.maxIterations}`);
        console.log(
          `execution_instructions=${settings.appendExecutionInstructions ? "on" : "off"}`,
        );
      } catch (error) {
        console.error(presenter.commandFailed("read configuration", error));
        process.exitCode = 1;
      }
    });

  return program;
}

export async function runCli(argv: string[]): Promise<void> {
  const program = createProgram();
  await program.parseAsync(argv);
}
