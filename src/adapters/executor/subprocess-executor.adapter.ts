import { spawn } from "child_process";
import {
  CodeExecutionRequest,
  CodeExecutorPort,
  EXECUTION_FINISHED,
  ExecutorChunk,
} from "../../ports/outbound/code-executor.port";
import { logger } from "../../utils/logger";

export interface SpawnedProcess {
  stdout: NodeJS.ReadableStream;
  stderr: NodeJS.ReadableStream;
  stdin: NodeJS.WritableStream;
  on(event: "close" | "error", listener: (arg: unknown) => void): unknown;
  kill(): boolean;
}

export type SpawnProcess = (command: string, args: string[]) => SpawnedProcess;

interface LanguageRuntime {
  command: string;
  args: string[];
}

const PYTHON: LanguageRuntime = { command: "python3", args: ["-u", "-"] };
const SHELL: LanguageRuntime = { command: "bash", args: ["-s"] };
const JAVASCRIPT: LanguageRuntime = { command: "node", args: ["-"] };

const RUNTIMES: Record<string, LanguageRuntime> = {
  python: PYTHON,
  py: PYTHON,
  shell: SHELL,
  bash: SHELL,
  sh: SHELL,
  zsh: SHELL,
  javascript: JAVASCRIPT,
  js: JAVASCRIPT,
  node: JAVASCRIPT,
};

const defaultSpawn: SpawnProcess = (command, args) => spawn(command, args);

function output(content: string): ExecutorChunk {
  return { role: "computer", kind: "console_output", content };
}

/**
 * Runs each block in a fresh interpreter process, piping the code through
 * stdin. stdout and stderr are forwarded in arrival order.
 */
export class SubprocessExecutorAdapter implements CodeExecutorPort {
  constructor(private readonly spawnProcess: SpawnProcess = defaultSpawn) {}

  supportsLanguage(language: string): boolean {
    return language.toLowerCase() in RUNTIMES;
  }

  async *execute(
    request: CodeExecutionRequest,
    signal?: AbortSignal,
  ): AsyncGenerator<ExecutorChunk> {
    const runtime = RUNTIMES[request.language.toLowerCase()];
    if (!runtime) {
      yield output(
        `Language '${request.language}' is not supported. Supported: ${Object.keys(RUNTIMES).join(", ")}\n`,
      );
      yield { ...EXECUTION_FINISHED };
      return;
    }

    const queue: string[] = [];
    const status: { finished: boolean; failure?: string; stdinError?: string } =
      { finished: false };
    let wake: (() => void) | undefined;
    const notify = (): void => {
      const resume = wake;
      wake = undefined;
      resume?.();
    };

    const child = this.spawnProcess(runtime.command, runtime.args);
    const collect = (data: unknown): void => {
      queue.push(String(data));
      notify();
    };
    child.stdout.setEncoding("utf-8");
    child.stderr.setEncoding("utf-8");
    child.stdout.on("data", collect);
    child.stderr.on("data", collect);
    child.on("error", (error) => {
      status.failure = error instanceof Error ? error.message : String(error);
      status.finished = true;
      notify();
    });
    child.on("close", () => {
      status.finished = true;
      notify();
    });
    child.stdin.on("error", (error: Error) => {
      status.stdinError = error.message;
    });

    const abort = (): void => {
      child.kill();
    };
    signal?.addEventListener("abort", abort, { once: true });

    try {
      child.stdin.end(request.code);

      while (true) {
        const next = queue.shift();
        if (next !== undefined) {
          yield output(next);
          continue;
        }
        if (status.finished) {
          break;
        }
        await new Promise<void>((resolve) => {
          wake = resolve;
        });
      }

      if (status.stdinError !== undefined) {
        await logger.debug(
          `stdin of ${runtime.command} closed early: ${status.stdinError}`,
        );
      }
      if (status.failure !== undefined) {
        await logger.warn(`Failed to run ${runtime.command}: ${status.failure}`);
        yield output(`Failed to start ${runtime.command}: ${status.failure}\n`);
      }
      yield { ...EXECUTION_FINISHED };
    } finally {
      signal?.removeEventListener("abort", abort);
      if (!status.finished) {
        child.kill();
      }
    }
  }
}
