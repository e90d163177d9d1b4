import {
  ConsoleActiveLineChunk,
  ConsoleOutputChunk,
} from "../../shared/types/chat";

export interface CodeExecutionRequest {
  language: string;
  code: string;
}

export type ExecutorChunk = ConsoleActiveLineChunk | ConsoleOutputChunk;

export const EXECUTION_FINISHED: ConsoleActiveLineChunk = Object.freeze({
  role: "computer",
  kind: "console_active_line",
});

export interface CodeExecutorPort {
  /**
   * Runs one block. The stream always ends with an active-line chunk that has
   * no content.
   */
  execute(
    request: CodeExecutionRequest,
    signal?: AbortSignal,
  ): AsyncGenerator<ExecutorChunk>;
}

export interface ExecutionApprovalPort {
  approve(request: CodeExecutionRequest): Promise<boolean>;
}
