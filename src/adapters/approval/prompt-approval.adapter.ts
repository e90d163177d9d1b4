import {
  CodeExecutionRequest,
  ExecutionApprovalPort,
} from "../../ports/outbound/code-executor.port";

export type Prompter = (question: string) => Promise<string>;

export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === "y" || normalized === "yes";
}

export function buildApprovalQuestion(request: CodeExecutionRequest): string {
  return `Run this ${request.language} code? (y/n) `;
}

/**
 * Asks whoever currently owns the terminal. Without a prompter every request
 * is declined.
 */
export class PromptApprovalAdapter implements ExecutionApprovalPort {
  private prompter: Prompter | undefined;

  usePrompter(prompter: Prompter | undefined): void {
    this.prompter = prompter;
  }

  async approve(request: CodeExecutionRequest): Promise<boolean> {
    if (!this.prompter) {
      return false;
    }
    const answer = await this.prompter(buildApprovalQuestion(request));
    return isAffirmative(answer);
  }
}
