export class ErrorPresenter {
  modelNotFound(model: string, models: string[]): string {
    const candidates = models.length > 0 ? models.join(", ") : "(no models available)";
    return [
      `Error: model '${model}' is not available.`,
      `Candidates: ${candidates}`,
      "Next step: run `model list` to see models, `model use <name>` to change the default.",
    ].join("\n");
  }

  commandFailed(action: string, error: unknown): string {
    const message = error instanceof Error ? error.message : String(error);
    return `Failed to ${action}: ${message}`;
  }
}
