import { FENCE } from "../../../domain/streaming/services/code-block-extractor";
import { isBoundaryMarker, PipelineEvent } from "../../../shared/types/chat";

export type TextSink = (text: string) => void;

/** Plain terminal rendering of pipeline events. */
export class PipelineRenderer {
  private lastChar = "\n";

  constructor(private readonly write: TextSink) {}

  render(event: PipelineEvent): void {
    if (isBoundaryMarker(event)) {
      this.ensureNewline();
      if (event.kind === "code") {
        this.emit("start" in event ? `${FENCE}${event.format ?? ""}\n` : `${FENCE}\n`);
      }
      return;
    }

    switch (event.kind) {
      case "message":
        if (event.role !== "user") {
          this.emit(event.content);
        }
        return;
      case "code":
      case "console_output":
      case "review":
        this.emit(event.content);
        return;
      case "console_active_line":
      case "confirmation":
        return;
    }
  }

  finish(): void {
    this.ensureNewline();
  }

  private ensureNewline(): void {
    if (this.lastChar !== "\n") {
      this.emit("\n");
    }
  }

  private emit(text: string): void {
    if (!text) {
      return;
    }
    this.write(text);
    this.lastChar = text[text.length - 1];
  }
}
