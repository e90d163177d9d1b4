import { CodeChunk, MessageChunk } from "../../../shared/types/chat";

export const FENCE = "```";
export const DEFAULT_CODE_LANGUAGE = "python";
export const OS_MODE_CODE_LANGUAGE = "text";

export type ExtractedChunk = MessageChunk | CodeChunk;

export interface CodeBlockExtractorOptions {
  /** Untagged blocks become "text" instead of "python" (OS-control mode). */
  defaultLanguageIsText?: boolean;
}

type ExtractorState = "outside" | "awaiting_language" | "in_body";

const LANGUAGE_TAG_PATTERN = /^[A-Za-z]+$/;

function trailingBacktickCount(value: string): number {
  let count = 0;
  for (let i = value.length - 1; i >= 0 && value[i] === "`"; i -= 1) {
    count += 1;
  }
  return count;
}

/**
 * Incremental splitter for markdown replies. Prose and fenced code come out in
 * the order they were received, and the concatenated result does not depend on
 * how the text was cut into deltas.
 */
export class CodeBlockExtractor {
  private state: ExtractorState = "outside";
  private pending = "";
  private language = DEFAULT_CODE_LANGUAGE;

  constructor(private readonly options: CodeBlockExtractorOptions = {}) {}

  get defaultLanguage(): string {
    return this.options.defaultLanguageIsText
      ? OS_MODE_CODE_LANGUAGE
      : DEFAULT_CODE_LANGUAGE;
  }

  push(delta: string): ExtractedChunk[] {
    if (!delta) {
      return [];
    }
    this.pending += delta;
    return this.drain();
  }

  finish(): ExtractedChunk[] {
    const out = this.drain();
    const rest = this.pending;
    this.pending = "";

    if (this.state === "outside") {
      this.emitMessage(out, rest);
    } else if (this.state === "awaiting_language") {
      // An unterminated tag line alone carries no code.
      const line = rest.trim();
      if (line && !LANGUAGE_TAG_PATTERN.test(line)) {
        this.emitCode(out, rest, this.defaultLanguage);
      }
    } else {
      this.emitCode(out, rest, this.language);
    }

    this.state = "outside";
    this.language = this.defaultLanguage;
    return out;
  }

  private drain(): ExtractedChunk[] {
    const out: ExtractedChunk[] = [];
    let progressed = true;

    while (progressed) {
      switch (this.state) {
        case "outside":
          progressed = this.drainOutside(out);
          break;
        case "awaiting_language":
          progressed = this.readLanguageLine(out);
          break;
        case "in_body":
          progressed = this.drainBody(out);
          break;
      }
    }
    return out;
  }

  private drainOutside(out: ExtractedChunk[]): boolean {
    const fenceAt = this.pending.indexOf(FENCE);
    if (fenceAt >= 0) {
      this.emitMessage(out, this.pending.slice(0, fenceAt));
      this.pending = this.pending.slice(fenceAt + FENCE.length);
      this.state = "awaiting_language";
      return true;
    }

    // A trailing "`" or "``" may be the start of a fence.
    if (this.pending.endsWith("`")) {
      return false;
    }

    this.emitMessage(out, this.pending);
    this.pending = "";
    return false;
  }

  private readLanguageLine(out: ExtractedChunk[]): boolean {
    const newlineAt = this.pending.indexOf("\n");
    const fenceAt = this.pending.indexOf(FENCE);

    // Inline span such as ```ls```: the block closes on its opening line.
    if (fenceAt >= 0 && (newlineAt < 0 || fenceAt < newlineAt)) {
      this.emitCode(out, this.pending.slice(0, fenceAt), this.defaultLanguage);
      this.pending = this.pending.slice(fenceAt + FENCE.length);
      this.state = "outside";
      this.language = this.defaultLanguage;
      return true;
    }

    if (newlineAt < 0) {
      return false;
    }

    const line = this.pending.slice(0, newlineAt).trim();
    this.pending = this.pending.slice(newlineAt + 1);
    this.language = LANGUAGE_TAG_PATTERN.test(line)
      ? line.toLowerCase()
      : this.defaultLanguage;
    this.state = "in_body";
    return true;
  }

  private drainBody(out: ExtractedChunk[]): boolean {
    const fenceAt = this.pending.indexOf(FENCE);
    if (fenceAt >= 0) {
      this.emitCode(out, this.pending.slice(0, fenceAt), this.language);
      this.pending = this.pending.slice(fenceAt + FENCE.length);
      this.state = "outside";
      this.language = this.defaultLanguage;
      return true;
    }

    const held = Math.min(trailingBacktickCount(this.pending), FENCE.length - 1);
    const ready = this.pending.slice(0, this.pending.length - held);
    this.emitCode(out, ready, this.language);
    this.pending = this.pending.slice(ready.length);
    return false;
  }

  private emitMessage(out: ExtractedChunk[], content: string): void {
    if (content) {
      out.push({ role: "assistant", kind: "message", content });
    }
  }

  private emitCode(out: ExtractedChunk[], content: string, format: string): void {
    if (content) {
      out.push({ role: "assistant", kind: "code", format, content });
    }
  }
}

export async function* extractCodeBlocks(
  deltas: AsyncIterable<string>,
  options: CodeBlockExtractorOptions = {},
): AsyncGenerator<ExtractedChunk> {
  const extractor = new CodeBlockExtractor(options);
  for await (const delta of deltas) {
    yield* extractor.push(delta);
  }
  yield* extractor.finish();
}
