import axios, { AxiosError } from "axios";
import { LlmClientPort, ModelSummary } from "../../ports/outbound/llm-client.port";
import { ChatMessage, ModelDelta } from "../../shared/types/chat";

interface OllamaChatChunk {
  message?: {
    role: "assistant";
    content: string;
  };
  done: boolean;
}

export class OllamaClientAdapter implements LlmClientPort {
  constructor(
    private readonly baseUrl: string = process.env.OLLAMA_BASE_URL ||
      "http://localhost:11434",
  ) {}

  async listModels(): Promise<ModelSummary[]> {
    try {
      const response = await axios.get<{ models?: Array<{ name: string }> }>(
        `${this.baseUrl}/api/tags`,
      );
      return (response.data.models || []).map((m) => ({ name: m.name }));
    } catch (error) {
      throw new Error(
        `Failed to list Ollama models: ${this.getErrorMessage(error)}`,
      );
    }
  }

  async *chat(
    model: string,
    messages: ChatMessage[],
    signal?: AbortSignal,
  ): AsyncGenerator<ModelDelta> {
    let readableStream: AsyncIterable<unknown>;
    try {
      const response = await axios.post<AsyncIterable<unknown>>(
        `${this.baseUrl}/api/chat`,
        { model, messages, stream: true },
        {
          responseType: "stream",
          headers: { "Content-Type": "application/json" },
          signal,
        },
      );
      readableStream = response.data;
    } catch (error) {
      throw new Error(`Ollama chat request failed: ${this.getErrorMessage(error)}`);
    }

    const decoder = new TextDecoder("utf-8");
    let buffer = "";

    for await (const chunk of readableStream) {
      buffer +=
        chunk instanceof Uint8Array
          ? decoder.decode(chunk, { stream: true })
          : String(chunk);
      const lines = buffer.split("\n");
      buffer = lines.pop() || "";

      for (const line of lines) {
        if (!line.trim()) {
          continue;
        }
        yield this.toDelta(this.parseChunk(line));
      }
    }

    if (buffer.trim()) {
      yield this.toDelta(this.parseChunk(buffer));
    }
  }

  private toDelta(parsed: OllamaChatChunk): ModelDelta {
    return {
      content: parsed.message?.content,
      done: parsed.done,
    };
  }

  private parseChunk(line: string): OllamaChatChunk {
    try {
      return JSON.parse(line) as OllamaChatChunk;
    } catch {
      throw new Error(`Failed to parse Ollama response line as JSON: ${line}`);
    }
  }

  private getErrorMessage(error: unknown): string {
    if (axios.isAxiosError(error)) {
      const axiosError = error as AxiosError<{ message?: string }>;
      const status = axiosError.response?.status;
      const statusText = axiosError.response?.statusText;
      const detail = axiosError.response?.data?.message;
      return [status ? `${status}` : undefined, statusText, detail, axiosError.message]
        .filter(Boolean)
        .join(" / ");
    }

    if (error instanceof Error) {
      return error.message;
    }

    return String(error);
  }
}
