import { promises as fsp } from "fs";
import * as os from "os";
import * as path from "path";
import {
  maskSensitiveText,
  sanitizePipelineEventLogEntry,
  writePipelineEventLog,
} from "../../../operations/logging/pipeline-event-logger";

describe("pipeline-event-logger", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fsp.mkdtemp(path.join(os.tmpdir(), "pipeline-event-logger-"));
  });

  afterEach(async () => {
    delete process.env.PIPELINE_EVENT_LOG_DIR;
    delete process.env.PIPELINE_EVENT_LOG_FILE;
    delete process.env.PIPELINE_EVENT_LOG_MAX_BYTES;
    await fsp.rm(tempDir, { recursive: true, force: true });
  });

  it("masks emails, keys and long numbers", () => {
    expect(
      maskSensitiveText(
        "mail test@example.com key sk-test-secret-placeholder00 card 1234-5678-9012-3456",
      ),
    ).toBe("mail [REDACTED_EMAIL] key [REDACTED_KEY] card [REDACTED_NUMBER]");
  });

  it("masks prompts, replies and executed code", () => {
    const entry = sanitizePipelineEventLogEntry({
      timestamp: "2026-02-15T00:00:00.000Z",
      conversation_id: "c-1",
      event_type: "code_executed",
      user_input: "send to test@example.com",
      assistant_response: "Bearer test-secret-token-placeholder-0123456789",
      language: "python",
      code: "login('test@example.com')",
    });

    expect(entry.user_input).toBe("send to [REDACTED_EMAIL]");
    expect(entry.assistant_response).toContain("[REDACTED_TOKEN]");
    expect(entry.code).toBe("login('[REDACTED_EMAIL]')");
    expect(entry.language).toBe("python");
  });

  it("rotates the log by size and writes with owner-only permission", async () => {
    const logFile = path.join(tempDir, "pipeline-events.jsonl");
    process.env.PIPELINE_EVENT_LOG_FILE = logFile;
    process.env.PIPELINE_EVENT_LOG_MAX_BYTES = "120";

    await writePipelineEventLog({
      timestamp: "2026-02-15T00:00:00.000Z",
      conversation_id: "c-1",
      event_type: "turn_completed",
      model: "test-model",
      resolution_source: "default",
      user_input: "x".repeat(240),
      assistant_response: "ok",
      duration_ms: 10,
    });
    await writePipelineEventLog({
      timestamp: "2026-02-15T00:00:01.000Z",
      conversation_id: "c-1",
      event_type: "turn_completed",
      model: "test-model",
      resolution_source: "default",
      user_input: "second",
      assistant_response: "ok",
      duration_ms: 10,
    });

    const files = await fsp.readdir(tempDir);
    const rotated = files.filter((f) => f.startsWith("pipeline-events.jsonl."));
    expect(rotated).toHaveLength(1);

    const current = await fsp.readFile(logFile, "utf-8");
    expect(current.trim().split("\n")).toHaveLength(1);
    expect(current).toContain('"user_input":"second"');

    const stat = await fsp.stat(logFile);
    expect(stat.mode & 0o777).toBe(0o600);
  });

  it("writes to the default file name inside PIPELINE_EVENT_LOG_DIR", async () => {
    process.env.PIPELINE_EVENT_LOG_DIR = path.join(tempDir, "nested");

    await writePipelineEventLog({
      timestamp: "2026-02-15T00:00:00.000Z",
      conversation_id: "c-2",
      event_type: "transcript_reset",
    });

    const current = await fsp.readFile(
      path.join(tempDir, "nested", "pipeline-events.jsonl"),
      "utf-8",
    );
    expect(JSON.parse(current)).toEqual({
      timestamp: "2026-02-15T00:00:00.000Z",
      conversation_id: "c-2",
      event_type: "transcript_reset",
    });
  });

  it("prefers PIPELINE_EVENT_LOG_FILE over PIPELINE_EVENT_LOG_DIR", async () => {
    const logFile = path.join(tempDir, "custom.jsonl");
    process.env.PIPELINE_EVENT_LOG_DIR = path.join(tempDir, "unused");
    process.env.PIPELINE_EVENT_LOG_FILE = logFile;

    await writePipelineEventLog({
      timestamp: "2026-02-15T00:00:00.000Z",
      conversation_id: "c-3",
      event_type: "code_declined",
      language: "sh",
      code: "echo test@example.com",
    });

    expect(await fsp.readdir(tempDir)).toEqual(["custom.jsonl"]);
    expect(JSON.parse(await fsp.readFile(logFile, "utf-8"))).toEqual({
      timestamp: "2026-02-15T00:00:00.000Z",
      conversation_id: "c-3",
      event_type: "code_declined",
      language: "sh",
      code: "echo [REDACTED_EMAIL]",
    });
  });
});
