import { promises as fsp } from "fs";
import * as path from "path";
import { ModelResolutionSource } from "../../shared/types/chat";
import { resolveAppLogDir } from "../../utils/logger";

export interface PipelineEventLogEntry {
  timestamp: string;
  conversation_id: string;
  event_type:
    | "turn_completed"
    | "turn_failed"
    | "turn_cancelled"
    | "code_executed"
    | "code_declined"
    | "transcript_reset";
  model?: string;
  resolution_source?: ModelResolutionSource;
  user_input?: string;
  assistant_response?: string;
  language?: string;
  code?: string;
  message_count?: number;
  duration_ms?: number;
  error_message?: string;
}

export type PipelineEventLogger = (entry: PipelineEventLogEntry) => Promise<void>;

const MASKED_FIELDS = ["user_input", "assistant_response", "code"] as const;

const MASKS: ReadonlyArray<readonly [RegExp, string]> = [
  [/[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/gi, "[REDACTED_EMAIL]"],
  [/\b(?:sk|pk)-[A-Za-z0-9_-]{16,}\b/g, "[REDACTED_KEY]"],
  [/\b(?:Bearer\s+)?[A-Za-z0-9._-]{32,}\b/g, "[REDACTED_TOKEN]"],
  [/\b(?:\d[ -]?){13,19}\b/g, "[REDACTED_NUMBER]"],
];

interface LogTarget {
  file: string;
  maxBytes: number;
}

/** PIPELINE_EVENT_LOG_FILE wins over PIPELINE_EVENT_LOG_DIR. */
function resolveLogTarget(): LogTarget {
  const dir = process.env.PIPELINE_EVENT_LOG_DIR?.trim() || resolveAppLogDir();
  const file =
    process.env.PIPELINE_EVENT_LOG_FILE?.trim() ||
    path.join(dir, "pipeline-events.jsonl");
  const maxBytes = Number(process.env.PIPELINE_EVENT_LOG_MAX_BYTES);

  return {
    file,
    maxBytes: Number.isFinite(maxBytes) && maxBytes > 0 ? maxBytes : 1024 * 1024,
  };
}

export function maskSensitiveText(text: string): string {
  return MASKS.reduce((masked, [pattern, label]) => masked.replace(pattern, label), text);
}

export function sanitizePipelineEventLogEntry(
  entry: PipelineEventLogEntry,
): PipelineEventLogEntry {
  const sanitized = { ...entry };
  for (const field of MASKED_FIELDS) {
    const value = sanitized[field];
    if (value) {
      sanitized[field] = maskSensitiveText(value);
    }
  }
  return sanitized;
}

async function fileSize(file: string): Promise<number> {
  try {
    return (await fsp.stat(file)).size;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return 0;
    }
    throw error;
  }
}

async function ownerOnly(file: string): Promise<void> {
  try {
    await fsp.chmod(file, 0o600);
  } catch (error) {
    // Filesystems without POSIX modes reject chmod.
    const code = (error as NodeJS.ErrnoException).code;
    if (code !== "EPERM" && code !== "ENOTSUP" && code !== "EINVAL") {
      throw error;
    }
  }
}

export const writePipelineEventLog: PipelineEventLogger = async (entry) => {
  const { file, maxBytes } = resolveLogTarget();
  await fsp.mkdir(path.dirname(file), { recursive: true });

  if ((await fileSize(file)) >= maxBytes) {
    const rotated = `${file}.${new Date().toISOString().replace(/[:.]/g, "-")}`;
    await fsp.rename(file, rotated);
    await ownerOnly(rotated);
  }

  await fsp.appendFile(
    file,
    `${JSON.stringify(sanitizePipelineEventLogEntry(entry))}\n`,
    { encoding: "utf-8", mode: 0o600 },
  );
  await ownerOnly(file);
};
