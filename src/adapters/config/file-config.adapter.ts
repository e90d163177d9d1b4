import * as fs from "fs";
import { promises as fsp } from "fs";
import * as os from "os";
import * as path from "path";
import {
  ConfigPort,
  normalizePipelineSettings,
  PipelineSettings,
} from "../../ports/outbound/config.port";
import { logger } from "../../utils/logger";

interface StoredConfig extends Partial<PipelineSettings> {
  defaultModel?: string;
}

export const DEFAULT_MODEL = "qwen2.5-coder";

export function resolveConfigDir(): string {
  const configured = process.env.FENCE_AGENT_CONFIG_DIR?.trim();
  if (configured) {
    return configured;
  }
  return path.join(os.homedir(), ".fence-stream-agent");
}

function parseBooleanEnv(value: string | undefined): boolean | undefined {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) {
    return undefined;
  }
  if (["1", "true", "on", "yes"].includes(normalized)) {
    return true;
  }
  if (["0", "false", "off", "no"].includes(normalized)) {
    return false;
  }
  return undefined;
}

function parseNumberEnv(value: string | undefined): number | undefined {
  if (!value?.trim()) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export class FileConfigAdapter implements ConfigPort {
  constructor(
    private readonly fallbackModel: string = DEFAULT_MODEL,
    private readonly configDir: string = resolveConfigDir(),
  ) {}

  get configFile(): string {
    return path.join(this.configDir, "config.json");
  }

  async getDefaultModel(): Promise<string> {
    const envModel = process.env.DEFAULT_MODEL?.trim();
    if (envModel) {
      return envModel;
    }

    const data = await this.readConfig();
    const configured =
      typeof data.defaultModel === "string" ? data.defaultModel.trim() : "";
    return configured || this.fallbackModel;
  }

  async setDefaultModel(model: string): Promise<void> {
    const current = await this.readConfig();
    const next: StoredConfig = {
      ...current,
      defaultModel: model,
    };

    await fsp.mkdir(this.configDir, { recursive: true });
    await fsp.writeFile(this.configFile, JSON.stringify(next, null, 2), "utf-8");
  }

  async getPipelineSettings(): Promise<Readonly<PipelineSettings>> {
    const stored = await this.readConfig();
    const overrides = {
      autoRun: parseBooleanEnv(process.env.FENCE_AGENT_AUTO_RUN),
      osMode: parseBooleanEnv(process.env.FENCE_AGENT_OS_MODE),
      maxOutputChars: parseNumberEnv(process.env.FENCE_AGENT_MAX_OUTPUT),
    };

    return normalizePipelineSettings({
      ...stored,
      ...Object.fromEntries(
        Object.entries(overrides).filter(([, value]) => value !== undefined),
      ),
    });
  }

  private async readConfig(): Promise<StoredConfig> {
    try {
      if (!fs.existsSync(this.configFile)) {
        return {};
      }

      const raw = await fsp.readFile(this.configFile, "utf-8");
      const parsed = JSON.parse(raw) as unknown;
      if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
        return {};
      }
      return parsed as StoredConfig;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return {};
      }
      await logger.error(
        `Failed to read config file ${this.configFile}: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
      return {};
    }
  }
}
