import {
  ModelResolutionResult,
  resolveModelByPriority,
} from "../../domain/model-endpoint/services/model-resolution-policy";
import { ConfigPort } from "../../ports/outbound/config.port";

export interface ResolveModelInput {
  cliModel?: string;
}

export class ResolveModelUseCase {
  constructor(private readonly config: ConfigPort) {}

  async execute(input: ResolveModelInput): Promise<ModelResolutionResult> {
    const defaultModel = await this.config.getDefaultModel();
    return resolveModelByPriority({
      cliModel: input.cliModel,
      defaultModel,
    });
  }
}
