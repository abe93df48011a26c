// src/generation/registry.ts
import type { Config, ProviderConfig, ProviderKind } from '../config';
import { UnknownModelError, UnknownProviderError } from '../errors';
import type { FetchLike } from '../embeddings/provider';
import type { Logger } from '../logger';
import type { ProcessRunner } from '../process/runner';
import { CliGenerationProvider } from './cli';
import { CLI_TOOLS } from './cliTools';
import { OllamaGenerationProvider } from './ollama';
import type { GenerationProvider } from './provider';

export interface ResolvedProvider {
  provider: GenerationProvider;
  name: ProviderKind;
  model: string;
  timeoutMs: number;
}

export interface ProviderListing {
  providers: Array<{ name: string; kind: ProviderKind; default_model: string; models: string[] }>;
  default_provider: string;
}

export interface ProviderDeps {
  runner: Pick<ProcessRunner, 'run'>;
  logger: Logger;
  fetch?: FetchLike;
}

export function createProvider(config: ProviderConfig, deps: ProviderDeps): GenerationProvider {
  const logger = deps.logger.child({ provider: config.name });
  switch (config.kind) {
    case 'ollama':
      return new OllamaGenerationProvider({ name: config.name, host: config.host, logger, fetch: deps.fetch });
    case 'claude_code':
    case 'gemini_cli':
    case 'codex':
      return new CliGenerationProvider({
        name: config.name,
        executable: config.executable,
        tool: CLI_TOOLS[config.kind],
        runner: deps.runner,
        logger,
      });
  }
}

interface Entry {
  config: ProviderConfig;
  provider: GenerationProvider;
}

/**
 * The configured providers, built once. Requests name a provider (or take the
 * default); an unknown name is an error, never a silent fallback.
 */
export class ProviderRegistry {
  readonly defaultProvider: ProviderKind;
  private readonly entries = new Map<string, Entry>();

  constructor(generation: Config['generation'], deps: ProviderDeps) {
    for (const config of generation.providers) {
      this.entries.set(config.name, { config, provider: createProvider(config, deps) });
    }
    this.defaultProvider = generation.defaultProvider;
  }

  get names(): string[] {
    return [...this.entries.keys()];
  }

  resolve(providerName?: string, modelName?: string): ResolvedProvider {
    const name = providerName?.trim() || this.defaultProvider;
    const entry = this.entries.get(name);
    if (!entry) throw new UnknownProviderError(name, this.names);

    const { config, provider } = entry;
    const model = modelName?.trim() || config.defaultModel;
    if (config.models.length > 0 && !config.models.includes(model)) {
      throw new UnknownModelError(config.name, model, config.models);
    }
    return { provider, name: config.name, model, timeoutMs: config.timeoutMs };
  }

  describe(): ProviderListing {
    return {
      providers: [...this.entries.values()].map(({ config }) => ({
        name: config.name,
        kind: config.kind,
        default_model: config.defaultModel,
        models: config.models,
      })),
      default_provider: this.defaultProvider,
    };
  }
}
