import { GenerationCancelled, ProviderOutputError, ProviderTimeout, ProviderUnavailable } from '../errors';
import type { Logger } from '../logger';
import type { ProcessRunner } from '../process/runner';
import type { CliTool } from './cliTools';
import type { GenerateOptions, GenerationProvider } from './provider';

const STDERR_TAIL = 500;

export interface CliGenerationOptions {
  name: string;
  executable: string;
  tool: CliTool;
  runner: Pick<ProcessRunner, 'run'>;
  logger: Logger;
}

/** Generation through a local command-line assistant, one process per call. */
export class CliGenerationProvider implements GenerationProvider {
  readonly name: string;
  private readonly executable: string;
  private readonly tool: CliTool;
  private readonly runner: Pick<ProcessRunner, 'run'>;
  private readonly logger: Logger;

  constructor(options: CliGenerationOptions) {
    this.name = options.name;
    this.executable = options.executable;
    this.tool = options.tool;
    this.runner = options.runner;
    this.logger = options.logger;
  }

  get kind() {
    return this.tool.kind;
  }

  async generate(prompt: string, model: string, { timeoutMs, signal }: GenerateOptions): Promise<string> {
    if (signal?.aborted) throw new GenerationCancelled();

    const { args, input } = this.tool.invocation(prompt, model);
    const result = await this.runner.run({ executable: this.executable, args, input, timeoutMs, signal });

    switch (result.status) {
      case 'spawn_failed':
        throw new ProviderUnavailable(this.name, `could not start '${this.executable}': ${result.error}`);
      case 'timed_out':
        throw new ProviderTimeout(this.name, timeoutMs);
      case 'cancelled':
        throw new GenerationCancelled();
      case 'overflow':
        throw new ProviderOutputError(this.name, 'output exceeded the capture limit');
      case 'exited':
        break;
    }

    const parsed = this.tool.parse(result.stdout);
    if (result.exitCode === 0) {
      if (!parsed.ok) throw new ProviderOutputError(this.name, parsed.reason);
      this.logger.debug({ provider: this.name, model, ms: result.durationMs, chars: parsed.text.length }, 'Generation complete');
      return parsed.text;
    }

    // after a failed exit only the tool's structured answer counts; raw stdout is usually its error text
    if (parsed.ok && parsed.framed) {
      this.logger.warn(
        { provider: this.name, exitCode: result.exitCode, exitSignal: result.exitSignal },
        'Tool exited abnormally but produced an answer',
      );
      return parsed.text;
    }

    const how = result.exitCode === null ? `was killed by ${result.exitSignal ?? 'a signal'}` : `exited with code ${result.exitCode}`;
    const stderr = result.stderr.trim().slice(-STDERR_TAIL);
    throw new ProviderUnavailable(this.name, stderr ? `${this.executable} ${how}: ${stderr}` : `${this.executable} ${how}`);
  }
}
