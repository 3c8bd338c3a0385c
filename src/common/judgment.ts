import { JudgmentService } from '../services/OpenAIService';
import { ProgressReporter, silentReporter } from './ProgressReporter';
import { RateLimiter } from './RateLimiter';

/** What every judgment-backed stage needs: the service, the shared limiter and a pool size. */
export interface JudgmentStageDeps {
  judge: JudgmentService;
  limiter: RateLimiter;
  concurrency: number;
  reporter?: ProgressReporter;
  temperature?: number;
}

export abstract class JudgmentStage {
  protected readonly reporter: ProgressReporter;

  constructor(protected readonly deps: JudgmentStageDeps) {
    this.reporter = deps.reporter ?? silentReporter;
  }

  /** One rate-limited judgment call. Rejects with `PipelineAbortedError` if aborted while queued. */
  protected async ask(prompt: string, signal?: AbortSignal): Promise<string> {
    await this.deps.limiter.admit(signal);
    return this.deps.judge.invoke(prompt, { temperature: this.deps.temperature });
  }
}
