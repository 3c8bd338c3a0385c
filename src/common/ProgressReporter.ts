export type PipelineState =
  | 'Collecting'
  | 'Classifying'
  | 'Extracting'
  | 'Validating'
  | 'Analyzing'
  | 'Composing'
  | 'Checkpointing'
  | 'Done'
  | 'Failed';

export type StageName = 'collect' | 'classify' | 'extract' | 'validate' | 'analyze' | 'compose' | 'checkpoint';

export type ItemOutcome = 'passed' | 'dropped' | 'defaulted' | 'overridden';

export type PipelineEvent =
  | { type: 'state'; state: PipelineState }
  | { type: 'stage-started'; stage: StageName; inputCount: number }
  | { type: 'stage-completed'; stage: StageName; outputCount: number }
  | {
      type: 'source-page';
      source: string;
      keyword: string;
      page: number;
      today: number;
      yesterday: number;
      older: number;
    }
  | { type: 'source-stopped'; source: string; keyword: string; page: number; reason: string }
  | { type: 'dedup'; stage: StageName; before: number; after: number; method: 'embedding' | 'fingerprint' }
  | {
      type: 'item';
      stage: StageName;
      index: number;
      total: number;
      title: string;
      outcome: ItemOutcome;
      detail?: string;
    }
  | { type: 'rate-limit-wait'; waitMs: number }
  | { type: 'warning'; stage?: StageName; message: string };

/** Observer handed to every stage; stages publish typed events instead of printing. */
export interface ProgressReporter {
  report(event: PipelineEvent): void;
}

export const silentReporter: ProgressReporter = { report: () => undefined };

const OUTCOME_MARK: Record<ItemOutcome, string> = {
  passed: '✅',
  dropped: '❌',
  defaulted: '⚠️',
  overridden: '⚖️',
};

export class ConsoleProgressReporter implements ProgressReporter {
  public report(event: PipelineEvent): void {
    switch (event.type) {
      case 'state':
        console.log(`[pipeline] → ${event.state}`);
        break;
      case 'stage-started':
        console.log('— — —');
        console.log(`[${event.stage}] start (${event.inputCount} in)`);
        break;
      case 'stage-completed':
        console.log(`[${event.stage}] done (${event.outputCount} out)`);
        break;
      case 'source-page':
        console.log(
          `[collect] ${event.source} "${event.keyword}" page ${event.page}: today=${event.today}, yesterday=${event.yesterday}, older=${event.older}`
        );
        break;
      case 'source-stopped':
        console.log(`[collect] ${event.source} "${event.keyword}" stopped at page ${event.page}: ${event.reason}`);
        break;
      case 'dedup':
        console.log(`[${event.stage}] dedup (${event.method}): ${event.before} → ${event.after}`);
        break;
      case 'item':
        console.log(
          `[${event.stage}] [${event.index}/${event.total}] ${OUTCOME_MARK[event.outcome]} ${event.title.slice(0, 50)}${
            event.detail ? ` - ${event.detail}` : ''
          }`
        );
        break;
      case 'rate-limit-wait':
        console.log(`[rate-limit] waiting ${(event.waitMs / 1000).toFixed(1)}s to stay under quota`);
        break;
      case 'warning':
        console.warn(`[${event.stage ?? 'pipeline'}] ${event.message}`);
        break;
    }
  }
}
