import { CategoryClassifier } from '../classifiers/CategoryClassifier';
import { Collector } from '../collectors/Collector';
import { ContextAnalyzer } from '../analyzers/ContextAnalyzer';
import { ValueValidator } from '../analyzers/ValueValidator';
import { PipelineAbortedError } from '../common/errors';
import { PipelineState, ProgressReporter, silentReporter, StageName } from '../common/ProgressReporter';
import { ContentExtractor } from '../extractors/ContentExtractor';
import { OutputComposer } from '../output/OutputComposer';
import { PartnerIndex } from '../output/PartnerIndex';
import { CheckpointStore } from '../storage/CheckpointStore';
import { Article, CheckpointRecord, DayWindow, ImpactAnalysis, OutputMessage, PartnerEntry, StatsSnapshot } from '../types';
import { PipelineStats } from './PipelineStats';

export interface PipelineStages {
  collector: Collector;
  classifier: CategoryClassifier;
  extractor: ContentExtractor;
  validator: ValueValidator;
  analyzer: ContextAnalyzer;
  composer: OutputComposer;
  partners: PartnerIndex;
  checkpoints: CheckpointStore;
}

export interface PipelineRunResult {
  dateKey: string;
  analyses: ImpactAnalysis[];
  messages: OutputMessage[];
  partners: PartnerEntry[];
  stats: StatsSnapshot;
  /** Stage whose empty output ended the run early. */
  shortCircuitedAt?: StageName;
  checkpointKey?: string;
}

/** Embeddings are rebuilt on demand and are not worth persisting. */
export function withoutEmbedding(article: Article): Article {
  const { embedding: _embedding, ...rest } = article;
  return rest;
}

/**
 * Runs the stages strictly in sequence. An empty stage output ends the run in
 * `Done` with partial stats; any thrown error ends it in `Failed` and is rethrown.
 */
export class PipelineOrchestrator {
  private current: PipelineState | 'Idle' = 'Idle';
  private stats?: PipelineStats;

  constructor(
    private readonly stages: PipelineStages,
    private readonly reporter: ProgressReporter = silentReporter,
    private readonly now: () => number = Date.now
  ) {}

  public get state(): PipelineState | 'Idle' {
    return this.current;
  }

  /** Counters of the latest run, including a failed one. */
  public get lastStats(): StatsSnapshot | undefined {
    return this.stats?.snapshot();
  }

  public async run(window: DayWindow, dateKey: string, signal?: AbortSignal): Promise<PipelineRunResult> {
    const stats = new PipelineStats(this.now);
    this.stats = stats;
    const { collector, classifier, extractor, validator, analyzer, composer, partners, checkpoints } = this.stages;
    const empty = (stage: StageName): PipelineRunResult => {
      this.reporter.report({ type: 'warning', stage, message: `No items left after ${stage}; skipping remaining stages` });
      this.transition('Done');
      return { dateKey, analyses: [], messages: [], partners: [], stats: stats.finish(), shortCircuitedAt: stage };
    };

    try {
      this.enter('Collecting', signal);
      this.reporter.report({ type: 'stage-started', stage: 'collect', inputCount: 0 });
      const { collected, deduplicated } = await collector.run(window, signal);
      stats.record('collected', collected.length);
      stats.record('afterDedup1', deduplicated.length);
      this.completed('collect', deduplicated.length);
      if (!deduplicated.length) return empty('collect');

      this.enter('Classifying', signal);
      this.reporter.report({ type: 'stage-started', stage: 'classify', inputCount: deduplicated.length });
      const classified = await classifier.filter(deduplicated, signal);
      stats.record('afterFilter', classified.length);
      this.completed('classify', classified.length);
      if (!classified.length) return empty('classify');

      this.enter('Extracting', signal);
      this.reporter.report({ type: 'stage-started', stage: 'extract', inputCount: classified.length });
      const extracted = await extractor.run(classified, signal);
      stats.record('afterDedup2', extracted.length);
      stats.record('regulatoryFound', extracted.filter((v) => v.isRegulatory).length);
      this.completed('extract', extracted.length);
      if (!extracted.length) return empty('extract');

      this.enter('Validating', signal);
      this.reporter.report({ type: 'stage-started', stage: 'validate', inputCount: extracted.length });
      const valued = await validator.validate(extracted, signal);
      stats.record('afterValidation', valued.length);
      this.completed('validate', valued.length);
      if (!valued.length) return empty('validate');

      this.enter('Analyzing', signal);
      this.reporter.report({ type: 'stage-started', stage: 'analyze', inputCount: valued.length });
      const analyses = await analyzer.analyzeAll(valued, signal);
      this.completed('analyze', analyses.length);
      if (!analyses.length) return empty('analyze');

      this.enter('Composing', signal);
      this.reporter.report({ type: 'stage-started', stage: 'compose', inputCount: analyses.length });
      const messages = await composer.compose(analyses, signal);
      const partnerEntries = await partners.build(analyses, signal);
      stats.record('final', messages.length);
      stats.record('regulatoryRetained', analyses.filter((a) => a.isRegulatory).length);
      this.completed('compose', messages.length);
      if (!messages.length) return empty('compose');

      this.enter('Checkpointing', signal);
      this.reporter.report({ type: 'stage-started', stage: 'checkpoint', inputCount: messages.length });
      const snapshot = stats.finish();
      const storedAnalyses = analyses.map((a) => ({ ...a, article: withoutEmbedding(a.article) }));
      const record: CheckpointRecord = {
        dateKey,
        collectedAt: new Date(this.now()).toISOString(),
        analyses: storedAnalyses,
        messages,
        partners: partnerEntries,
        stats: snapshot,
      };
      const checkpointKey = await checkpoints.write(record);
      this.completed('checkpoint', 1);

      if (!stats.regulatoryInvariantHolds) {
        this.reporter.report({
          type: 'warning',
          message: `Regulatory retention violated: ${snapshot.regulatoryRetained}/${snapshot.regulatoryFound} retained`,
        });
      }
      this.transition('Done');
      return { dateKey, analyses: storedAnalyses, messages, partners: partnerEntries, stats: snapshot, checkpointKey };
    } catch (error) {
      stats.finish();
      this.transition('Failed');
      throw error;
    }
  }

  private enter(state: PipelineState, signal?: AbortSignal): void {
    if (signal?.aborted) throw new PipelineAbortedError();
    this.transition(state);
  }

  private transition(state: PipelineState): void {
    this.current = state;
    this.reporter.report({ type: 'state', state });
  }

  private completed(stage: StageName, outputCount: number): void {
    this.reporter.report({ type: 'stage-completed', stage, outputCount });
  }
}
