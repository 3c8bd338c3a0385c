import { ContextAnalyzer } from "./analyzers/ContextAnalyzer";
import { ValueValidator } from "./analyzers/ValueValidator";
import { CategoryClassifier } from "./classifiers/CategoryClassifier";
import { Collector } from "./collectors/Collector";
import { JudgmentStageDeps } from "./common/judgment";
import { ProgressReporter } from "./common/ProgressReporter";
import { RateLimiter, workerPoolSize } from "./common/RateLimiter";
import { AppConfig } from "./config";
import { ContentExtractor } from "./extractors/ContentExtractor";
import { AxiosPageFetcher } from "./extractors/PageFetcher";
import { HttpClient } from "./fetchers/http";
import { NaverNewsFetcher } from "./fetchers/NaverNewsFetcher";
import { NewsApiFetcher } from "./fetchers/NewsApiFetcher";
import { NewsSource } from "./fetchers/NewsSource";
import { OutputComposer } from "./output/OutputComposer";
import { PartnerIndex } from "./output/PartnerIndex";
import { PipelineOrchestrator } from "./pipeline/PipelineOrchestrator";
import { OpenAIService } from "./services/OpenAIService";
import { SimilarityEngine } from "./services/SimilarityEngine";
import { AzureBlobObjectStore } from "./storage/AzureBlobObjectStore";
import { CheckpointStore } from "./storage/CheckpointStore";
import { FallbackCheckpointStore } from "./storage/FallbackCheckpointStore";
import { FileSystemObjectStore } from "./storage/FileSystemObjectStore";
import { ObjectCheckpointStore } from "./storage/ObjectCheckpointStore";

// Composition root: the only place that turns AppConfig into wired components.

export function createCheckpointStore(cfg: AppConfig, reporter: ProgressReporter): CheckpointStore {
  const local = new ObjectCheckpointStore(new FileSystemObjectStore(cfg.localCheckpointDir));
  if (!cfg.azureStorageConnectionString) {
    console.warn("[persist] AZURE_STORAGE_CONNECTION_STRING not set; using the local checkpoint directory only.");
    return local;
  }
  const cloud = new ObjectCheckpointStore(
    AzureBlobObjectStore.fromConnectionString(cfg.azureStorageConnectionString, cfg.checkpointContainer)
  );
  return new FallbackCheckpointStore(cloud, local, reporter);
}

export function createNewsSources(cfg: AppConfig): NewsSource[] {
  const sources: NewsSource[] = [];
  if (cfg.naverClientId && cfg.naverClientSecret) {
    sources.push(
      new NaverNewsFetcher(
        cfg.naverClientId,
        cfg.naverClientSecret,
        cfg,
        new HttpClient({ label: "Naver", allowInsecureTls: cfg.allowInsecureTls })
      )
    );
  }
  if (cfg.newsApiKey) {
    sources.push(
      new NewsApiFetcher(cfg.newsApiKey, cfg, new HttpClient({ label: "NewsAPI", allowInsecureTls: cfg.allowInsecureTls }))
    );
  }
  return sources;
}

export function createPipeline(cfg: AppConfig, reporter: ProgressReporter): PipelineOrchestrator {
  const ai = new OpenAIService(cfg);
  const engine = new SimilarityEngine(ai, cfg.embeddingBatchSize);
  // One limiter for every judgment stage: the quota is per account, not per stage.
  const limiter = new RateLimiter(cfg.llmRequestsPerMinute, undefined, (waitMs) =>
    reporter.report({ type: "rate-limit-wait", waitMs })
  );
  const deps: JudgmentStageDeps = {
    judge: ai,
    limiter,
    concurrency: workerPoolSize(cfg.llmRequestsPerMinute),
    reporter,
    temperature: cfg.llmTemperature,
  };

  const sources = createNewsSources(cfg);
  if (!sources.length) {
    console.warn("[collect] No news source configured (NAVER_CLIENT_ID/SECRET or NEWS_API_KEY); nothing will be collected.");
  }

  return new PipelineOrchestrator(
    {
      collector: new Collector(
        sources,
        engine,
        {
          keywords: cfg.searchKeywords,
          threshold: cfg.firstDedupThreshold,
          minYesterdayTarget: cfg.minYesterdayTarget,
          olderStopThreshold: cfg.olderStopThreshold,
          leadSentences: cfg.leadSentences,
        },
        reporter
      ),
      classifier: new CategoryClassifier(deps),
      extractor: new ContentExtractor(
        new AxiosPageFetcher(),
        engine,
        {
          threshold: cfg.secondDedupThreshold,
          minLength: cfg.minExtractedLength,
          delayMs: cfg.extractionDelayMs,
        },
        reporter
      ),
      validator: new ValueValidator(deps, cfg.organizationProfile),
      analyzer: new ContextAnalyzer(deps, cfg.organizationProfile),
      composer: new OutputComposer({ ...deps, temperature: cfg.summaryTemperature }, cfg.organizationProfile),
      partners: new PartnerIndex(deps, cfg.organizationProfile),
      checkpoints: createCheckpointStore(cfg, reporter),
    },
    reporter
  );
}
