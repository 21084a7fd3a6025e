// services/runEditionsPipeline.ts
import {
  loadConfig,
  loadInstructions,
  loadVocabulary,
  requireGeminiApiKey,
  type AppConfig
} from "../config.js";
import type { FinalCatalog, RawSnapshot } from "../types.js";
import { buildNormalizationInput, type ExtractionAnomaly } from "./buildNormalizationInput.js";
import type { Vocabulary } from "./canonicalizeText.js";
import { describeAnomaly, describeOverride, renderChangelog } from "./changelogService.js";
import { compareWithPrior, type DiffResult } from "./diffService.js";
import { PipelineError, errorMessage } from "./errors.js";
import { createSourceFeed, type SourceFeed } from "./feedService.js";
import { createGeminiClient } from "./geminiClient.js";
import { createLogger, type Logger } from "./logger.js";
import {
  normalizeCatalog,
  type NormalizationClient,
  type NormalizationFailure
} from "./normalizeService.js";
import { applyOverrides, loadOverrideRules, type OverrideOutcome, type OverrideRule } from "./overrideService.js";
import { rehydrateCatalog, type RehydrationAnomaly } from "./rehydrateService.js";
import { FileSnapshotStore, type SnapshotStore } from "./snapshotStore.js";

export interface PipelineDeps {
  store: SnapshotStore;
  feed: SourceFeed;
  client: NormalizationClient;
  instructions: string;
  overrides: readonly OverrideRule[];
  vocabulary: Vocabulary;
  normalize?: {
    maxRetries?: number;
    retryDelayMs?: number;
    timeoutMs?: number;
    sleep?: (ms: number) => Promise<void>;
  };
  logger?: Logger;
}

export interface PipelineOptions {
  // Reprocess the previous snapshot instead of calling the feed
  skipExternalFetch?: boolean;
}

export type PipelineOutcome =
  | { status: "unchanged"; diff: DiffResult }
  | {
      status: "processed";
      diff: DiffResult;
      overrides: OverrideOutcome[];
      extractionAnomalies: ExtractionAnomaly[];
      rehydrationAnomalies: RehydrationAnomaly[];
      catalog: FinalCatalog;
      changelog: string;
      attempts: number;
    }
  | {
      status: "normalization_failed";
      diff: DiffResult;
      overrides: OverrideOutcome[];
      failure: NormalizationFailure;
    };

async function loadPriorForReprocess(store: SnapshotStore): Promise<RawSnapshot> {
  const prior = await store.readPrevious();
  switch (prior.status) {
    case "missing":
      throw new PipelineError({
        code: "PRIOR_SNAPSHOT_REQUIRED",
        message: "--skip-external-fetch needs a previous raw snapshot, none was found"
      });
    case "unreadable":
      throw new PipelineError({
        code: "PRIOR_SNAPSHOT_UNREADABLE",
        message: `Previous raw snapshot could not be read: ${prior.error}`
      });
    case "loaded":
      return prior.snapshot;
  }
}

/**
 * One run: fetch, diff, overrides, strip, normalize, rehydrate, commit.
 * Overrides apply after the diff, so stored snapshots always hold raw feed data.
 * Committed artifacts are only touched once a final catalog exists.
 */
export async function runEditionsPipeline(
  deps: PipelineDeps,
  options: PipelineOptions = {}
): Promise<PipelineOutcome> {
  const logger = deps.logger ?? createLogger("pipeline");
  const { store } = deps;

  let snapshot: RawSnapshot;
  let diff: DiffResult;
  let staged = false;

  // 1. FETCH + DIFF
  if (options.skipExternalFetch) {
    logger.info("Skipping external fetch, reprocessing previous raw snapshot");
    snapshot = await loadPriorForReprocess(store);
    diff = { changed: true, summary: { kind: "reprocess" } };
  } else {
    snapshot = await deps.feed.fetchAll();
    diff = compareWithPrior(snapshot, await store.readPrevious());

    if (!diff.changed) {
      logger.info("No changes detected in raw data, nothing to do");
      return { status: "unchanged", diff };
    }
    await store.stageCurrent(snapshot);
    staged = true;
  }
  logger.info(`Change summary: ${diff.summary.kind}`, diff.summary);

  try {
    // 2. OVERRIDES
    const patched = applyOverrides(snapshot, deps.overrides);
    for (const outcome of patched.report) {
      const line = describeOverride(outcome);
      if (outcome.status === "applied") logger.info(line);
      else logger.warn(line);
    }

    // 3. STRIP
    const input = buildNormalizationInput(patched.snapshot);
    input.anomalies.forEach(a => logger.warn(describeAnomaly(a)));

    // 4. NORMALIZE
    const normalized = await normalizeCatalog(input.payload, {
      client: deps.client,
      instructions: deps.instructions,
      ...deps.normalize,
      logger
    });
    if (!normalized.ok) {
      return {
        status: "normalization_failed",
        diff,
        overrides: patched.report,
        failure: normalized.failure
      };
    }

    // 5. REHYDRATE
    const { catalog, anomalies } = rehydrateCatalog(normalized.result, input.sideMaps, deps.vocabulary);
    anomalies.forEach(a => logger.warn(describeAnomaly(a)));

    const changelog = renderChangelog({
      summary: diff.summary,
      overrides: patched.report,
      anomalies: [...input.anomalies, ...anomalies]
    });

    // 6. COMMIT
    await store.publish({ catalog, changelog }, { promoteCurrent: staged });
    staged = false;
    logger.info(`Catalog written for ${Object.keys(catalog).length} locales`);

    return {
      status: "processed",
      diff,
      overrides: patched.report,
      extractionAnomalies: input.anomalies,
      rehydrationAnomalies: anomalies,
      catalog,
      changelog,
      attempts: normalized.attempts
    };
  } finally {
    if (staged) {
      try {
        await store.discardCurrent();
      } catch (err) {
        logger.error(`Could not discard the staged snapshot: ${errorMessage(err)}`);
      }
    }
  }
}

export async function createPipelineDeps(config: AppConfig = loadConfig()): Promise<PipelineDeps> {
  const [instructions, overrides, vocabulary] = await Promise.all([
    loadInstructions(config.promptFile),
    loadOverrideRules(config.overridesFile),
    loadVocabulary(config.vocabularyFile)
  ]);

  return {
    store: new FileSnapshotStore(config.outputDir),
    feed: createSourceFeed(config.feed),
    client: createGeminiClient({ apiKey: requireGeminiApiKey(config), model: config.geminiModel }),
    instructions,
    overrides,
    vocabulary,
    normalize: config.normalize
  };
}
