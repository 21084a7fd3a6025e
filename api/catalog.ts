import { Router, type Request, type Response } from "express";
import { z } from "zod";
import { describeAnomaly } from "../services/changelogService.js";
import type { ChangeSummary } from "../services/diffService.js";
import { PipelineError, errorMessage } from "../services/errors.js";
import { createLogger } from "../services/logger.js";
import type { PipelineOptions, PipelineOutcome } from "../services/runEditionsPipeline.js";
import type { SnapshotStore } from "../services/snapshotStore.js";

const logger = createLogger("api");

export interface CatalogRouterDeps {
  store: SnapshotStore;
  run: (options: PipelineOptions) => Promise<PipelineOutcome>;
}

const runRequestSchema = z
  .object({ skipExternalFetch: z.boolean().optional() })
  .default({});

export interface RunSummary {
  status: PipelineOutcome["status"];
  summary: ChangeSummary;
  locales?: number;
  attempts?: number;
  overridesApplied?: number;
  anomalies?: string[];
  failure?: { kind: string; message: string; attempts: number };
}

export function summarizeOutcome(outcome: PipelineOutcome): RunSummary {
  switch (outcome.status) {
    case "unchanged":
      return { status: outcome.status, summary: outcome.diff.summary };
    case "processed":
      return {
        status: outcome.status,
        summary: outcome.diff.summary,
        locales: Object.keys(outcome.catalog).length,
        attempts: outcome.attempts,
        overridesApplied: outcome.overrides.filter(o => o.status === "applied").length,
        anomalies: [...outcome.extractionAnomalies, ...outcome.rehydrationAnomalies].map(describeAnomaly)
      };
    case "normalization_failed":
      return {
        status: outcome.status,
        summary: outcome.diff.summary,
        failure: {
          kind: outcome.failure.kind,
          message: outcome.failure.message,
          attempts: outcome.failure.attempts
        }
      };
  }
}

export function createCatalogRouter(deps: CatalogRouterDeps): Router {
  const router = Router();
  let running = false;

  router.get("/catalog", async (_req: Request, res: Response) => {
    try {
      const text = await deps.store.readCatalog();
      if (text === null) {
        return res.status(404).json({ error: "No catalog has been generated yet" });
      }
      return res.type("application/json").send(text);
    } catch (err) {
      logger.error(`Catalog read failed: ${errorMessage(err)}`);
      return res.status(500).json({ error: "Internal error" });
    }
  });

  router.get("/changelog", async (_req: Request, res: Response) => {
    try {
      const text = await deps.store.readChangelog();
      if (text === null) {
        return res.status(404).json({ error: "No changelog has been generated yet" });
      }
      return res.type("text/markdown").send(text);
    } catch (err) {
      logger.error(`Changelog read failed: ${errorMessage(err)}`);
      return res.status(500).json({ error: "Internal error" });
    }
  });

  router.post("/runs", async (req: Request, res: Response) => {
    const body = runRequestSchema.safeParse(req.body ?? {});
    if (!body.success) {
      return res.status(400).json({ error: "Expected { skipExternalFetch?: boolean }" });
    }
    if (running) {
      return res.status(409).json({ error: "A run is already in progress" });
    }

    running = true;
    try {
      const outcome = await deps.run({ skipExternalFetch: body.data.skipExternalFetch });
      const status = outcome.status === "normalization_failed" ? 502 : 200;
      return res.status(status).json(summarizeOutcome(outcome));
    } catch (err) {
      logger.error(`Run failed: ${errorMessage(err)}`);
      if (err instanceof PipelineError) {
        return res.status(500).json({ error: { code: err.code, message: err.message } });
      }
      return res.status(500).json({ error: { code: "INTERNAL", message: errorMessage(err) } });
    } finally {
      running = false;
    }
  });

  return router;
}
