import express from "express";
import cors from "cors";
import { createCatalogRouter } from "./api/catalog.js";
import { loadConfig } from "./config.js";
import { createLogger } from "./services/logger.js";
import { createPipelineDeps, runEditionsPipeline } from "./services/runEditionsPipeline.js";
import { FileSnapshotStore } from "./services/snapshotStore.js";

const logger = createLogger("server");
const config = loadConfig();

const app = express();

app.use(cors());
app.use(express.json());

app.get("/health", (_req, res) => {
  res.json({ ok: true });
});

// Prompt, overrides and vocabulary are reloaded per run so edits apply without a restart
app.use(
  "/",
  createCatalogRouter({
    store: new FileSnapshotStore(config.outputDir),
    run: async options => runEditionsPipeline(await createPipelineDeps(config), options)
  })
);

app.listen(config.port, () => {
  logger.info(`Backend running on port ${config.port}`);
});
