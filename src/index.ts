import dotenv from "dotenv";
import { createApp } from "./app.js";
import { createGenerativeCapability } from "./capability.js";
import { loadConfig } from "./config.js";
import { GenerationLimiter } from "./limiter.js";
import { createLogger } from "./logger.js";
import { createStageHost } from "./pipeline/stages.js";

dotenv.config();

const config = loadConfig();
const logger = createLogger(config.logLevel);

const limiter = new GenerationLimiter({ concurrency: config.maxConcurrentGenerations });
const capability = createGenerativeCapability(config, limiter, logger);
const host = createStageHost({ logger, capability, stageBaseUrl: config.stageBaseUrl });

if (config.stageBaseUrl) logger.info("Stages are invoked over HTTP", { baseUrl: config.stageBaseUrl });

const app = createApp({ config, host, logger });
app.listen(config.port, () => {
  logger.info(`server listening on http://localhost:${config.port}`, { mode: config.pipelineMode });
});
