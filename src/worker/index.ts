import { logger } from "../infrastructure/logger.js";
import { closeRedis } from "../infrastructure/redis.js";
import { createEngineContext } from "../services/context.js";
import {
  handleCalculateSalesTax,
  handleClassifyTransactions,
  handleRulesetUpdateCheck,
  handleRunPayroll
} from "./handlers.js";
import { RULESET_CHECK_INTERVAL_MS, createQueue, createWorker, queueNames, schedulerEnabled } from "./queues.js";

const context = createEngineContext();

const workers = [
  createWorker(queueNames.classifyTransactions, async (job) => handleClassifyTransactions(context, job.data)),
  createWorker(queueNames.runPayroll, async (job) => handleRunPayroll(context, job.data)),
  createWorker(queueNames.calculateSalesTax, async (job) => handleCalculateSalesTax(context, job.data)),
  createWorker(queueNames.rulesetUpdateCheck, async () => handleRulesetUpdateCheck(context))
];

if (schedulerEnabled()) {
  const rulesetQueue = createQueue(queueNames.rulesetUpdateCheck);
  await rulesetQueue.add(
    queueNames.rulesetUpdateCheck,
    {},
    { repeat: { every: RULESET_CHECK_INTERVAL_MS }, jobId: "ruleset-update-check" }
  );
  await rulesetQueue.close();
}

async function shutdown(signal: string) {
  logger.info({ signal }, "worker shutting down");
  await Promise.all(workers.map((worker) => worker.close()));
  await closeRedis();
  context.db.close();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, "worker shutdown failed");
        process.exit(1);
      }
    );
  });
}

logger.info("worker runtime started");
