import { Queue, Worker } from "bullmq";
import type { Job } from "bullmq";

import { env } from "../config/env.js";
import { logger } from "../infrastructure/logger.js";
import { getRedis } from "../infrastructure/redis.js";

export const queueNames = {
  classifyTransactions: "classify_transactions",
  runPayroll: "run_payroll",
  calculateSalesTax: "calculate_sales_tax",
  rulesetUpdateCheck: "ruleset_update_check"
} as const;

export type QueueName = (typeof queueNames)[keyof typeof queueNames];

export const RULESET_CHECK_INTERVAL_MS = 1000 * 60 * 60 * 24;

export function createQueue(name: QueueName) {
  return new Queue(name, {
    connection: getRedis(),
    defaultJobOptions: {
      attempts: 3,
      backoff: { type: "exponential", delay: 5000 },
      removeOnComplete: 100,
      removeOnFail: 500
    }
  });
}

export function createWorker(name: QueueName, processor: (job: Job<unknown>) => Promise<unknown>) {
  const worker = new Worker<unknown>(name, processor, {
    connection: getRedis()
  });

  worker.on("completed", (job) => {
    logger.info({ jobId: job.id, queue: name }, "worker job completed");
  });

  worker.on("failed", (job, error) => {
    logger.error({ jobId: job?.id, queue: name, err: error }, "worker job failed");
  });

  return worker;
}

export function schedulerEnabled() {
  return env.NODE_ENV !== "test";
}
