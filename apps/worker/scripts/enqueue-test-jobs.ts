#!/usr/bin/env tsx

/**
 * Enqueue send jobs for one notification, e.g. against a local mock channel.
 *
 *   tsx scripts/enqueue-test-jobs.ts <notificationId> <serviceUrl> [count]
 */

import { NatsClient } from "../src/nats/client.js";
import { NatsQueueService } from "../src/nats/queue-service.js";
import { createTimer, toError } from "../src/logger.js";
import type { SendJob } from "../src/types/jobs.js";

const CHUNK_SIZE = 500;

function buildJobs(notificationId: string, serviceUrl: string, count: number): SendJob[] {
  const jobs: SendJob[] = [];
  for (let i = 0; i < count; i++) {
    jobs.push({
      notificationId,
      recipientId: `test-recipient-${i}`,
      recipientData: {
        recipientType: "user",
        serviceUrl,
        userId: `test-user-${i}`,
      },
    });
  }
  return jobs;
}

async function main(): Promise<void> {
  const [notificationId, serviceUrl, countArg] = process.argv.slice(2);
  if (!notificationId || !serviceUrl) {
    console.error("Usage: enqueue-test-jobs <notificationId> <serviceUrl> [count]");
    process.exit(1);
  }
  const count = countArg ? parseInt(countArg, 10) : 100;

  const natsClient = new NatsClient();
  await natsClient.connect();
  const queueService = new NatsQueueService(natsClient);

  const timer = createTimer();
  const jobs = buildJobs(notificationId, serviceUrl, count);

  for (let i = 0; i < jobs.length; i += CHUNK_SIZE) {
    await Promise.all(jobs.slice(i, i + CHUNK_SIZE).map((job) => queueService.enqueue(job)));
  }

  console.log(`✓ Queued ${jobs.length} jobs for ${notificationId} in ${timer()}`);
  await natsClient.close();
}

main().catch((error: unknown) => {
  console.error("Enqueue failed:", toError(error).message);
  process.exit(1);
});
