/**
 * Send Worker Entrypoint
 *
 * Consumes notification send jobs from NATS and delivers them through the
 * channel API, one invocation per message.
 *
 * Responsibilities:
 * - Consume notify.send (send-worker consumer)
 * - Global throttle admission via Dragonfly
 * - Conversation resolution and send with in-call retries
 * - Result records in PostgreSQL
 * - Relay delayed jobs back onto notify.send (optional)
 * - Move exhausted messages to notify.deadletter (optional)
 *
 * Stateless between messages - scale by adding replicas.
 */

import type { FastifyInstance } from "fastify";
import type { Redis } from "ioredis";
import {
  config,
  log,
  initNats,
  createHealthServer,
  withTimeout,
  createShutdownHandler,
  printBanner,
} from "./shared.js";
import { connectDatabase } from "../db.js";
import { createRedisClient, redisHealthCheck } from "../redis.js";
import { toError } from "../logger.js";
import { HttpChannelClient } from "../channel/channel-client.js";
import { Consumers, type NatsClient } from "../nats/client.js";
import { NatsMessageSource } from "../nats/message-source.js";
import { SendWorker } from "../nats/send-worker.js";
import { DelayRelay } from "../nats/delay-relay.js";
import { DeadLetterMonitor, JetStreamMessageStore } from "../nats/dead-letter-monitor.js";
import { RedisGlobalThrottleStore } from "../throttle/global-throttle-store.js";
import { AdmissionGate } from "../throttle/admission-gate.js";
import { DelaySendingService } from "../services/delay-requeuer.js";
import { DrizzleResultRecorder } from "../services/result-recorder.js";
import {
  CachedNotificationContentSource,
  DrizzleNotificationContentSource,
} from "../services/notification-content.js";
import { ConversationParamsResolver } from "../services/params-resolver.js";
import { ChannelSender } from "../services/sender.js";
import { SendOrchestrator } from "../services/send-orchestrator.js";

const SERVICE_NAME = "send-worker";

// Global instances
let natsClient: NatsClient | undefined;
let redis: Redis | undefined;
let closeDatabase: (() => Promise<void>) | undefined;
let worker: SendWorker | undefined;
let delayRelay: DelayRelay | undefined;
let deadLetterMonitor: DeadLetterMonitor | undefined;
let app: FastifyInstance | undefined;

/**
 * A background loop that stops on its own has crashed; the process is
 * restarted by its supervisor.
 */
function superviseLoop(name: string, loop: Promise<void>): void {
  void loop.catch((error: unknown) => {
    log.system.error({ component: name, error: toError(error).message }, "background loop crashed");
    process.exit(1);
  });
}

async function start(): Promise<void> {
  log.system.info({ service: SERVICE_NAME }, "starting");

  const nats = await initNats();
  natsClient = nats.natsClient;
  const queueService = nats.queueService;

  const redisClient = createRedisClient();
  await redisClient.connect();
  redis = redisClient;

  const database = connectDatabase();
  closeDatabase = database.close;

  const throttleStore = new RedisGlobalThrottleStore(redisClient);
  const resultRecorder = new DrizzleResultRecorder(database.db);
  const delayRequeuer = new DelaySendingService(throttleStore, queueService);
  const channel = new HttpChannelClient({
    token: config.CHANNEL_API_TOKEN,
    timeoutMs: config.CHANNEL_REQUEST_TIMEOUT_MS,
  });

  const orchestrator = new SendOrchestrator(
    {
      admissionGate: new AdmissionGate(throttleStore),
      sendQueue: queueService,
      paramsResolver: new ConversationParamsResolver(
        {
          contentSource: new CachedNotificationContentSource(
            new DrizzleNotificationContentSource(database.db),
            redisClient
          ),
          channel,
          delayRequeuer,
          resultRecorder,
        },
        {
          maxNumberOfAttempts: config.MAX_NUMBER_OF_ATTEMPTS,
          sendRetryDelaySeconds: config.SEND_RETRY_DELAY_SECONDS,
        }
      ),
      sender: new ChannelSender(channel),
      delayRequeuer,
      resultRecorder,
    },
    {
      maxNumberOfAttempts: config.MAX_NUMBER_OF_ATTEMPTS,
      sendRetryDelaySeconds: config.SEND_RETRY_DELAY_SECONDS,
    }
  );

  worker = new SendWorker(
    new NatsMessageSource(natsClient, Consumers.sendWorker, config.MAX_CONCURRENT_MESSAGES),
    orchestrator,
    { maxInFlight: config.MAX_CONCURRENT_MESSAGES }
  );
  superviseLoop("SendWorker", worker.start());

  if (config.DELAY_RELAY_ENABLED) {
    delayRelay = new DelayRelay(
      new NatsMessageSource(natsClient, Consumers.delayRelay, config.MAX_CONCURRENT_MESSAGES),
      queueService
    );
    superviseLoop("DelayRelay", delayRelay.start(config.MAX_CONCURRENT_MESSAGES));
  }

  if (config.DEAD_LETTER_MONITOR_ENABLED) {
    deadLetterMonitor = new DeadLetterMonitor(
      new JetStreamMessageStore(natsClient.getJetStreamManager()),
      queueService
    );
    superviseLoop("DeadLetterMonitor", deadLetterMonitor.start(natsClient));
  }

  const nc = natsClient;
  app = createHealthServer(SERVICE_NAME, {
    nats: () => nc.healthCheck(),
    dragonfly: () => redisHealthCheck(redisClient),
  });
  await app.listen({ port: config.PORT, host: "0.0.0.0" });

  log.system.info(
    {
      service: SERVICE_NAME,
      port: config.PORT,
      delayRelay: config.DELAY_RELAY_ENABLED,
      deadLetterMonitor: config.DEAD_LETTER_MONITOR_ENABLED,
    },
    "send-worker started"
  );

  printBanner("Send Worker", {
    NATS: config.NATS_CLUSTER,
    "Max attempts": config.MAX_NUMBER_OF_ATTEMPTS,
    "Retry delay (s)": config.SEND_RETRY_DELAY_SECONDS,
  });
}

async function shutdown(): Promise<void> {
  if (app) await withTimeout(app.close(), 2000, "Fastify");

  // Drain consumers (wait for in-flight invocations)
  if (worker) await withTimeout(worker.stop(), 15000, "SendWorker");
  if (delayRelay) await withTimeout(delayRelay.stop(), 5000, "DelayRelay");
  if (deadLetterMonitor) await withTimeout(deadLetterMonitor.stop(), 2000, "DeadLetterMonitor");

  // Close connections
  if (natsClient) await withTimeout(natsClient.close(), 2000, "NATS");
  if (redis) await withTimeout(redis.quit(), 2000, "Dragonfly");
  if (closeDatabase) await withTimeout(closeDatabase(), 5000, "PostgreSQL");
}

createShutdownHandler(SERVICE_NAME, shutdown);

start().catch((error: unknown) => {
  log.system.error({ error: toError(error).message }, "send-worker startup failed");
  process.exit(1);
});
