import {
  connect,
  NatsConnection,
  JetStreamClient,
  JetStreamManager,
  RetentionPolicy,
  StorageType,
  DiscardPolicy,
  AckPolicy,
  DeliverPolicy,
  ReplayPolicy,
  type ConnectionOptions,
  type ConsumerConfig,
  type TlsOptions,
} from "nats";
import { config } from "../config.js";
import { log } from "../logger.js";
import { readFileSync } from "node:fs";
import { calculateBackoff } from "../domain/utils/backoff.js";
import { MAX_DELIVERY_COUNT_FOR_DEAD_LETTER } from "../domain/fault-severity.js";

export const STREAM_NAME = "notifications";

export const Subjects = {
  send: "notify.send",
  delayed: "notify.delayed",
  deadLetter: "notify.deadletter",
} as const;

export const Consumers = {
  sendWorker: "send-worker",
  delayRelay: "delay-relay",
} as const;

/** Advisory the server publishes when a send-worker message runs out of deliveries */
export const MAX_DELIVERIES_ADVISORY = `$JS.EVENT.ADVISORY.CONSUMER.MAX_DELIVERIES.${STREAM_NAME}.${Consumers.sendWorker}`;

const NANOS_PER_MS = 1_000_000;

function isAlreadyInUse(error: unknown, what: "stream" | "consumer"): boolean {
  return error instanceof Error && error.message.includes(`${what} name already in use`);
}

export class NatsClient {
  private nc: NatsConnection | null = null;
  private js: JetStreamClient | null = null;
  private jsm: JetStreamManager | null = null;
  private isClosing = false;

  async connect(): Promise<void> {
    const servers = config.NATS_CLUSTER.split(",");
    const maxRetries = 10;

    const connectionOptions: ConnectionOptions = {
      servers,
      name: `worker-${config.WORKER_ID}`,
      reconnect: true,
      maxReconnectAttempts: -1,
      reconnectTimeWait: 2000,
      pingInterval: 30000,
      maxPingOut: 3,
    };

    if (config.NATS_TLS_ENABLED) {
      log.nats.info({}, "NATS TLS enabled");

      const tlsOptions: TlsOptions = {};

      if (config.NATS_TLS_CA_FILE) {
        tlsOptions.ca = readFileSync(config.NATS_TLS_CA_FILE, "utf-8");
        log.nats.debug({ caFile: config.NATS_TLS_CA_FILE }, "Loaded NATS CA certificate");
      }

      // Mutual TLS
      if (config.NATS_TLS_CERT_FILE && config.NATS_TLS_KEY_FILE) {
        tlsOptions.cert = readFileSync(config.NATS_TLS_CERT_FILE, "utf-8");
        tlsOptions.key = readFileSync(config.NATS_TLS_KEY_FILE, "utf-8");
        log.nats.debug({}, "Loaded NATS client certificate for mutual TLS");
      }

      connectionOptions.tls = tlsOptions;
    }

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      try {
        log.nats.info({ servers, attempt, maxRetries, tls: config.NATS_TLS_ENABLED }, "Connecting to NATS cluster");

        const nc = await connect(connectionOptions);
        this.nc = nc;
        this.js = nc.jetstream();
        const jsm = await nc.jetstreamManager();
        this.jsm = jsm;

        void nc.closed().then(() => {
          if (!this.isClosing) {
            // Unexpected closure - trigger graceful shutdown instead of immediate exit
            log.nats.error({}, "NATS connection closed unexpectedly, initiating graceful shutdown");
            process.emit("SIGTERM");
          } else {
            log.nats.info({}, "NATS connection closed (expected during shutdown)");
          }
        });

        void (async () => {
          for await (const status of nc.status()) {
            log.nats.info({ status: status.type, data: status.data }, "NATS status update");
          }
        })();

        await this.ensureStream(jsm);

        log.nats.info("Successfully connected to NATS and initialized JetStream");
        return;
      } catch (error) {
        if (attempt === maxRetries) {
          log.nats.error({ error, attempt }, "Failed to connect to NATS after all retries");
          throw error;
        }

        // 1s, 2s, 4s ... capped at 32s
        const delay = calculateBackoff(attempt - 1, { baseDelayMs: 1000, maxDelayMs: 32000 });
        log.nats.warn({ error, attempt, maxRetries, retryInMs: delay }, "NATS connection failed, retrying");

        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }
  }

  private async ensureStream(jsm: JetStreamManager): Promise<void> {
    try {
      await jsm.streams.info(STREAM_NAME);
      log.nats.info(`Stream '${STREAM_NAME}' already exists`);
    } catch {
      log.nats.info(`Creating stream '${STREAM_NAME}'`);

      try {
        await jsm.streams.add({
          name: STREAM_NAME,
          subjects: [Subjects.send, Subjects.delayed, Subjects.deadLetter],
          retention: RetentionPolicy.Workqueue,
          storage: StorageType.File,
          num_replicas: config.NATS_REPLICAS,
          max_age: 7 * 24 * 60 * 60 * 1e9, // 7 days, dead letters included
          discard: DiscardPolicy.Old,
          duplicate_window: 2 * 60 * 1e9, // 2 minutes deduplication window
          // The dead-letter monitor removes exhausted messages by sequence
          deny_delete: false,
          deny_purge: true,
        });

        log.nats.info(`Stream '${STREAM_NAME}' created successfully`);
      } catch (createError) {
        if (isAlreadyInUse(createError, "stream")) {
          log.nats.info(`Stream '${STREAM_NAME}' was created by another worker`);
        } else {
          throw createError;
        }
      }
    }

    await this.ensureConsumer(jsm, {
      name: Consumers.sendWorker,
      durable_name: Consumers.sendWorker,
      filter_subject: Subjects.send,
      ack_policy: AckPolicy.Explicit,
      // Invocation deadline: an unacked message is redelivered after this
      ack_wait: config.INVOCATION_TIMEOUT_MS * NANOS_PER_MS,
      max_deliver: MAX_DELIVERY_COUNT_FOR_DEAD_LETTER,
      max_ack_pending: config.MAX_CONCURRENT_MESSAGES * 2,
      deliver_policy: DeliverPolicy.All,
      replay_policy: ReplayPolicy.Instant,
    });

    await this.ensureConsumer(jsm, {
      name: Consumers.delayRelay,
      durable_name: Consumers.delayRelay,
      filter_subject: Subjects.delayed,
      ack_policy: AckPolicy.Explicit,
      ack_wait: 30 * 1e9,
      // Held messages are nacked until due; they must never run out of deliveries
      max_deliver: -1,
      max_ack_pending: 10000,
      deliver_policy: DeliverPolicy.All,
      replay_policy: ReplayPolicy.Instant,
    });
  }

  private async ensureConsumer(jsm: JetStreamManager, consumer: Partial<ConsumerConfig> & { name: string }): Promise<void> {
    try {
      await jsm.consumers.info(STREAM_NAME, consumer.name);
      log.nats.debug({ consumer: consumer.name }, "Consumer already exists");
    } catch {
      log.nats.info({ consumer: consumer.name }, "Creating consumer");

      try {
        await jsm.consumers.add(STREAM_NAME, consumer);
        log.nats.info({ consumer: consumer.name }, "Consumer created successfully");
      } catch (createError) {
        if (isAlreadyInUse(createError, "consumer")) {
          log.nats.info({ consumer: consumer.name }, "Consumer was created by another worker");
        } else {
          throw createError;
        }
      }
    }
  }

  getConnection(): NatsConnection {
    if (!this.nc) {
      throw new Error("NATS not connected");
    }
    return this.nc;
  }

  getJetStream(): JetStreamClient {
    if (!this.js) {
      throw new Error("JetStream not initialized");
    }
    return this.js;
  }

  getJetStreamManager(): JetStreamManager {
    if (!this.jsm) {
      throw new Error("JetStream Manager not initialized");
    }
    return this.jsm;
  }

  async close(): Promise<void> {
    this.isClosing = true;
    if (this.nc) {
      await this.nc.drain();
      log.nats.info({}, "NATS connection closed gracefully");
    }
  }

  async healthCheck(): Promise<boolean> {
    if (!this.nc) return false;

    try {
      await this.nc.flush();
      return true;
    } catch (error) {
      log.nats.error({ error }, "NATS health check failed");
      return false;
    }
  }
}
