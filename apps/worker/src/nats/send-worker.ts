import { calculateFaultBackoff } from "../domain/utils/backoff.js";
import { runConsumerLoop } from "../queue/consumer-loop.js";
import type { MessageSource, QueueMessage } from "../queue/types.js";
import type { ProcessDecision, SendOrchestrator } from "../services/send-orchestrator.js";
import { log, withTraceAsync } from "../logger.js";

/**
 * Settle a message according to the orchestrator's decision.
 *
 * A retry is nacked even on the last delivery: the server then stops
 * redelivering and raises the max-deliveries advisory.
 */
export function applyDecision(message: QueueMessage, decision: ProcessDecision): void {
  if (decision.kind === "ack") {
    message.ack();
    return;
  }
  message.nack(calculateFaultBackoff(message.metadata.deliveryAttemptCount));
}

export interface SendWorkerOptions {
  maxInFlight: number;
}

/**
 * Feeds the send consumer into the orchestrator, one invocation per message.
 */
export class SendWorker {
  private isShuttingDown = false;
  private running: Promise<void> | null = null;

  constructor(
    private source: MessageSource & { stop(): void },
    private orchestrator: SendOrchestrator,
    private options: SendWorkerOptions
  ) {}

  async handleMessage(message: QueueMessage): Promise<void> {
    const decision = await withTraceAsync(
      () => this.orchestrator.handle(message.payload, message.metadata),
      message.traceId
    );
    applyDecision(message, decision);
  }

  start(): Promise<void> {
    if (!this.running) {
      this.running = runConsumerLoop(this.source, (message) => this.handleMessage(message), {
        maxInFlight: this.options.maxInFlight,
        isShuttingDown: () => this.isShuttingDown,
      });
      log.system.info({ consumer: this.source.name }, "send worker started");
    }
    return this.running;
  }

  async stop(): Promise<void> {
    this.isShuttingDown = true;
    this.source.stop();
    await this.running;
    log.system.info({ consumer: this.source.name }, "send worker stopped");
  }
}
