import { v4 as uuidv4 } from 'uuid';
import {
  MessageTypes,
  RedisChannels,
  parseCommandResult,
  type BridgeCommand,
  type PubSub,
  type PublishRequest,
  type QoS,
} from '@mqtt-dashboard/shared';
import { SERVICE } from './config.js';

export interface CommandOutcome {
  success: boolean;
  code?: string;
  error?: string;
}

interface Pending {
  resolve: (outcome: CommandOutcome) => void;
  timer: NodeJS.Timeout;
}

/** Request/response over Redis: each command carries a request id the bridge echoes back. */
export class BridgeCommands {
  private readonly pending = new Map<string, Pending>();

  constructor(
    private readonly pubsub: PubSub,
    private readonly timeoutMs: number,
    private readonly newId: () => string = () => uuidv4(),
  ) {}

  async attach(): Promise<void> {
    await this.pubsub.subscribe(RedisChannels.COMMAND_RESULTS, (m) => this.handleResult(m));
  }

  publish(request: PublishRequest): Promise<CommandOutcome> {
    return this.send((requestId) => ({ type: MessageTypes.CMD_PUBLISH, request_id: requestId, ...request }));
  }

  subscribe(topic: string, qos: QoS = 0): Promise<CommandOutcome> {
    return this.send((requestId) => ({ type: MessageTypes.CMD_SUBSCRIBE, request_id: requestId, topic, qos }));
  }

  unsubscribe(topic: string): Promise<CommandOutcome> {
    return this.send((requestId) => ({ type: MessageTypes.CMD_UNSUBSCRIBE, request_id: requestId, topic }));
  }

  pendingCount(): number {
    return this.pending.size;
  }

  handleResult(message: unknown): void {
    const result = parseCommandResult(message);
    if (!result) return;
    const outcome: CommandOutcome = { success: result.success };
    if (result.code) outcome.code = result.code;
    if (result.error) outcome.error = result.error;
    this.settle(result.request_id, outcome);
  }

  stop(): void {
    for (const requestId of [...this.pending.keys()]) {
      this.settle(requestId, { success: false, code: 'bridge_unavailable', error: 'Dashboard is shutting down' });
    }
  }

  private async send(build: (requestId: string) => BridgeCommand): Promise<CommandOutcome> {
    const requestId = this.newId();
    const command = build(requestId);
    const result = new Promise<CommandOutcome>((resolve) => {
      const timer = setTimeout(() => {
        console.warn(`[${SERVICE}] ${command.type} ${requestId} timed out after ${this.timeoutMs}ms`);
        this.settle(requestId, { success: false, code: 'bridge_timeout', error: 'Bridge did not respond in time' });
      }, this.timeoutMs);
      this.pending.set(requestId, { resolve, timer });
    });

    const sent = await this.pubsub.publish(RedisChannels.COMMANDS, command);
    if (!sent) {
      this.settle(requestId, { success: false, code: 'bridge_unavailable', error: 'Could not reach the bridge' });
    }
    return result;
  }

  private settle(requestId: string, outcome: CommandOutcome): void {
    const entry = this.pending.get(requestId);
    if (!entry) return;
    this.pending.delete(requestId);
    clearTimeout(entry.timer);
    entry.resolve(outcome);
  }
}
