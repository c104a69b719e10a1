import type { SignalGenerator } from '@tickcast/signals';
import { createLogger, type Logger } from '@tickcast/utils';
import type { ClientConnection } from './connection.js';
import { isoNow, type DataMessage, type Subscription } from './types.js';

const logger = createLogger({ name: 'stream:dispatcher', service: 'stream' });

export interface StreamDispatcherOptions {
  connection: ClientConnection;
  generator: SignalGenerator;
  subscription: Subscription;
  /** Subscription generation this dispatcher was started for */
  generation: number;
  /** Whether the session is still in the connection registry */
  isRegistered: (connection: ClientConnection) => boolean;
  onDelivered?: () => void;
  onDeliveryFailed?: (connection: ClientConnection) => void;
}

/**
 * StreamDispatcher delivers one data point per tick to a single session.
 *
 * The first tick runs as soon as `start()` is called, then every
 * `subscription.frequency` ms. Before each send it checks that the session
 * is still registered and still on the same subscription generation; if
 * either check fails it stops without sending. A failed send reports the
 * session through `onDeliveryFailed` and stops.
 */
export class StreamDispatcher {
  private readonly connection: ClientConnection;
  private readonly generator: SignalGenerator;
  private readonly subscription: Subscription;
  private readonly generation: number;
  private readonly isRegistered: (connection: ClientConnection) => boolean;
  private readonly onDelivered?: () => void;
  private readonly onDeliveryFailed?: (connection: ClientConnection) => void;
  private readonly log: Logger;

  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private sent = 0;

  constructor(opts: StreamDispatcherOptions) {
    this.connection = opts.connection;
    this.generator = opts.generator;
    this.subscription = { ...opts.subscription };
    this.generation = opts.generation;
    this.isRegistered = opts.isRegistered;
    this.onDelivered = opts.onDelivered;
    this.onDeliveryFailed = opts.onDeliveryFailed;
    this.log = logger.child({ clientId: opts.connection.connectionId, source: opts.subscription.source });
  }

  get active(): boolean {
    return this.running;
  }

  /** Data messages handed to the socket so far */
  get delivered(): number {
    return this.sent;
  }

  get source(): string {
    return this.subscription.source;
  }

  get frequency(): number {
    return this.subscription.frequency;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.log.debug({ frequency: this.subscription.frequency, generation: this.generation }, 'Dispatcher started');
    this.tick();
  }

  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.running) {
      this.running = false;
      this.log.debug({ sent: this.sent }, 'Dispatcher stopped');
    }
  }

  private isCurrent(): boolean {
    return this.isRegistered(this.connection) && this.connection.generation === this.generation;
  }

  private tick(): void {
    this.timer = null;
    if (!this.running) return;

    if (!this.isCurrent()) {
      this.stop();
      return;
    }

    const point = this.generator.generateDataPoint();
    const message: DataMessage = {
      type: 'data',
      source: this.subscription.source,
      data: point,
      timestamp: isoNow(),
    };

    if (!this.connection.sendMessage(message)) {
      this.log.debug('Delivery failed, ending stream');
      this.stop();
      this.onDeliveryFailed?.(this.connection);
      return;
    }

    this.sent++;
    this.log.trace({ sequence: point.metadata.sequence }, 'Data point sent');
    this.onDelivered?.();

    // The delivery callback may have ended this subscription
    if (this.running) {
      this.timer = setTimeout(() => this.tick(), this.subscription.frequency);
    }
  }
}
