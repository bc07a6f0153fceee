import type { RedisPublisher, RedisSubscriber } from "../../services/notifier/redis";

type MessageListener = (channel: string, message: string) => void;

/** Channel fan-out shared by every fake client created from it. */
export class FakeRedisBroker {
  private readonly subscribers = new Set<FakeRedisSubscriber>();

  publisher(): FakeRedisPublisher {
    return new FakeRedisPublisher(this);
  }

  subscriber(): FakeRedisSubscriber {
    const subscriber = new FakeRedisSubscriber();
    this.subscribers.add(subscriber);
    return subscriber;
  }

  deliver(channel: string, message: string): number {
    let receivers = 0;
    for (const subscriber of this.subscribers) {
      if (subscriber.channels.has(channel)) {
        receivers++;
        subscriber.emit(channel, message);
      }
    }
    return receivers;
  }
}

export class FakeRedisPublisher implements RedisPublisher {
  readonly published: Array<{ channel: string; message: string }> = [];
  quitCalled = false;

  constructor(private readonly broker: FakeRedisBroker) {}

  async publish(channel: string, message: string): Promise<number> {
    this.published.push({ channel, message });
    return this.broker.deliver(channel, message);
  }

  async quit(): Promise<string> {
    this.quitCalled = true;
    return "OK";
  }
}

export class FakeRedisSubscriber implements RedisSubscriber {
  readonly channels = new Set<string>();
  quitCalled = false;
  subscribeCalls = 0;
  /** Rejects the next subscribe with this error. */
  failNextSubscribe: Error | null = null;
  private readonly listeners: MessageListener[] = [];
  private gate: Promise<void> | null = null;

  /** Holds subscribes pending until the returned function is called. */
  holdSubscribes(): () => void {
    let release: () => void = () => undefined;
    this.gate = new Promise(resolve => {
      release = resolve;
    });
    return () => {
      this.gate = null;
      release();
    };
  }

  async subscribe(...channels: string[]): Promise<number> {
    this.subscribeCalls++;
    if (this.gate) await this.gate;
    const failure = this.failNextSubscribe;
    if (failure) {
      this.failNextSubscribe = null;
      throw failure;
    }
    channels.forEach(channel => this.channels.add(channel));
    return this.channels.size;
  }

  async unsubscribe(...channels: string[]): Promise<number> {
    channels.forEach(channel => this.channels.delete(channel));
    return this.channels.size;
  }

  on(_event: "message", listener: MessageListener): this {
    this.listeners.push(listener);
    return this;
  }

  async quit(): Promise<string> {
    this.quitCalled = true;
    return "OK";
  }

  emit(channel: string, message: string): void {
    this.listeners.forEach(listener => listener(channel, message));
  }
}
