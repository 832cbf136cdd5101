import { HarvestError } from "../errors";

export type ReceiveResult<T> =
  | { readonly kind: "item"; readonly value: T }
  | { readonly kind: "closed" }
  | { readonly kind: "cancelled" };

type PendingSend<T> = {
  readonly item: T;
  readonly resolve: (sent: boolean) => void;
  readonly reject: (err: Error) => void;
  readonly detach: () => void;
};

type PendingReceive<T> = {
  readonly resolve: (result: ReceiveResult<T>) => void;
  readonly detach: () => void;
};

/**
 * Raised on a second close or a send after close. Either one means the
 * single-closer protocol was broken.
 */
export class QueueClosedError extends HarvestError {
  constructor(queue: string, operation: "send" | "close") {
    super("InvalidSpec", `${operation} on closed queue ${queue}`, { details: { queue, operation } });
    this.name = "QueueClosedError";
  }
}

/**
 * Bounded FIFO mailbox between two pipeline stages.
 *
 * Every `send` and `receive` races the caller's cancellation signal: a
 * cancelled send resolves `false` without enqueueing, a cancelled receive
 * resolves `{ kind: "cancelled" }`. A full queue suspends senders, which is
 * what propagates backpressure upstream.
 */
export class BoundedQueue<T> {
  readonly name: string;
  readonly capacity: number;
  private readonly buffer: Array<{ readonly value: T }> = [];
  private readonly senders: Array<PendingSend<T>> = [];
  private readonly receivers: Array<PendingReceive<T>> = [];
  private closed = false;

  constructor(name: string, capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`queue ${name} needs a positive integer capacity, got ${capacity}`);
    }
    this.name = name;
    this.capacity = capacity;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buffer.length;
  }

  send(item: T, signal: AbortSignal): Promise<boolean> {
    if (this.closed) {
      return Promise.reject(new QueueClosedError(this.name, "send"));
    }
    if (signal.aborted) {
      return Promise.resolve(false);
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver.detach();
      receiver.resolve({ kind: "item", value: item });
      return Promise.resolve(true);
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push({ value: item });
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve, reject) => {
      const onAbort = () => {
        const index = this.senders.indexOf(pending);
        if (index !== -1) this.senders.splice(index, 1);
        resolve(false);
      };
      const pending: PendingSend<T> = {
        item,
        resolve,
        reject,
        detach: () => signal.removeEventListener("abort", onAbort),
      };
      signal.addEventListener("abort", onAbort, { once: true });
      this.senders.push(pending);
    });
  }

  receive(signal: AbortSignal): Promise<ReceiveResult<T>> {
    if (signal.aborted) {
      return Promise.resolve({ kind: "cancelled" });
    }

    const head = this.buffer.shift();
    if (head) {
      this.admitWaitingSender();
      return Promise.resolve({ kind: "item", value: head.value });
    }

    if (this.closed) {
      return Promise.resolve({ kind: "closed" });
    }

    return new Promise<ReceiveResult<T>>((resolve) => {
      const onAbort = () => {
        const index = this.receivers.indexOf(pending);
        if (index !== -1) this.receivers.splice(index, 1);
        resolve({ kind: "cancelled" });
      };
      const pending: PendingReceive<T> = {
        resolve,
        detach: () => signal.removeEventListener("abort", onAbort),
      };
      signal.addEventListener("abort", onAbort, { once: true });
      this.receivers.push(pending);
    });
  }

  /**
   * Closes the queue. Buffered items stay receivable; waiting receivers see
   * `closed` once the buffer is drained.
   */
  close(): void {
    if (this.closed) {
      throw new QueueClosedError(this.name, "close");
    }
    this.closed = true;

    for (const receiver of this.receivers.splice(0)) {
      receiver.detach();
      receiver.resolve({ kind: "closed" });
    }
    for (const sender of this.senders.splice(0)) {
      sender.detach();
      sender.reject(new QueueClosedError(this.name, "send"));
    }
  }

  private admitWaitingSender(): void {
    const sender = this.senders.shift();
    if (!sender) return;
    sender.detach();
    this.buffer.push({ value: sender.item });
    sender.resolve(true);
  }
}
