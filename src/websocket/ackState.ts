import { AsyncEvent } from "../utils/asyncEvent";

/**
 * Acknowledgment bookkeeping shared by a session's sender and receiver.
 * The receiver records sequence numbers and sets the displayed event; the
 * sender clears it before each frame.
 */
export class AckState {
  queuedSeq: number | null = null;
  displayingSeq: number | null = null;

  readonly displayed = new AsyncEvent();

  markQueued(seq: number): void {
    this.queuedSeq = seq;
  }

  markDisplaying(seq: number): void {
    this.displayingSeq = seq;
    this.displayed.set();
  }

  resetForFrame(): void {
    this.displayed.clear();
  }
}
