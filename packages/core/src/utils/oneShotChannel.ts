/**
 * Single-value channel between a background producer and a polling consumer.
 *
 * The producer sends at most once; the consumer takes at most once and
 * never waits.
 */

export class OneShotChannel<T extends object> {
  private value: T | null = null;

  private sent = false;

  private taken = false;

  /**
   * Store the value unless one was already sent.
   * @returns Whether the value was accepted.
   */
  send(value: T): boolean {
    if (this.sent) {
      return false;
    }
    this.sent = true;
    this.value = value;
    return true;
  }

  /**
   * Take the value if it has arrived. Later calls return null.
   */
  tryReceive(): T | null {
    if (!this.sent || this.taken) {
      return null;
    }
    this.taken = true;
    const { value } = this;
    this.value = null;
    return value;
  }
}

export default { OneShotChannel };
