import type { MessageId } from "../../types/transport";
import type { Selector } from "../selectors/selector";

/**
 * Binds the outbound message that displays a selector keyboard to the
 * selector instance that rendered it.
 *
 * A selector is bound to at most one message: binding it again (when it is
 * re-armed for another field) unbinds the previous message, so presses on
 * that older keyboard resolve to nothing.
 */
export class PendingSelectionMap {
  private readonly bindings = new Map<MessageId, Selector>();

  bind(messageId: MessageId, selector: Selector): void {
    this.unbind(selector);
    this.bindings.set(messageId, selector);
  }

  unbind(selector: Selector): void {
    for (const [messageId, bound] of this.bindings) {
      if (bound === selector) {
        this.bindings.delete(messageId);
      }
    }
  }

  resolve(messageId: MessageId): Selector | undefined {
    return this.bindings.get(messageId);
  }

  isBound(selector: Selector): boolean {
    for (const bound of this.bindings.values()) {
      if (bound === selector) return true;
    }
    return false;
  }

  clear(): void {
    this.bindings.clear();
  }

  get size(): number {
    return this.bindings.size;
  }
}
