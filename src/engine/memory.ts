import type { ChannelStateManager } from "../state/channelState.js";
import type { Turn, TurnRole } from "../state/types.js";

/**
 * Bounded per-scope conversation memory. Holds at most `maxTurns` turns; appending
 * past the cap drops the oldest turns first.
 */
export class MemoryManager {
  constructor(private readonly state: ChannelStateManager) {}

  get maxTurns(): number {
    return this.state.maxTurns;
  }

  /** Stored turns in order, then the current user message. Does not touch memory. */
  buildConversation(scope: string, currentText: string): Turn[] {
    return [...this.state.getMemory(scope), { role: "user", content: currentText }];
  }

  recordTurn(scope: string, role: TurnRole, content: string): readonly Turn[] {
    const appended = [...this.state.getMemory(scope), { role, content }];
    return this.state.replaceMemory(scope, appended.slice(-this.maxTurns));
  }

  clear(scope: string): void {
    this.state.replaceMemory(scope, []);
  }
}
