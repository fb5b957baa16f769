/**
 * @scevents/models — Producer-side call stack.
 *
 * Tracks nested contract calls while an execution runs. Only the tail
 * moves: a call pushes its address, a return pops it. snapshot() gives
 * the frozen sequence to store in an event context.
 */

import { isAddress } from "@scevents/types";
import type { Address } from "@scevents/types";
import { ModelsError } from "./types.js";

export class CallStack {
  private readonly _frames: Address[] = [];

  constructor(initial: Iterable<Address> = []) {
    for (const address of initial) {
      this.push(address);
    }
  }

  get depth(): number {
    return this._frames.length;
  }

  /**
   * @throws ModelsError INVALID_CONTEXT if the address is empty
   */
  push(address: Address): void {
    if (!isAddress(address)) {
      throw new ModelsError("INVALID_CONTEXT", "Cannot push an empty address on the call stack");
    }
    this._frames.push(address);
  }

  pop(): Address | undefined {
    return this._frames.pop();
  }

  /** Innermost call. */
  current(): Address | undefined {
    return this._frames[this._frames.length - 1];
  }

  /** Outermost call. */
  origin(): Address | undefined {
    return this._frames[0];
  }

  snapshot(): readonly Address[] {
    return Object.freeze([...this._frames]);
  }
}
