/**
 * @scevents/models — Execution context of an output event.
 *
 * Records where an event comes from: the slot, the block produced at
 * that slot (if any), whether the execution was read-only, the event's
 * position among its siblings and the call stack that emitted it.
 *
 * Field order (slot, block, readOnly, indexInSlot, callStack) is part
 * of the record encoding and must not change.
 */

import { isAddress, isBlockId, isSlot } from "@scevents/types";
import type { Address, BlockId, Slot } from "@scevents/types";
import { ModelsError } from "./types.js";

export interface EventExecutionContext {
  /** Slot the event was generated at */
  readonly slot: Slot;

  /** Block produced at that slot, or null (miss, or read-only execution) */
  readonly block: BlockId | null;

  /** Whether the event was generated by a read-only execution */
  readonly readOnly: boolean;

  /** Zero-based index among events of the same (slot, readOnly) */
  readonly indexInSlot: number;

  /** Oldest caller first, innermost call last */
  readonly callStack: readonly Address[];
}

/**
 * Validate producer input and build a frozen context.
 *
 * The call stack is copied as given: no sorting, no de-duplication.
 *
 * @throws ModelsError INVALID_CONTEXT
 */
export function createEventContext(input: EventExecutionContext): EventExecutionContext {
  if (!isSlot(input.slot)) {
    throw invalid(`Invalid slot ${JSON.stringify(input.slot)}`);
  }
  if (input.block !== null && !isBlockId(input.block)) {
    throw invalid(`Invalid block id ${JSON.stringify(input.block)}`);
  }
  if (typeof input.readOnly !== "boolean") {
    throw invalid("readOnly must be a boolean");
  }
  if (input.readOnly && input.block !== null) {
    throw invalid("A read-only execution context cannot reference a block");
  }
  if (!Number.isSafeInteger(input.indexInSlot) || input.indexInSlot < 0) {
    throw invalid(`indexInSlot must be a non-negative integer, got ${input.indexInSlot}`);
  }
  if (!Array.isArray(input.callStack)) {
    throw invalid("callStack must be an array");
  }
  input.callStack.forEach((address, depth) => {
    if (!isAddress(address)) {
      throw invalid(`Invalid address at call stack depth ${depth}`);
    }
  });

  return Object.freeze({
    slot: Object.freeze({ period: input.slot.period, thread: input.slot.thread }),
    block: input.block,
    readOnly: input.readOnly,
    indexInSlot: input.indexInSlot,
    callStack: Object.freeze([...input.callStack]),
  });
}

/**
 * Address of the innermost call, i.e. the contract that emitted the event.
 */
export function emitterAddress(context: EventExecutionContext): Address | undefined {
  return context.callStack[context.callStack.length - 1];
}

/**
 * Address at the bottom of the call stack.
 */
export function originalCallerAddress(context: EventExecutionContext): Address | undefined {
  return context.callStack[0];
}

function invalid(message: string): ModelsError {
  return new ModelsError("INVALID_CONTEXT", message);
}
