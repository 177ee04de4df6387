/**
 * Slot arena — the fixed set of eight input positions.
 *
 * Slots are addressed by index. In paired mode slot 2k holds token0 and
 * slot 2k+1 token1 of the same AMM position, and both reference one
 * PairedProtocolAdapter.
 */

import { sameAddress } from "@ballast/types";
import type { Address } from "@ballast/types";
import type {
  ActiveInput,
  AllocationMode,
  InputConfig,
  PairedProtocolAdapter,
  ProtocolAdapter,
  Slot,
} from "./types.js";
import { AllocationError, MAX_INPUTS } from "./types.js";

const EMPTY: Slot = { kind: "empty" };

export interface ActiveSlot {
  readonly index: number;
  readonly input: ActiveInput;
}

export interface SinglePosition {
  readonly kind: "single";
  readonly slot: ActiveSlot;
  readonly adapter: ProtocolAdapter;
}

export interface PairedPosition {
  readonly kind: "paired";
  readonly even: ActiveSlot;
  readonly odd: ActiveSlot;
  readonly adapter: PairedProtocolAdapter;
}

export type Position = SinglePosition | PairedPosition;

/**
 * Validate a full input set before it replaces the current one.
 */
export function validateInputs(inputs: readonly InputConfig[], mode: AllocationMode, asset: Address): void {
  if (inputs.length > MAX_INPUTS) {
    throw new AllocationError(
      "INCORRECT_ARRAY_LENGTHS",
      `At most ${String(MAX_INPUTS)} inputs are supported, got ${String(inputs.length)}`,
    );
  }
  if (mode === "paired" && inputs.length % 2 !== 0) {
    throw new AllocationError("INCORRECT_ARRAY_LENGTHS", "Paired inputs must come in even/odd pairs");
  }

  let totalWeight = 0;
  const tokens: Address[] = [];
  for (const [index, input] of inputs.entries()) {
    if (!Number.isInteger(input.weight) || input.weight < 0) {
      throw new AllocationError("INVALID_DATA", `Input ${String(index)} has an invalid weight`);
    }
    if (!Number.isInteger(input.decimals) || input.decimals < 0 || input.decimals > 36) {
      throw new AllocationError("INVALID_DATA", `Input ${String(index)} has invalid decimals`);
    }
    if (sameAddress(input.positionHandle, asset)) {
      throw new AllocationError("WRONG_TOKEN", `Input ${String(index)} uses the vault asset as its position token`);
    }
    // Idle balances are attributed by token, so a non-asset token may back one slot only.
    if (!sameAddress(input.token, asset)) {
      if (tokens.some((token) => sameAddress(token, input.token))) {
        throw new AllocationError("WRONG_TOKEN", `Token ${input.token} is configured twice`);
      }
      tokens.push(input.token);
    }
    totalWeight += input.weight;

    if (mode === "single" && input.adapter.kind !== "single") {
      throw new AllocationError("INVALID_DATA", `Input ${String(index)} needs a single-token adapter`);
    }
    if (mode === "paired") {
      if (input.adapter.kind !== "paired") {
        throw new AllocationError("INVALID_DATA", `Input ${String(index)} needs a paired adapter`);
      }
      const partner = index % 2 === 1 ? inputs[index - 1] : undefined;
      if (partner !== undefined && partner.adapter !== input.adapter) {
        throw new AllocationError(
          "INVALID_DATA",
          `Inputs ${String(index - 1)} and ${String(index)} must share one paired adapter`,
        );
      }
    }
  }

  if (totalWeight > 10_000) {
    throw new AllocationError(
      "AMOUNT_TOO_HIGH",
      `Input weights sum to ${String(totalWeight)} bps, above 10000`,
    );
  }
}

export class SlotArena {
  private _slots: Slot[] = Array.from({ length: MAX_INPUTS }, () => EMPTY);

  get(index: number): Slot {
    return this._slots[index] ?? EMPTY;
  }

  all(): readonly Slot[] {
    return [...this._slots];
  }

  active(): ActiveSlot[] {
    const result: ActiveSlot[] = [];
    for (const [index, slot] of this._slots.entries()) {
      if (slot.kind === "active") {
        result.push({ index, input: slot.input });
      }
    }
    return result;
  }

  /**
   * Active slots grouped by the position they back.
   */
  positions(): Position[] {
    const result: Position[] = [];
    const active = this.active();
    for (const slot of active) {
      const adapter = slot.input.adapter;
      if (adapter.kind === "single") {
        result.push({ kind: "single", slot, adapter });
        continue;
      }
      if (slot.index % 2 === 1) continue;
      const odd = active.find((candidate) => candidate.index === slot.index + 1);
      if (odd !== undefined) {
        result.push({ kind: "paired", even: slot, odd, adapter });
      }
    }
    return result;
  }

  totalWeight(): number {
    let total = 0;
    for (const { input } of this.active()) {
      total += input.weight;
    }
    return total;
  }

  replace(inputs: readonly ActiveInput[]): void {
    this._slots = Array.from({ length: MAX_INPUTS }, (_, index): Slot => {
      const input = inputs[index];
      return input === undefined ? EMPTY : { kind: "active", input };
    });
  }

  restore(slots: readonly Slot[]): void {
    this._slots = Array.from({ length: MAX_INPUTS }, (_, index) => slots[index] ?? EMPTY);
  }
}
