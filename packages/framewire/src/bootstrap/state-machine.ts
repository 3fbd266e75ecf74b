/**
 * Bootstrap state machine: collects configuration units until a complete
 * set exists and gates frame dispatch until then.
 */

import { EncodedUnit, UnitKind } from '../types/units.js';
import { bytesEqual } from '../utils/bytes.js';
import { ConfigurationSet, createConfigurationSet } from './configuration-set.js';

export enum BootstrapState {
  AWAITING_PRIMARY = 'awaiting-primary',
  AWAITING_SECONDARY = 'awaiting-secondary',
  READY = 'ready',
}

/**
 * What the caller should do with the unit it just handed over.
 */
export type BootstrapAction =
  /** Configuration unit kept, set not complete yet */
  | { type: 'stored'; kind: UnitKind }
  /** Set completed: build a decoder session for it */
  | { type: 'create'; config: ConfigurationSet }
  /** Primary changed while ready: drop the session, wait for the secondary */
  | { type: 'invalidate'; previous: ConfigurationSet }
  /** Secondary changed while ready: drop the session, build one for the new set */
  | { type: 'renegotiate'; previous: ConfigurationSet; config: ConfigurationSet }
  /** Same bytes as the active set */
  | { type: 'duplicate'; kind: UnitKind }
  /** Secondary with no primary before it */
  | { type: 'dropConfig' }
  /** Frame before the set is complete */
  | { type: 'dropFrame' }
  /** Frame for the active set */
  | { type: 'decode'; config: ConfigurationSet };

export class BootstrapStateMachine {
  private currentState: BootstrapState = BootstrapState.AWAITING_PRIMARY;
  private pendingPrimary: Uint8Array | null = null;
  private active: ConfigurationSet | null = null;
  private generation: number = 0;

  /**
   * Feed one classified unit through the machine
   */
  accept(unit: EncodedUnit): BootstrapAction {
    switch (this.currentState) {
      case BootstrapState.AWAITING_PRIMARY:
        return this.acceptAwaitingPrimary(unit);
      case BootstrapState.AWAITING_SECONDARY:
        return this.acceptAwaitingSecondary(unit);
      case BootstrapState.READY:
        return this.acceptReady(unit);
    }
  }

  /**
   * Decoder construction for `generation` failed. Clears the set so the next
   * configuration pair re-arms bootstrap. Returns false when that set was
   * already replaced.
   */
  fail(generation: number): boolean {
    if (this.active === null || this.active.generation !== generation) {
      return false;
    }
    this.clear();
    return true;
  }

  /**
   * Back to AWAITING_PRIMARY with nothing stored
   */
  reset(): void {
    this.clear();
  }

  get state(): BootstrapState {
    return this.currentState;
  }

  /**
   * The complete set, while READY
   */
  get configuration(): ConfigurationSet | null {
    return this.active;
  }

  private acceptAwaitingPrimary(unit: EncodedUnit): BootstrapAction {
    switch (unit.kind) {
      case UnitKind.CONFIG_PRIMARY:
        this.pendingPrimary = unit.data;
        this.currentState = BootstrapState.AWAITING_SECONDARY;
        return { type: 'stored', kind: unit.kind };
      case UnitKind.CONFIG_SECONDARY:
        return { type: 'dropConfig' };
      case UnitKind.FRAME:
        return { type: 'dropFrame' };
    }
  }

  private acceptAwaitingSecondary(unit: EncodedUnit): BootstrapAction {
    const primary = this.pendingPrimary;
    if (primary === null) {
      this.clear();
      return this.acceptAwaitingPrimary(unit);
    }

    switch (unit.kind) {
      case UnitKind.CONFIG_PRIMARY:
        // Newer primary replaces the stored one
        this.pendingPrimary = unit.data;
        return { type: 'stored', kind: unit.kind };
      case UnitKind.CONFIG_SECONDARY:
        return { type: 'create', config: this.complete(primary, unit.data) };
      case UnitKind.FRAME:
        return { type: 'dropFrame' };
    }
  }

  private acceptReady(unit: EncodedUnit): BootstrapAction {
    const active = this.active;
    if (active === null) {
      // Unreachable: READY always has a set
      this.clear();
      return this.acceptAwaitingPrimary(unit);
    }

    switch (unit.kind) {
      case UnitKind.FRAME:
        return { type: 'decode', config: active };

      case UnitKind.CONFIG_PRIMARY:
        if (bytesEqual(active.primary, unit.data)) {
          return { type: 'duplicate', kind: unit.kind };
        }
        this.clear();
        this.acceptAwaitingPrimary(unit);
        return { type: 'invalidate', previous: active };

      case UnitKind.CONFIG_SECONDARY: {
        if (bytesEqual(active.secondary, unit.data)) {
          return { type: 'duplicate', kind: unit.kind };
        }
        // Only the secondary changed: the primary still in force is re-admitted
        this.clear();
        const config = this.complete(active.primary, unit.data);
        return { type: 'renegotiate', previous: active, config };
      }
    }
  }

  private complete(primary: Uint8Array, secondary: Uint8Array): ConfigurationSet {
    this.generation++;
    this.active = createConfigurationSet(primary, secondary, this.generation);
    this.pendingPrimary = null;
    this.currentState = BootstrapState.READY;
    return this.active;
  }

  private clear(): void {
    this.currentState = BootstrapState.AWAITING_PRIMARY;
    this.pendingPrimary = null;
    this.active = null;
  }
}
