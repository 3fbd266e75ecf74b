/**
 * Stand-in decoder for the demo: instead of decoding, it records every unit
 * it is handed so the received stream can be written back out as Annex-B.
 */

import { ConfigurationSet, EncodedUnit, FrameDecoder, joinAnnexB } from 'framewire';

export interface RecordedSession {
  readonly id: number;
  readonly config: ConfigurationSet;
}

export class AnnexBRecorder implements FrameDecoder<RecordedSession, EncodedUnit> {
  private units: Uint8Array[] = [];
  private nextId: number = 1;
  private invalidated: number = 0;

  async createSession(config: ConfigurationSet): Promise<RecordedSession> {
    this.units.push(config.primary, config.secondary);
    return { id: this.nextId++, config };
  }

  async decode(_session: RecordedSession, unit: EncodedUnit): Promise<EncodedUnit> {
    this.units.push(unit.data);
    return unit;
  }

  invalidate(_session: RecordedSession): void {
    this.invalidated++;
  }

  /** Units recorded so far, configuration sets included */
  get unitCount(): number {
    return this.units.length;
  }

  get sessionsCreated(): number {
    return this.nextId - 1;
  }

  get sessionsInvalidated(): number {
    return this.invalidated;
  }

  toAnnexB(): Uint8Array {
    return joinAnnexB(this.units);
  }
}
