/**
 * Reads an Annex-B file and replays its units at a fixed frame rate.
 */

import { readFile } from 'node:fs/promises';
import { setTimeout as sleep } from 'node:timers/promises';
import { EncodedUnit, UnitKind, createUnit, splitAnnexB } from 'framewire';

export async function loadUnits(path: string): Promise<EncodedUnit[]> {
  const data = await readFile(path);
  const units = splitAnnexB(new Uint8Array(data.buffer, data.byteOffset, data.byteLength)).map((unit) => createUnit(unit));
  if (units.length === 0) {
    throw new Error(`No NAL units found in ${path}`);
  }
  return units;
}

/**
 * Hand units to `produce`. Configuration units go out immediately; each
 * frame waits one frame interval (no wait when fps is 0).
 */
export async function replay(
  units: EncodedUnit[],
  fps: number,
  produce: (unit: EncodedUnit) => void
): Promise<number> {
  const interval = fps > 0 ? 1000 / fps : 0;
  let frames = 0;

  for (const unit of units) {
    if (unit.kind === UnitKind.FRAME) {
      if (frames > 0 && interval > 0) {
        await sleep(interval);
      }
      frames++;
    }
    produce(unit);
  }
  return frames;
}

export function parseNumber(value: string, name: string, min: number = 0): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < min) {
    throw new Error(`Invalid ${name}: ${value}`);
  }
  return parsed;
}
