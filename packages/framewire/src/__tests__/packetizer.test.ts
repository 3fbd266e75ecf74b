import { describe, it, expect, beforeEach } from 'vitest';
import { Packetizer } from '../wire/packetizer.js';
import { createUnit } from '../units/classifier.js';
import { ErrorCode, FramewireError } from '../types/errors.js';
import { bytesToHex } from '../utils/bytes.js';
import {
  FRAME_1,
  FRAME_2,
  PPS_1,
  SPS_1,
  SPS_2,
  ScriptedTransport,
  hexList,
  unpacketize,
} from './helpers.js';

const A = bytesToHex(SPS_1);
const A2 = bytesToHex(SPS_2);
const B = bytesToHex(PPS_1);
const F1 = bytesToHex(FRAME_1);
const F2 = bytesToHex(FRAME_2);

describe('Packetizer', () => {
  let transport: ScriptedTransport;

  beforeEach(() => {
    transport = new ScriptedTransport();
  });

  function sentUnits(): string[] {
    return hexList(unpacketize(transport.bytes));
  }

  function pushAll(packetizer: Packetizer, ...units: Uint8Array[]): boolean[] {
    return units.map((data) => packetizer.push(createUnit(data)));
  }

  describe('configuration', () => {
    it('should hold configuration units until the first frame', async () => {
      const packetizer = new Packetizer(transport, 'peer-b');

      pushAll(packetizer, SPS_1, PPS_1);
      expect(transport.sendCalls).toBe(0);

      pushAll(packetizer, FRAME_2);
      await packetizer.flush();

      expect(sentUnits()).toEqual([A, B, F2]);
      expect(packetizer.getStats()).toMatchObject({ packetsSent: 3, configPacketsSent: 2, bytesSent: 24 });
    });

    it('should re-send the configuration before each keyframe', async () => {
      const packetizer = new Packetizer(transport, 'peer-b');

      pushAll(packetizer, SPS_1, PPS_1, FRAME_1, SPS_1, PPS_1, FRAME_2, FRAME_1);
      await packetizer.flush();

      expect(sentUnits()).toEqual([A, B, F1, F2, A, B, F1]);
    });

    it('should send identical configuration only once when keyframe refresh is off', async () => {
      const packetizer = new Packetizer(transport, 'peer-b', { refreshConfigOnKeyframe: false });

      pushAll(packetizer, SPS_1, PPS_1, FRAME_1, SPS_1, PPS_1, FRAME_2, FRAME_1);
      await packetizer.flush();

      expect(sentUnits()).toEqual([A, B, F1, F2, F1]);
    });

    it('should send both units again when the primary changes', async () => {
      const packetizer = new Packetizer(transport, 'peer-b', { refreshConfigOnKeyframe: false });

      pushAll(packetizer, SPS_1, PPS_1, FRAME_2, SPS_2, FRAME_2);
      await packetizer.flush();

      expect(sentUnits()).toEqual([A, B, F2, A2, B, F2]);
    });

    it('should lead with configuration carried over from an earlier binding', async () => {
      const packetizer = new Packetizer(transport, 'peer-b', { primary: SPS_1, secondary: PPS_1 });

      pushAll(packetizer, FRAME_2);
      await packetizer.flush();

      expect(sentUnits()).toEqual([A, B, F2]);
    });

    it('should keep its own copy of the configuration bytes', async () => {
      const primary = SPS_1.slice();
      const packetizer = new Packetizer(transport, 'peer-b', { refreshConfigOnKeyframe: false });

      pushAll(packetizer, primary, PPS_1, FRAME_2);
      primary[3] = 0x28;
      pushAll(packetizer, primary, FRAME_2);
      await packetizer.flush();

      expect(sentUnits()).toEqual([A, B, F2, '67420028', B, F2]);
    });

    it('should send frames alone while no configuration is known', async () => {
      const packetizer = new Packetizer(transport, 'peer-b');

      pushAll(packetizer, FRAME_2, FRAME_1);
      await packetizer.flush();

      expect(sentUnits()).toEqual([F2, F1]);
    });
  });

  describe('writes', () => {
    it('should finish packets the transport accepts a few bytes at a time', async () => {
      transport.accept = (data) => Math.min(data.length, 3);
      const packetizer = new Packetizer(transport, 'peer-b');

      pushAll(packetizer, SPS_1, PPS_1, FRAME_1);
      await packetizer.flush();

      expect(sentUnits()).toEqual([A, B, F1]);
      expect(transport.chunks.every((chunk) => chunk.length <= 3)).toBe(true);
      expect(packetizer.getStats()).toMatchObject({ packetsSent: 3, bytesSent: 25, writeRetries: 0 });
    });

    it('should drop frames while the stream stays saturated', async () => {
      transport.accept = () => 0;
      const drops: ErrorCode[] = [];
      const packetizer = new Packetizer(transport, 'peer-b', {
        maxQueuedFrames: 2,
        maxFrameWriteAttempts: 3,
        writeRetryDelayMs: 0,
      });
      packetizer.on('drop', (_unit, reason) => drops.push(reason));

      const results = pushAll(packetizer, FRAME_2, FRAME_2, FRAME_2);
      await packetizer.flush();

      expect(results).toEqual([true, true, false]);
      expect(drops).toEqual([
        ErrorCode.ERR_RESOURCE_EXHAUSTED,
        ErrorCode.ERR_RESOURCE_EXHAUSTED,
        ErrorCode.ERR_RESOURCE_EXHAUSTED,
      ]);
      expect(packetizer.getStats()).toMatchObject({ framesDropped: 3, writeRetries: 4, packetsSent: 0 });
      expect(transport.sendCalls).toBe(6);
      expect(packetizer.isClosed).toBe(false);
    });

    it('should fault instead of dropping a frame that is partly written', async () => {
      transport.accept = (_data, call) => (call === 1 ? 3 : 0);
      const faults: FramewireError[] = [];
      const packetizer = new Packetizer(transport, 'peer-b', {
        maxConfigWriteAttempts: 4,
        writeRetryDelayMs: 0,
      });
      packetizer.on('fault', (error) => faults.push(error));

      pushAll(packetizer, FRAME_2);
      await packetizer.flush();

      expect(faults).toHaveLength(1);
      expect(faults[0].code).toBe(ErrorCode.ERR_WRITE_FAILED);
      expect(transport.sendCalls).toBe(5);
      expect(packetizer.getStats()).toMatchObject({ framesDropped: 0, writeRetries: 3 });
      expect(packetizer.isClosed).toBe(true);
      expect(packetizer.push(createUnit(FRAME_2))).toBe(false);
    });

    it('should fault rather than drop a configuration packet', async () => {
      transport.accept = () => 0;
      const faults: FramewireError[] = [];
      const drops: ErrorCode[] = [];
      const packetizer = new Packetizer(transport, 'peer-b', {
        maxConfigWriteAttempts: 3,
        maxFrameWriteAttempts: 1,
        writeRetryDelayMs: 0,
      });
      packetizer.on('fault', (error) => faults.push(error));
      packetizer.on('drop', (_unit, reason) => drops.push(reason));

      pushAll(packetizer, SPS_1, PPS_1, FRAME_2);
      await packetizer.flush();

      expect(faults.map((error) => error.code)).toEqual([ErrorCode.ERR_WRITE_FAILED]);
      expect(drops).toEqual([]);
      expect(transport.sendCalls).toBe(3);
      expect(packetizer.queued).toBe(0);
    });

    it('should fault as soon as the transport throws', () => {
      const cause = new Error('connection reset');
      transport.accept = () => {
        throw cause;
      };
      const faults: FramewireError[] = [];
      const packetizer = new Packetizer(transport, 'peer-b');
      packetizer.on('fault', (error) => faults.push(error));

      pushAll(packetizer, FRAME_2);

      expect(faults).toHaveLength(1);
      expect(faults[0].message).toBe('Write to peer-b failed: connection reset');
      expect(faults[0].cause).toBe(cause);
      expect(packetizer.isClosed).toBe(true);
    });
  });

  it('should drop an empty frame as invalid', () => {
    const drops: ErrorCode[] = [];
    const packetizer = new Packetizer(transport, 'peer-b');
    packetizer.on('drop', (_unit, reason) => drops.push(reason));

    expect(packetizer.push(createUnit(new Uint8Array(0)))).toBe(false);
    expect(drops).toEqual([ErrorCode.ERR_INVALID_UNIT]);
    expect(packetizer.getStats().framesDropped).toBe(1);
    expect(transport.sendCalls).toBe(0);
  });

  it('should drop a frame above the size limit', () => {
    const drops: ErrorCode[] = [];
    const packetizer = new Packetizer(transport, 'peer-b', { maxUnitSize: 4 });
    packetizer.on('drop', (_unit, reason) => drops.push(reason));

    expect(packetizer.push(createUnit(FRAME_1))).toBe(false);
    expect(drops).toEqual([ErrorCode.ERR_UNIT_TOO_LARGE]);
  });

  it('should discard queued packets on close', async () => {
    transport.accept = () => 0;
    const packetizer = new Packetizer(transport, 'peer-b', { writeRetryDelayMs: 0 });

    pushAll(packetizer, FRAME_2, FRAME_1);
    packetizer.close();
    await packetizer.flush();

    expect(packetizer.queued).toBe(0);
    expect(packetizer.push(createUnit(FRAME_2))).toBe(false);
  });
});
