import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SessionBinder } from '../session/binder.js';
import { MemoryTransport, MemoryTransportOptions } from '../transport/memory.js';
import { createUnit } from '../units/classifier.js';
import { ErrorCode, FramewireError } from '../types/errors.js';
import { PeerId, PeerState } from '../types/units.js';
import { bytesEqual } from '../utils/bytes.js';
import { FRAME_1, FRAME_2, PPS_1, SPS_1, RecordingDecoder, nextTick } from './helpers.js';

describe('SessionBinder', () => {
  let local: MemoryTransport;
  let remote: MemoryTransport;
  let decoder: RecordingDecoder;
  let sender: SessionBinder;
  let receiver: SessionBinder<number, string>;

  beforeEach(() => {
    [local, remote] = MemoryTransport.pair(['local', 'remote'], { chunkSize: 1 });
    decoder = new RecordingDecoder();
    sender = new SessionBinder(local, { role: 'sender', writeRetryDelayMs: 0 });
    receiver = new SessionBinder<number, string>(remote, { role: 'receiver', decoder });
  });

  afterEach(async () => {
    await sender.close();
    await receiver.close();
  });

  async function rebuild(options: MemoryTransportOptions): Promise<void> {
    await sender.close();
    await receiver.close();
    [local, remote] = MemoryTransport.pair(['local', 'remote'], options);
    sender = new SessionBinder(local, { role: 'sender', writeRetryDelayMs: 0 });
    receiver = new SessionBinder<number, string>(remote, { role: 'receiver', decoder });
  }

  function produce(...units: Uint8Array[]): boolean[] {
    return units.map((data) => sender.onUnitProduced(createUnit(data)));
  }

  /** Wait until everything sent so far has been delivered and decoded */
  async function settle(): Promise<void> {
    await sender.getBinding()?.packetizer?.flush();
    await nextTick();
    await receiver.getBinding()?.pipeline?.idle();
  }

  it('should bind the first peer on each side', () => {
    local.connect();

    expect(sender.activePeer).toBe('remote');
    expect(receiver.activePeer).toBe('local');
    expect(sender.getBinding()?.pipeline).toBeNull();
    expect(receiver.getBinding()?.packetizer).toBeNull();
  });

  it('should deliver frames byte by byte and decode them in order', async () => {
    local.connect();

    produce(SPS_1, PPS_1, FRAME_1, FRAME_2);
    await settle();

    expect(decoder.calls).toEqual(['create:1', 'decode:1', 'decode:1']);
    expect(decoder.decoded).toEqual(['1:6588840021', '1:419a0203']);
  });

  it('should send configuration produced before the peer connected', async () => {
    expect(produce(SPS_1, PPS_1)).toEqual([false, false]);

    local.connect();
    produce(FRAME_2);
    await settle();

    expect(decoder.decoded).toEqual(['1:419a0203']);
  });

  it('should complete packets the transport accepts three bytes at a time', async () => {
    await rebuild({ acceptLimit: 3 });
    local.connect();

    produce(SPS_1, PPS_1, FRAME_1, FRAME_2);
    await settle();

    expect(decoder.decoded).toEqual(['1:6588840021', '1:419a0203']);
    expect(sender.getBinding()?.packetizer?.getStats()).toMatchObject({ packetsSent: 4, bytesSent: 33, writeRetries: 0 });
  });

  it('should drop frames while the transport is saturated and stay bound', async () => {
    await rebuild({});
    local.connect();
    produce(SPS_1, PPS_1, FRAME_1);
    await settle();

    local.setSaturated(true);
    produce(FRAME_2);
    await settle();

    expect(sender.getBinding()?.packetizer?.getStats().framesDropped).toBe(1);
    expect(sender.activePeer).toBe('remote');

    local.setSaturated(false);
    produce(FRAME_2);
    await settle();

    expect(decoder.decoded).toEqual(['1:6588840021', '1:419a0203']);
  });

  it('should carry over configuration bytes even if the encoder reuses its buffer', async () => {
    const primary = SPS_1.slice();
    produce(primary, PPS_1);
    primary.fill(0);

    local.connect();
    produce(FRAME_2);
    await settle();

    expect(decoder.configs).toHaveLength(1);
    expect(bytesEqual(decoder.configs[0].primary, SPS_1)).toBe(true);
    expect(decoder.decoded).toEqual(['1:419a0203']);
  });

  it('should reject and disconnect a second peer', () => {
    const rejected: Array<[PeerId, FramewireError]> = [];
    receiver.on('rejected', (peer, error) => rejected.push([peer, error]));
    local.connect();

    remote.emit('peerState', 'intruder', PeerState.CONNECTED);

    expect(rejected).toHaveLength(1);
    expect(rejected[0][0]).toBe('intruder');
    expect(rejected[0][1].code).toBe(ErrorCode.ERR_PEER_REJECTED);
    expect(receiver.activePeer).toBe('local');

    remote.emit('peerState', 'intruder', PeerState.DISCONNECTED);
    expect(receiver.activePeer).toBe('local');
  });

  it('should tear down on disconnect and start over on reconnect', async () => {
    const unbound: PeerId[] = [];
    sender.on('unbound', (peer) => unbound.push(peer));
    local.connect();
    produce(SPS_1, PPS_1, FRAME_2);
    await settle();

    local.disconnect('remote');
    await nextTick();

    expect(unbound).toEqual(['remote']);
    expect(sender.activePeer).toBeNull();
    expect(receiver.activePeer).toBeNull();
    expect(decoder.calls).toEqual(['create:1', 'decode:1', 'invalidate:1']);
    expect(produce(FRAME_2)).toEqual([false]);

    local.connect();
    produce(FRAME_2);
    await settle();

    expect(decoder.calls).toEqual(['create:1', 'decode:1', 'invalidate:1', 'create:2', 'decode:2']);
  });

  it('should drop the binding when a write fails', () => {
    const faults: Array<[PeerId, FramewireError]> = [];
    sender.on('fault', (peer, error) => faults.push([peer, error]));
    local.connect();
    local.failWrites(new Error('broken pipe'));

    produce(SPS_1, PPS_1, FRAME_2);

    expect(faults).toHaveLength(1);
    expect(faults[0][0]).toBe('remote');
    expect(faults[0][1].code).toBe(ErrorCode.ERR_WRITE_FAILED);
    expect(sender.activePeer).toBeNull();
    expect(local.isConnected).toBe(false);
  });

  it('should stop following the transport once closed', async () => {
    await sender.close();
    local.connect();

    expect(sender.activePeer).toBeNull();
    expect(receiver.activePeer).toBe('local');
  });
});
