import { describe, it, expect } from '@jest/globals';
import { ProtocolAdapterError, type BusFrame } from '@evsim/domain';
import { EvBusFrames, EvFrameId, VirtualBusAdapter, isWellFormedFrame } from '../protocols/virtual-bus.adapter.js';

function rawFrame(identifier: number, bytes: number[], length = bytes.length): BusFrame {
  return { protocol: 'bus', identifier, payload: Uint8Array.from(bytes), length };
}

describe('isWellFormedFrame', () => {
  it('accepts a standard frame', () => {
    expect(isWellFormedFrame(rawFrame(0x7ff, [1, 2, 3]))).toBe(true);
  });

  it('rejects an extended id, an oversized payload and a lying length', () => {
    expect(isWellFormedFrame(rawFrame(0x800, [1]))).toBe(false);
    expect(isWellFormedFrame(rawFrame(0x100, [0, 0, 0, 0, 0, 0, 0, 0, 0]))).toBe(false);
    expect(isWellFormedFrame(rawFrame(0x100, [1, 2], 15))).toBe(false);
  });
});

describe('VirtualBusAdapter', () => {
  it('echoes accepted frames back on receive', async () => {
    const bus = new VirtualBusAdapter();
    await expect(bus.send(rawFrame(0x100, [1, 2]))).resolves.toBe(true);

    const frames = await bus.receive(10);
    expect(frames).toHaveLength(1);
    expect(frames[0]?.identifier).toBe(0x100);
    expect(Array.from(frames[0]?.payload ?? [])).toEqual([1, 2]);
    await expect(bus.receive(10)).resolves.toEqual([]);
  });

  it('refuses malformed frames and counts them', async () => {
    const bus = new VirtualBusAdapter();
    await expect(bus.send(rawFrame(0x900, [1]))).resolves.toBe(false);
    const stats = bus.statistics();
    expect(stats.framesRejected).toBe(1);
    expect(stats.framesSent).toBe(0);
    expect(stats.bufferSize).toBe(0);
  });

  it('overwrites the oldest frame when the buffer is full', async () => {
    const bus = new VirtualBusAdapter({ bufferCapacity: 2 });
    for (const id of [1, 2, 3]) await bus.send(rawFrame(id, [id]));

    expect(bus.statistics().overruns).toBe(1);
    const frames = await bus.receive(0);
    expect(frames.map((f) => f.identifier)).toEqual([2, 3]);
    expect(bus.statistics().framesReceived).toBe(2);
  });

  it('throws on a negative receive timeout', async () => {
    await expect(new VirtualBusAdapter().receive(-1)).rejects.toThrow(ProtocolAdapterError);
  });

  it('reports its channel settings', () => {
    const stats = new VirtualBusAdapter({ channel: 'vcan1', bitrate: 250_000 }).statistics();
    expect(stats.channel).toBe('vcan1');
    expect(stats.bitrate).toBe(250_000);
  });
});

describe('EvBusFrames', () => {
  it('packs battery status into eight bytes', () => {
    const frame = EvBusFrames.batteryStatus(20.4, 31.6, 230);
    expect(frame.identifier).toBe(EvFrameId.BATTERY_STATUS);
    expect(Array.from(frame.payload)).toEqual([20, 32, 0, 230, 0, 0, 0, 0]);
    expect(frame.length).toBe(8);
  });

  it('splits charging power into two bytes', () => {
    const frame = EvBusFrames.chargingState(1, 32, 7_360);
    expect(frame.identifier).toBe(EvFrameId.CHARGING_STATE);
    expect(Array.from(frame.payload)).toEqual([1, 32, 28, 192, 0, 0, 0, 0]);
  });

  it('builds a well-formed error frame', () => {
    expect(isWellFormedFrame(EvBusFrames.errorStatus(3, 2))).toBe(true);
  });
});
