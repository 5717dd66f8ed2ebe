import {
  ProtocolAdapterError,
  type BusAdapterPort,
  type BusAdapterStatistics,
  type BusFrame,
} from '@evsim/domain';

export const MAX_STANDARD_ID = 0x7ff;
export const MAX_FRAME_BYTES = 8;

export interface VirtualBusOptions {
  channel?: string;
  bitrate?: number;
  /** Frames held before the oldest is overwritten. */
  bufferCapacity?: number;
}

export function isWellFormedFrame(frame: BusFrame): boolean {
  return (
    Number.isInteger(frame.identifier) &&
    frame.identifier >= 0 &&
    frame.identifier <= MAX_STANDARD_ID &&
    frame.payload.length <= MAX_FRAME_BYTES &&
    frame.length === frame.payload.length
  );
}

/**
 * Loopback vehicle bus. Every accepted frame is echoed back on the next
 * `receive`, the way a bus node hears its own transmissions.
 */
export class VirtualBusAdapter implements BusAdapterPort {
  private buffer: BusFrame[] = [];
  private framesSent = 0;
  private framesRejected = 0;
  private framesReceived = 0;
  private overruns = 0;

  private readonly channel: string;
  private readonly bitrate: number;
  private readonly capacity: number;

  constructor(opts: VirtualBusOptions = {}) {
    this.channel = opts.channel ?? 'vcan0';
    this.bitrate = opts.bitrate ?? 500_000;
    this.capacity = opts.bufferCapacity ?? 256;
  }

  async send(frame: BusFrame): Promise<boolean> {
    if (!isWellFormedFrame(frame)) {
      this.framesRejected++;
      return false;
    }
    if (this.buffer.length >= this.capacity) {
      this.buffer.shift();
      this.overruns++;
    }
    this.buffer.push({ ...frame, payload: frame.payload.slice() });
    this.framesSent++;
    return true;
  }

  async receive(timeoutMs: number): Promise<BusFrame[]> {
    if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
      throw new ProtocolAdapterError('bus', `invalid receive timeout ${timeoutMs}`);
    }
    const frames = this.buffer;
    this.buffer = [];
    this.framesReceived += frames.length;
    return frames;
  }

  statistics(): BusAdapterStatistics {
    return {
      channel: this.channel,
      bitrate: this.bitrate,
      framesSent: this.framesSent,
      framesRejected: this.framesRejected,
      framesReceived: this.framesReceived,
      bufferSize: this.buffer.length,
      overruns: this.overruns,
    };
  }
}

// ─── EV frame builders ────────────────────────────────────────────────────────

export const EvFrameId = {
  BATTERY_STATUS: 0x100,
  CHARGING_STATE: 0x101,
  ERROR_STATUS: 0x102,
} as const;

function frame(identifier: number, bytes: readonly number[]): BusFrame {
  const payload = Uint8Array.from(bytes, (b) => b & 0xff);
  return { protocol: 'bus', identifier, payload, length: payload.length };
}

export const EvBusFrames = {
  /** [soc %, temperature °C, voltage MSB, voltage LSB, reserved x4] */
  batteryStatus(socPct: number, temperatureC: number, voltageV: number): BusFrame {
    const v = Math.round(voltageV);
    return frame(EvFrameId.BATTERY_STATUS, [Math.round(socPct), Math.round(temperatureC), v >> 8, v, 0, 0, 0, 0]);
  },

  /** [state, current A, power MSB, power LSB, reserved x4] */
  chargingState(state: number, currentAmp: number, powerW: number): BusFrame {
    const p = Math.round(powerW);
    return frame(EvFrameId.CHARGING_STATE, [state, Math.round(currentAmp), p >> 8, p, 0, 0, 0, 0]);
  },

  errorStatus(errorCode: number, severity: number): BusFrame {
    return frame(EvFrameId.ERROR_STATUS, [errorCode, severity, 0, 0, 0, 0, 0, 0]);
  },
};
