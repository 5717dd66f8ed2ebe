import type { BusFrame } from '../../entities/protocol-unit.js';

export interface BusAdapterStatistics {
  channel: string;
  bitrate: number;
  framesSent: number;
  framesRejected: number;
  framesReceived: number;
  bufferSize: number;
  overruns: number;
}

export interface BusAdapterPort {
  /** Resolves false when the frame is not accepted onto the bus. */
  send(frame: BusFrame): Promise<boolean>;
  receive(timeoutMs: number): Promise<BusFrame[]>;
  statistics(): BusAdapterStatistics;
}
