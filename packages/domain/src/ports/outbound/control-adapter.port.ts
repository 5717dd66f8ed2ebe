import type { ControlMessage } from '../../entities/protocol-unit.js';

export interface ControlAdapterStatistics {
  chargePointId: string | null;
  callsHandled: number;
  callErrors: number;
  callsByAction: Record<string, number>;
  activeTransactions: number;
  reportedEnergyWh: number | null;
}

export interface ControlAdapterPort {
  /** Resolves null when the message expects no answer. */
  send(message: ControlMessage): Promise<ControlMessage | null>;
  statistics(): ControlAdapterStatistics;
}
