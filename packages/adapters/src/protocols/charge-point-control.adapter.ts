import type {
  ControlAdapterPort,
  ControlAdapterStatistics,
  ControlMessage,
  FieldMap,
} from '@evsim/domain';

type CallHandler = (payload: FieldMap) => FieldMap;

export interface ChargePointControlOptions {
  /** Source of the timestamps put in responses. */
  now: () => number;
  heartbeatIntervalSec?: number;
}

/**
 * Simulated central system answering the charge point's control calls.
 * The first BootNotification pins the charge point identity; later calls that
 * claim another identity are refused.
 */
export class ChargePointControlAdapter implements ControlAdapterPort {
  private chargePointId: string | null = null;
  private readonly transactions = new Map<number, string>();
  private nextTransactionId = 1;
  private reportedEnergyWh: number | null = null;
  private callsHandled = 0;
  private callErrors = 0;
  private readonly callsByAction: Record<string, number> = {};

  private readonly handlers: Record<string, CallHandler> = {
    BootNotification: (payload) => {
      this.chargePointId = typeof payload['chargePointId'] === 'string' ? payload['chargePointId'] : 'unknown';
      return {
        status: 'Accepted',
        currentTime: this.isoNow(),
        interval: this.opts.heartbeatIntervalSec ?? 300,
      };
    },
    Heartbeat: () => ({ currentTime: this.isoNow() }),
    StatusNotification: () => ({}),
    Authorize: () => ({ idTagStatus: 'Accepted' }),
    StartTransaction: (payload) => {
      const transactionId = this.nextTransactionId++;
      this.transactions.set(transactionId, typeof payload['idTag'] === 'string' ? payload['idTag'] : '');
      return { transactionId, idTagStatus: 'Accepted' };
    },
    StopTransaction: (payload) => {
      const id = payload['transactionId'];
      const known = typeof id === 'number' && this.transactions.delete(id);
      if (known) this.recordEnergy(payload['meterStop']);
      return { idTagStatus: known ? 'Accepted' : 'Invalid' };
    },
    MeterValues: (payload) => {
      this.recordEnergy(payload['energyWh']);
      return {};
    },
  };

  constructor(private readonly opts: ChargePointControlOptions) {}

  async send(message: ControlMessage): Promise<ControlMessage | null> {
    if (message.messageType !== 'CALL') return null;

    this.callsHandled++;
    this.callsByAction[message.action] = (this.callsByAction[message.action] ?? 0) + 1;

    const claimed = message.payload['chargePointId'];
    if (this.chargePointId !== null && typeof claimed === 'string' && claimed !== this.chargePointId) {
      return this.callError(message, 'SecurityError', `Charge point ${claimed} is not ${this.chargePointId}`);
    }

    const handler = this.handlers[message.action];
    if (!handler) {
      return this.callError(message, 'NotImplemented', `Action ${message.action} not supported`);
    }

    return {
      protocol: 'control',
      messageType: 'CALL_RESULT',
      messageId: message.messageId,
      action: message.action,
      payload: handler(message.payload),
    };
  }

  statistics(): ControlAdapterStatistics {
    return {
      chargePointId: this.chargePointId,
      callsHandled: this.callsHandled,
      callErrors: this.callErrors,
      callsByAction: { ...this.callsByAction },
      activeTransactions: this.transactions.size,
      reportedEnergyWh: this.reportedEnergyWh,
    };
  }

  private callError(message: ControlMessage, errorCode: string, errorDescription: string): ControlMessage {
    this.callErrors++;
    return {
      protocol: 'control',
      messageType: 'CALL_ERROR',
      messageId: message.messageId,
      action: message.action,
      payload: { errorCode, errorDescription },
    };
  }

  private recordEnergy(value: unknown): void {
    if (typeof value === 'number' && Number.isFinite(value)) this.reportedEnergyWh = value;
  }

  private isoNow(): string {
    return new Date(this.opts.now()).toISOString();
  }
}
